/**
 * Rubric loader and validator.
 *
 * Responsible for:
 * - Validating a rubric document against the schema with fail-fast behavior
 * - Producing one field-level issue per problem
 * - Freezing the rubric so no stage can alter it mid-run
 */

import { readFileSync } from "node:fs";
import { RubricSchema, type Rubric } from "./schema.js";
import { deepFreeze } from "../../shared/deep-freeze.js";
import { toFieldIssues, formatFieldPath, type FieldIssue } from "../../shared/zod-issues.js";

/**
 * Structured validation error for rubric documents.
 * Raised before any scoring starts; a run never proceeds with a bad rubric.
 */
export class RubricConfigError extends Error {
  public readonly issues: FieldIssue[];

  constructor(message: string, issues: FieldIssue[]) {
    super(message);
    this.name = "RubricConfigError";
    this.issues = issues;
  }

  /**
   * Format errors for display.
   */
  format(): string {
    const lines = ["Rubric validation failed:"];
    for (const issue of this.issues) {
      lines.push(`  - ${formatFieldPath(issue.path)}: ${issue.message}`);
    }
    return lines.join("\n");
  }
}

/**
 * Validate and load a rubric.
 *
 * @param input - Raw rubric document
 * @returns Validated and frozen rubric
 * @throws RubricConfigError if validation fails
 */
export function loadRubric(input: unknown): Readonly<Rubric> {
  const result = RubricSchema.safeParse(input);

  if (!result.success) {
    const issues = toFieldIssues(result.error.issues);
    throw new RubricConfigError(
      `Invalid rubric: ${issues.length} validation error(s); first: ${formatFieldPath(issues[0]?.path ?? [])}: ${issues[0]?.message ?? "unknown"}`,
      issues
    );
  }

  return deepFreeze(result.data);
}

/**
 * Validate a rubric without loading it.
 * Useful for checking a rubric file before committing to a run.
 */
export function validateRubric(input: unknown): {
  success: boolean;
  rubric?: Rubric;
  errors?: FieldIssue[];
} {
  const result = RubricSchema.safeParse(input);

  if (result.success) {
    return { success: true, rubric: result.data };
  }

  return {
    success: false,
    errors: toFieldIssues(result.error.issues),
  };
}

/**
 * Read, parse and load a rubric JSON file.
 *
 * @throws RubricConfigError if the file cannot be read, parsed or validated
 */
export function loadRubricFromFile(filePath: string): Readonly<Rubric> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(filePath, "utf-8"));
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new RubricConfigError(`Failed to read rubric file ${filePath}: ${reason}`, [
      { path: [], message: reason, code: "unreadable" },
    ]);
  }
  return loadRubric(parsed);
}
