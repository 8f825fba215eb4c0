/**
 * Run bundles: everything one identification run consumes, in one JSON
 * document. Used by the CLIs; library callers usually pass the parts to
 * identify() directly.
 *
 * The bundle shell is validated strictly (it must have the right sections
 * of the right shapes), while individual features, spectra, templates,
 * catalog entries and priors stay unknown here. Each of those is validated
 * on its own later so one bad entry cannot reject the whole run.
 */

import { readFileSync } from "node:fs";
import { z } from "zod";
import { DetectionGatesSchema, UserConstraintsSchema } from "../candidates/schema.js";
import { deepFreeze } from "../shared/deep-freeze.js";
import { formatFieldPath, toFieldIssues, type FieldIssue } from "../shared/zod-issues.js";
import { RunSeedSchema } from "./schema.js";

/**
 * Structured validation error for run bundles and run inputs.
 */
export class BundleValidationError extends Error {
  public readonly issues: FieldIssue[];

  constructor(message: string, issues: FieldIssue[]) {
    super(message);
    this.name = "BundleValidationError";
    this.issues = issues;
  }

  format(): string {
    const lines = ["Run bundle validation failed:"];
    for (const issue of this.issues) {
      lines.push(`  - ${formatFieldPath(issue.path)}: ${issue.message}`);
    }
    return lines.join("\n");
  }
}

export const RunBundleSchema = z
  .object({
    sessionId: z.string().min(1).default("session"),
    datasetId: z.string().min(1).default("dataset"),
    seed: RunSeedSchema.default(0),
    observations: z
      .object({
        features: z.array(z.unknown()),
        spectra: z.array(z.unknown()).default([]),
      })
      .strict(),
    catalog: z.array(z.unknown()),
    templates: z.array(z.unknown()),
    priors: z.array(z.unknown()).default([]),
    gates: DetectionGatesSchema.default({}),
    constraints: UserConstraintsSchema.default({}),
    /** Inline rubric; the CLI falls back to --rubric or the default rubric. */
    rubric: z.unknown().optional(),
  })
  .strict();

export type RunBundle = z.infer<typeof RunBundleSchema>;
export type RunBundleInput = z.input<typeof RunBundleSchema>;

function fail(context: string, issues: FieldIssue[]): never {
  const first = issues[0];
  throw new BundleValidationError(
    `${context}: ${issues.length} validation error(s); first: ${formatFieldPath(first?.path ?? [])}: ${first?.message ?? "unknown"}`,
    issues
  );
}

/**
 * Validate a run bundle.
 *
 * @throws BundleValidationError if the bundle shell is invalid
 */
export function loadRunBundle(input: unknown): Readonly<RunBundle> {
  const result = RunBundleSchema.safeParse(input);
  if (!result.success) {
    fail("Invalid run bundle", toFieldIssues(result.error.issues));
  }
  return deepFreeze(result.data);
}

/**
 * Read, parse and validate a run bundle file.
 *
 * @throws BundleValidationError if the file cannot be read, parsed or validated
 */
export function loadRunBundleFromFile(filePath: string): Readonly<RunBundle> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(filePath, "utf-8"));
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new BundleValidationError(`Failed to read run bundle ${filePath}: ${reason}`, [
      { path: [], message: reason, code: "unreadable" },
    ]);
  }
  return loadRunBundle(parsed);
}

/**
 * Parse a section of run input with a schema, raising BundleValidationError
 * with paths rooted at the section name.
 */
export function parseRunSection<T extends z.ZodTypeAny>(
  section: string,
  schema: T,
  value: unknown
): z.infer<T> {
  const result = schema.safeParse(value);
  if (!result.success) {
    fail(
      `Invalid ${section}`,
      toFieldIssues(result.error.issues).map((issue) => ({ ...issue, path: [section, ...issue.path] }))
    );
  }
  return result.data;
}
