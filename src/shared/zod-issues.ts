import type { ZodIssue } from "zod";

/**
 * A validation problem located by a dotted field path.
 */
export interface FieldIssue {
  /** Path to the invalid field */
  path: (string | number)[];
  /** Human-readable error message */
  message: string;
  /** Zod error code */
  code: string;
}

/**
 * Convert Zod issues to our structured format.
 */
export function toFieldIssues(zodIssues: ZodIssue[]): FieldIssue[] {
  return zodIssues.map((issue) => ({
    path: issue.path.filter(
      (p): p is string | number => typeof p === "string" || typeof p === "number"
    ),
    message: issue.message,
    code: issue.code,
  }));
}

/**
 * Render a field path as "a.b[2].c", or "(root)" when empty.
 */
export function formatFieldPath(path: (string | number)[]): string {
  if (path.length === 0) {
    return "(root)";
  }
  return path
    .map((segment, i) => (typeof segment === "number" ? `[${segment}]` : i === 0 ? segment : `.${segment}`))
    .join("");
}
