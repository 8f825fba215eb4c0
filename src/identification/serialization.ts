/**
 * Identification document serialization for audit and reproducibility.
 *
 * 1. AUDIT TRAIL: the document records the rubric (name, version, digest),
 *    the pinned template sources and the seed next to every score, tier and
 *    evidence graph.
 *
 * 2. REPLAY: a serialized document deserializes to a structure equal to the
 *    one identify() returned; re-running with the recorded inputs, rubric
 *    and seed reproduces it byte for byte.
 *
 * 3. VERSIONING: documentVersion lets loaders reject documents written by an
 *    incompatible major version.
 *
 * FILE NAMING CONVENTION:
 * Documents are saved as: identification-{runId}.json
 * which correlates them with log files and provenance manifests.
 */

import { existsSync, mkdirSync, readFileSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { deepFreeze } from "../shared/deep-freeze.js";
import { formatFieldPath, toFieldIssues, type FieldIssue } from "../shared/zod-issues.js";
import {
  DOCUMENT_VERSION,
  IdentificationDocumentSchema,
  type IdentificationDocument,
  type IdentificationResult,
} from "./schema.js";

/**
 * Raised when a serialized document cannot be read, parsed or accepted.
 */
export class IdentificationDocumentError extends Error {
  public readonly issues: FieldIssue[];

  constructor(message: string, issues: FieldIssue[] = []) {
    super(message);
    this.name = "IdentificationDocumentError";
    this.issues = issues;
  }

  format(): string {
    if (this.issues.length === 0) return this.message;
    const lines = [this.message];
    for (const issue of this.issues) {
      lines.push(`  - ${formatFieldPath(issue.path)}: ${issue.message}`);
    }
    return lines.join("\n");
  }
}

/**
 * Serialize an identification document to JSON.
 *
 * @param pretty - Whether to format with indentation (default: true)
 */
export function serializeIdentification(document: IdentificationDocument, pretty = true): string {
  return JSON.stringify(document, null, pretty ? 2 : undefined);
}

/**
 * Check if a document version is compatible with the current version.
 * Only an exact major version match is accepted.
 */
export function isVersionCompatible(version: string): boolean {
  const [major] = version.split(".").map(Number);
  const [currentMajor] = DOCUMENT_VERSION.split(".").map(Number);
  return major !== undefined && major === currentMajor;
}

/**
 * Deserialize an identification document.
 *
 * @returns Validated and frozen document
 * @throws IdentificationDocumentError if parsing, validation or the version check fails
 */
export function deserializeIdentification(json: string): IdentificationResult {
  let parsed: unknown;
  try {
    parsed = JSON.parse(json);
  } catch (err) {
    throw new IdentificationDocumentError(
      `Failed to parse identification JSON: ${err instanceof Error ? err.message : String(err)}`
    );
  }

  const result = IdentificationDocumentSchema.safeParse(parsed);
  if (!result.success) {
    const issues = toFieldIssues(result.error.issues);
    throw new IdentificationDocumentError(
      `Invalid identification document: ${issues.length} validation error(s); first: ${formatFieldPath(issues[0]?.path ?? [])}: ${issues[0]?.message ?? "unknown"}`,
      issues
    );
  }

  const document = result.data;
  if (!isVersionCompatible(document.documentVersion)) {
    throw new IdentificationDocumentError(
      `Incompatible identification document version: ${document.documentVersion} ` +
        `(current: ${DOCUMENT_VERSION}).`
    );
  }

  return deepFreeze(document);
}

export function getIdentificationFilename(runId: string): string {
  return `identification-${runId}.json`;
}

/**
 * Save a document to a directory.
 *
 * @returns Full path to the saved file
 */
export function saveIdentification(
  document: IdentificationDocument,
  directory: string,
  filename: string
): string {
  const filePath = join(directory, filename);
  if (!existsSync(directory)) {
    mkdirSync(directory, { recursive: true });
  }
  writeFileSync(filePath, serializeIdentification(document), "utf-8");
  return filePath;
}

/**
 * Load a document from a file.
 *
 * @throws IdentificationDocumentError if loading fails
 */
export function loadIdentification(filePath: string): IdentificationResult {
  let json: string;
  try {
    json = readFileSync(filePath, "utf-8");
  } catch (err) {
    throw new IdentificationDocumentError(
      `Failed to read identification file: ${err instanceof Error ? err.message : String(err)}`
    );
  }
  return deserializeIdentification(json);
}
