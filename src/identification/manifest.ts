/**
 * Provenance manifest.
 *
 * Captures what the deterministic identification document deliberately
 * leaves out: when and where the run happened, the repository state, the
 * pool size, and sha256 digests of every input file. The manifest points at
 * the document through the document's own digest.
 */

import { execSync } from "node:child_process";
import { existsSync, mkdirSync, readFileSync, writeFileSync } from "node:fs";
import { hostname } from "node:os";
import { basename, join } from "node:path";
import { z } from "zod";
import { sha256Hex } from "./digest.js";

export const MANIFEST_VERSION = "1.0.0";

/**
 * Git repository state at time of run.
 */
export const GitStateSchema = z
  .object({
    /** Current commit SHA (full 40 chars) */
    commitSha: z.string().regex(/^[a-f0-9]{40}$/),
    /** Short commit SHA (7 chars) */
    commitShort: z.string().regex(/^[a-f0-9]{7}$/),
    branch: z.string(),
    /** Whether the working directory has uncommitted changes */
    isDirty: z.boolean(),
    /** Commit timestamp (ISO 8601) */
    commitDate: z.string().datetime({ offset: true }),
  })
  .strict();

export type GitState = z.infer<typeof GitStateSchema>;

export const InputDigestSchema = z
  .object({
    name: z.string(),
    sha256: z.string().regex(/^[0-9a-f]{64}$/),
    bytes: z.number().int().min(0),
  })
  .strict();

export type InputDigest = z.infer<typeof InputDigestSchema>;

export const RunManifestSchema = z
  .object({
    manifestVersion: z.string(),
    runId: z.string().min(1),
    startedAt: z.string().datetime(),
    finishedAt: z.string().datetime().optional(),
    hostname: z.string().optional(),
    git: GitStateSchema.optional(),
    concurrency: z.number().int().min(1).optional(),
    inputs: z.array(InputDigestSchema),
    /** sha256 of the serialized identification document */
    documentDigest: z.string().regex(/^[0-9a-f]{64}$/).optional(),
  })
  .strict();

export type RunManifest = z.infer<typeof RunManifestSchema>;

/**
 * Attempt to capture current git state.
 * Returns undefined outside a git repository or when git is unavailable.
 */
export function captureGitState(): GitState | undefined {
  try {
    execSync("git rev-parse --git-dir", { stdio: "pipe" });
    const commitSha = execSync("git rev-parse HEAD", { stdio: "pipe" }).toString().trim();
    const branch = execSync("git rev-parse --abbrev-ref HEAD", { stdio: "pipe" }).toString().trim();
    const status = execSync("git status --porcelain", { stdio: "pipe" }).toString().trim();
    const commitDate = execSync("git log -1 --format=%cI", { stdio: "pipe" }).toString().trim();
    const parsed = GitStateSchema.safeParse({
      commitSha,
      commitShort: commitSha.substring(0, 7),
      branch,
      isDirty: status.length > 0,
      commitDate,
    });
    return parsed.success ? parsed.data : undefined;
  } catch {
    // Not in a git repository or git not available
    return undefined;
  }
}

/**
 * One input to digest: a file on disk, or in-memory content under a name.
 */
export type ManifestInput = { path: string } | { name: string; content: string | Buffer };

export interface RunManifestOptions {
  runId: string;
  /** Defaults to now */
  startedAt?: Date;
  finishedAt?: Date;
  inputs?: readonly ManifestInput[];
  /** Serialized identification document to link */
  document?: string;
  concurrency?: number;
  /** Capture git state (default: true) */
  captureGit?: boolean;
  /** Capture hostname (default: true) */
  captureHostname?: boolean;
}

function digestInput(input: ManifestInput): InputDigest {
  const name = "path" in input ? basename(input.path) : input.name;
  const content: string | Buffer = "path" in input ? readFileSync(input.path) : input.content;
  return {
    name,
    sha256: sha256Hex(content),
    bytes: typeof content === "string" ? Buffer.byteLength(content, "utf-8") : content.length,
  };
}

/**
 * Create a provenance manifest for a run.
 */
export function createRunManifest(options: RunManifestOptions): RunManifest {
  const manifest: RunManifest = {
    manifestVersion: MANIFEST_VERSION,
    runId: options.runId,
    startedAt: (options.startedAt ?? new Date()).toISOString(),
    inputs: (options.inputs ?? []).map(digestInput),
  };

  if (options.finishedAt) {
    manifest.finishedAt = options.finishedAt.toISOString();
  }

  if (options.captureHostname !== false) {
    manifest.hostname = hostname();
  }

  if (options.captureGit !== false) {
    const git = captureGitState();
    if (git) {
      manifest.git = git;
    }
  }

  if (options.concurrency !== undefined) {
    manifest.concurrency = options.concurrency;
  }

  if (options.document !== undefined) {
    manifest.documentDigest = sha256Hex(options.document);
  }

  return manifest;
}

export function getManifestFilename(runId: string): string {
  return `manifest-${runId}.json`;
}

/**
 * Save a manifest next to its document.
 *
 * @returns Full path to the saved file
 */
export function saveRunManifest(manifest: RunManifest, directory: string): string {
  const filePath = join(directory, getManifestFilename(manifest.runId));
  if (!existsSync(directory)) {
    mkdirSync(directory, { recursive: true });
  }
  writeFileSync(filePath, JSON.stringify(manifest, null, 2), "utf-8");
  return filePath;
}
