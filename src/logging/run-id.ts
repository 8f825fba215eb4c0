/**
 * Run ID generation and management.
 * Each identification run gets a run ID that tags its log entries and
 * provenance manifest. The run ID never enters the scored document.
 */

import { randomBytes } from "node:crypto";

/**
 * Generate a short, unique run ID.
 * Format: date prefix + random suffix (e.g., "20240115-a1b2c3")
 */
export function generateRunId(now: Date = new Date()): string {
  const datePart = now.toISOString().slice(0, 10).replace(/-/g, "");
  const randomPart = randomBytes(3).toString("hex");
  return `${datePart}-${randomPart}`;
}

let currentRunId: string | null = null;

/**
 * Initialize the run ID for this process.
 * Pass an explicit ID when replaying a recorded run.
 */
export function initRunId(runId?: string): string {
  currentRunId = runId ?? generateRunId();
  return currentRunId;
}

/**
 * Get the current run ID, or null before initRunId().
 */
export function getRunId(): string | null {
  return currentRunId;
}
