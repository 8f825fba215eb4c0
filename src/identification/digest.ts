/**
 * Content digests for provenance.
 *
 * Canonical JSON sorts object keys at every depth so that two structurally
 * equal values always hash the same, whatever order their keys were
 * written in.
 */

import { createHash } from "node:crypto";

function canonicalize(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map(canonicalize);
  }
  if (value !== null && typeof value === "object") {
    const sorted: Record<string, unknown> = {};
    for (const key of Object.keys(value).sort()) {
      sorted[key] = canonicalize(Reflect.get(value, key));
    }
    return sorted;
  }
  return value;
}

export function canonicalJson(value: unknown): string {
  return JSON.stringify(canonicalize(value));
}

export function sha256Hex(content: string | Buffer): string {
  return createHash("sha256").update(content).digest("hex");
}

/**
 * sha256 of the canonical JSON of a value.
 */
export function digestOf(value: unknown): string {
  return sha256Hex(canonicalJson(value));
}
