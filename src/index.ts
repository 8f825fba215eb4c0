/**
 * Spectral evidence engine.
 *
 * Library entry point. A run takes extracted features, a candidate catalog
 * with versioned templates, optional priors, a rubric and a seed, and
 * resolves to a frozen identification document:
 *
 *   import { identify, DEFAULT_RUBRIC } from "spectral-evidence-engine";
 *
 *   const result = await identify(
 *     { features, spectra },
 *     { catalog, templates, gates, constraints },
 *     priors,
 *     DEFAULT_RUBRIC,
 *     "seed-1"
 *   );
 *
 * The CLIs in src/cli are thin wrappers over the same calls.
 */

export { config, validateConfig, ConfigError } from "./config/index.js";
export * from "./config/rubric/index.js";
export * from "./logging/index.js";
export * from "./features/index.js";
export * from "./templates/index.js";
export * from "./candidates/index.js";
export * from "./scoring/index.js";
export * from "./fusion/index.js";
export * from "./evidence/index.js";
export * from "./identification/index.js";
export { WarningCode, RunWarningSchema, compareWarnings, type RunWarning } from "./shared/warnings.js";
export type { FieldIssue } from "./shared/zod-issues.js";
