/**
 * Candidate module: catalog, hard rules and generation.
 */

export {
  ElementSymbol,
  Phase,
  EnvironmentConstraintsSchema,
  CandidateEntrySchema,
  DetectionGatesSchema,
  UserConstraintsSchema,
  CandidateExclusionSchema,
  type EnvironmentConstraints,
  type CandidateEntry,
  type CandidateEntryInput,
  type DetectionGates,
  type DetectionGatesInput,
  type UserConstraints,
  type UserConstraintsInput,
  type CandidateExclusion,
} from "./schema.js";

export {
  DEFAULT_CANDIDATE_RULES,
  requiredElementsDetected,
  forbiddenElementsAbsent,
  phaseCompatible,
  temperatureInRange,
  solventCompatible,
  type CandidateRule,
  type RuleOutcome,
} from "./rules.js";

export { CandidateCatalog, type CatalogStats } from "./catalog.js";

export {
  generateCandidates,
  WHITELIST_RULE_ID,
  BLACKLIST_RULE_ID,
  type CandidateGenerationResult,
} from "./generator.js";
