/**
 * Identification module: the entry point, its document and provenance.
 */

export {
  identify,
  seededShuffle,
  RunCancelledError,
  type CandidateInputs,
  type IdentifyOptions,
} from "./engine.js";

export {
  DOCUMENT_VERSION,
  ReasonCode,
  RunSeedSchema,
  HypothesisSchema,
  RubricReferenceSchema,
  IdentificationDocumentSchema,
  type RunSeed,
  type Hypothesis,
  type RubricReference,
  type IdentificationDocument,
  type IdentificationResult,
} from "./schema.js";

export {
  serializeIdentification,
  deserializeIdentification,
  isVersionCompatible,
  getIdentificationFilename,
  saveIdentification,
  loadIdentification,
  IdentificationDocumentError,
} from "./serialization.js";

export {
  RunBundleSchema,
  loadRunBundle,
  loadRunBundleFromFile,
  parseRunSection,
  BundleValidationError,
  type RunBundle,
  type RunBundleInput,
} from "./bundle.js";

export {
  createRunManifest,
  captureGitState,
  saveRunManifest,
  getManifestFilename,
  RunManifestSchema,
  GitStateSchema,
  MANIFEST_VERSION,
  type RunManifest,
  type RunManifestOptions,
  type ManifestInput,
  type GitState,
  type InputDigest,
} from "./manifest.js";

export { canonicalJson, digestOf, sha256Hex } from "./digest.js";
