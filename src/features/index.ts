/**
 * Feature Store module: validated, frozen observations indexed by modality.
 */

export {
  FeatureSchema,
  IntensitySchema,
  ExtractionProvenanceSchema,
  QcMetricsSchema,
  SampledSegmentSchema,
  SpectrumMetadataSchema,
  type Feature,
  type FeatureInput,
  type Intensity,
  type ExtractionProvenance,
  type QcMetrics,
  type SampledSegment,
  type SpectrumMetadata,
  type SpectrumMetadataInput,
  type ObservationBundle,
} from "./schema.js";

export { FeatureStore, type FeatureStoreStats } from "./store.js";
