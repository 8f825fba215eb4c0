/**
 * Feature Store.
 *
 * ═══════════════════════════════════════════════════════════════════════════
 * IMMUTABLE, DETERMINISTICALLY ORDERED OBSERVATIONS
 * ═══════════════════════════════════════════════════════════════════════════
 *
 * The store is the only place scorers read observations from. It provides:
 *
 * 1. PER-ENTRY VALIDATION: each feature and spectrum is validated on its
 *    own. Rejected entries become warnings; the rest are kept.
 *
 * 2. FLAG EXCLUSION: features carrying a quality flag listed in the rubric's
 *    features.excludeFlags are rejected from scoring with a warning.
 *
 * 3. DETERMINISTIC INDEXING: features are sorted by ID and indexed by
 *    modality, so every scorer iterates the same sequence regardless of
 *    input order.
 *
 * 4. IMMUTABILITY: features and spectra are deep-frozen. The store is
 *    shared by every concurrent scoring task without locking.
 */

import type { Modality } from "../config/rubric/enums.js";
import type { Rubric } from "../config/rubric/schema.js";
import { compareModalities } from "../config/rubric/enums.js";
import { deepFreeze } from "../shared/deep-freeze.js";
import { compareWarnings, type RunWarning } from "../shared/warnings.js";
import { formatFieldPath, toFieldIssues } from "../shared/zod-issues.js";
import {
  FeatureSchema,
  SpectrumMetadataSchema,
  type Feature,
  type ObservationBundle,
  type SpectrumMetadata,
} from "./schema.js";

/**
 * Read a string property from an unvalidated entry, for error messages.
 */
function peekString(entry: unknown, key: string): string | undefined {
  if (entry !== null && typeof entry === "object") {
    const value: unknown = Reflect.get(entry, key);
    return typeof value === "string" ? value : undefined;
  }
  return undefined;
}

function peekModality(entry: unknown): Modality | undefined {
  const value = peekString(entry, "modality");
  const parsed = FeatureSchema.shape.modality.safeParse(value);
  return parsed.success ? parsed.data : undefined;
}

function byId<T extends { id: string }>(a: T, b: T): number {
  return a.id < b.id ? -1 : a.id > b.id ? 1 : 0;
}

/**
 * Statistics about the store contents.
 */
export interface FeatureStoreStats {
  acceptedFeatures: number;
  rejectedFeatures: number;
  spectra: number;
  byModality: Partial<Record<Modality, number>>;
}

/**
 * Immutable feature store with deterministic per-modality indexes.
 *
 * @example
 *   const store = FeatureStore.create({ features, spectra }, rubric);
 *   for (const feature of store.getByModality("infrared")) {
 *     // sorted by feature id
 *   }
 */
export class FeatureStore {
  private readonly _features: ReadonlyArray<Readonly<Feature>>;
  private readonly _byId: ReadonlyMap<string, Readonly<Feature>>;
  private readonly _byModality: ReadonlyMap<Modality, ReadonlyArray<Readonly<Feature>>>;
  private readonly _spectraById: ReadonlyMap<string, Readonly<SpectrumMetadata>>;
  private readonly _spectraByModality: ReadonlyMap<
    Modality,
    ReadonlyArray<Readonly<SpectrumMetadata>>
  >;
  private readonly _warnings: ReadonlyArray<Readonly<RunWarning>>;

  private constructor(
    features: Feature[],
    spectra: SpectrumMetadata[],
    warnings: RunWarning[]
  ) {
    this._features = Object.freeze([...features].sort(byId).map((f) => deepFreeze(f)));
    const sortedSpectra = Object.freeze([...spectra].sort(byId).map((s) => deepFreeze(s)));

    this._byId = new Map(this._features.map((f): [string, Readonly<Feature>] => [f.id, f]));
    this._byModality = groupByModality(this._features);
    this._spectraById = new Map(
      sortedSpectra.map((s): [string, Readonly<SpectrumMetadata>] => [s.id, s])
    );
    this._spectraByModality = groupByModality(sortedSpectra);
    this._warnings = Object.freeze([...warnings].sort(compareWarnings).map((w) => deepFreeze(w)));
  }

  /**
   * Validate raw observations and build the store.
   *
   * @param bundle - Raw features and spectrum metadata from extraction
   * @param rubric - Active rubric (supplies the flag exclusion list)
   */
  static create(bundle: ObservationBundle, rubric: Pick<Rubric, "features">): FeatureStore {
    const warnings: RunWarning[] = [];
    const spectra = new Map<string, SpectrumMetadata>();

    bundle.spectra.forEach((raw, index) => {
      const parsed = SpectrumMetadataSchema.safeParse(raw);
      const id = peekString(raw, "id") ?? `#${index}`;
      if (!parsed.success) {
        const issue = toFieldIssues(parsed.error.issues)[0];
        const modality = peekModality(raw);
        warnings.push({
          code: "spectrum_rejected",
          message: `Spectrum "${id}" rejected: ${formatFieldPath(issue?.path ?? [])}: ${issue?.message ?? "invalid"}`,
          spectrumId: id,
          ...(modality ? { modality } : {}),
        });
        return;
      }
      if (spectra.has(parsed.data.id)) {
        warnings.push({
          code: "spectrum_duplicate",
          message: `Duplicate spectrum id "${parsed.data.id}" at index ${index}; first occurrence kept`,
          spectrumId: parsed.data.id,
          modality: parsed.data.modality,
        });
        return;
      }
      spectra.set(parsed.data.id, parsed.data);
    });

    const excluded = new Set(rubric.features.excludeFlags);
    const features = new Map<string, Feature>();

    bundle.features.forEach((raw, index) => {
      const parsed = FeatureSchema.safeParse(raw);
      const id = peekString(raw, "id") ?? `#${index}`;
      if (!parsed.success) {
        const issues = toFieldIssues(parsed.error.issues);
        const fields = issues.map((i) => `${formatFieldPath(i.path)} (${i.message})`).join(", ");
        const modality = peekModality(raw);
        warnings.push({
          code: "feature_rejected",
          message: `Feature "${id}"${modality ? ` (${modality})` : ""} rejected from scoring: ${fields}`,
          featureId: id,
          ...(modality ? { modality } : {}),
        });
        return;
      }

      const feature = parsed.data;
      const blocking = feature.flags.filter((flag) => excluded.has(flag));
      if (blocking.length > 0) {
        warnings.push({
          code: "feature_excluded_flag",
          message: `Feature "${feature.id}" (${feature.modality}) excluded by quality flag(s): ${blocking.join(", ")}`,
          featureId: feature.id,
          modality: feature.modality,
        });
        return;
      }
      if (features.has(feature.id)) {
        warnings.push({
          code: "feature_duplicate",
          message: `Duplicate feature id "${feature.id}" at index ${index}; first occurrence kept`,
          featureId: feature.id,
          modality: feature.modality,
        });
        return;
      }
      if (!spectra.has(feature.spectrumId)) {
        warnings.push({
          code: "feature_unknown_spectrum",
          message: `Feature "${feature.id}" (${feature.modality}) references unknown spectrum "${feature.spectrumId}"; no QC or line-spread metadata applies`,
          featureId: feature.id,
          spectrumId: feature.spectrumId,
          modality: feature.modality,
        });
      }
      features.set(feature.id, feature);
    });

    return new FeatureStore([...features.values()], [...spectra.values()], warnings);
  }

  /** All accepted features, sorted by ID. */
  get features(): ReadonlyArray<Readonly<Feature>> {
    return this._features;
  }

  /** Warnings raised while building the store, in deterministic order. */
  get warnings(): ReadonlyArray<Readonly<RunWarning>> {
    return this._warnings;
  }

  getById(id: string): Readonly<Feature> | undefined {
    return this._byId.get(id);
  }

  /** Accepted features of one modality, sorted by ID. */
  getByModality(modality: Modality): ReadonlyArray<Readonly<Feature>> {
    return this._byModality.get(modality) ?? [];
  }

  getSpectrum(id: string): Readonly<SpectrumMetadata> | undefined {
    return this._spectraById.get(id);
  }

  /** Spectra of one modality, sorted by ID. */
  getSpectraByModality(modality: Modality): ReadonlyArray<Readonly<SpectrumMetadata>> {
    return this._spectraByModality.get(modality) ?? [];
  }

  /** Modalities with at least one accepted feature or spectrum, in canonical order. */
  get observedModalities(): Modality[] {
    const seen = new Set<Modality>([...this._byModality.keys(), ...this._spectraByModality.keys()]);
    return [...seen].sort(compareModalities);
  }

  /** Warnings that concern a modality (or no modality in particular). */
  warningsFor(modality: Modality): ReadonlyArray<Readonly<RunWarning>> {
    return this._warnings.filter((w) => w.modality === undefined || w.modality === modality);
  }

  getStats(): FeatureStoreStats {
    const byModality: Partial<Record<Modality, number>> = {};
    for (const [modality, list] of this._byModality) {
      byModality[modality] = list.length;
    }
    return {
      acceptedFeatures: this._features.length,
      rejectedFeatures: this._warnings.filter(
        (w) => w.code === "feature_rejected" || w.code === "feature_excluded_flag" || w.code === "feature_duplicate"
      ).length,
      spectra: this._spectraById.size,
      byModality,
    };
  }
}

function groupByModality<T extends { modality: Modality }>(
  items: ReadonlyArray<T>
): ReadonlyMap<Modality, ReadonlyArray<T>> {
  const index = new Map<Modality, T[]>();
  for (const item of items) {
    const list = index.get(item.modality) ?? [];
    list.push(item);
    index.set(item.modality, list);
  }
  return new Map(
    [...index].map(([k, v]): [Modality, ReadonlyArray<T>] => [k, Object.freeze(v)])
  );
}
