/**
 * Identification entry point.
 *
 * ═══════════════════════════════════════════════════════════════════════════
 * PIPELINE
 * ═══════════════════════════════════════════════════════════════════════════
 *
 *   rubric validation ─▶ feature store ─▶ candidate generation
 *        ─▶ candidate × modality scoring (bounded pool)
 *        ─▶ per-candidate fusion (join point) ─▶ ranking ─▶ tiers
 *        ─▶ evidence graphs ─▶ frozen identification document
 *
 * Scoring tasks are dispatched in a seeded shuffle of the candidate ×
 * modality cross product and may complete in any order. Every reduction
 * afterwards runs in sorted order (candidate id, canonical modality order),
 * so the document is byte-identical for any pool size and any completion
 * order.
 *
 * The rubric is validated before anything else happens; a bad rubric fails
 * the run before a single candidate is scored.
 */

import pLimit from "p-limit";
import seedrandom from "seedrandom";
import { CandidateCatalog } from "../candidates/catalog.js";
import { generateCandidates } from "../candidates/generator.js";
import type { CandidateRule } from "../candidates/rules.js";
import { DEFAULT_CANDIDATE_RULES } from "../candidates/rules.js";
import {
  DetectionGatesSchema,
  UserConstraintsSchema,
  type CandidateEntry,
  type DetectionGatesInput,
  type UserConstraintsInput,
} from "../candidates/schema.js";
import { config } from "../config/index.js";
import { MODALITY_ORDER, compareModalities, type Modality } from "../config/rubric/enums.js";
import { loadRubric } from "../config/rubric/loader.js";
import type { Rubric } from "../config/rubric/schema.js";
import { buildHypothesisEvidence, evidenceGraphId } from "../evidence/builder.js";
import { FeatureStore } from "../features/store.js";
import type { ObservationBundle } from "../features/schema.js";
import { recommendFollowup } from "../fusion/followups.js";
import { fuse, type FusionTerm } from "../fusion/posterior.js";
import { resolvePriors, type ResolvedPrior } from "../fusion/priors.js";
import { rankHypotheses } from "../fusion/ranking.js";
import type { Posterior } from "../fusion/schema.js";
import { assignTier } from "../fusion/tiers.js";
import { createSilentLogger, type Logger } from "../logging/logger.js";
import { scoreDense } from "../scoring/dense.js";
import { assessQuality } from "../scoring/quality.js";
import type { ModalityScore, QualityAssessment } from "../scoring/schema.js";
import { scoreSparse } from "../scoring/sparse.js";
import { deepFreeze } from "../shared/deep-freeze.js";
import { compareWarnings, type RunWarning } from "../shared/warnings.js";
import { TemplateRegistry } from "../templates/registry.js";
import type { Template } from "../templates/schema.js";
import { BundleValidationError, parseRunSection } from "./bundle.js";
import { digestOf } from "./digest.js";
import {
  DOCUMENT_VERSION,
  RunSeedSchema,
  type Hypothesis,
  type IdentificationDocument,
  type IdentificationResult,
  type RunSeed,
} from "./schema.js";

/**
 * Raised when a run is cancelled through its AbortSignal.
 */
export class RunCancelledError extends Error {
  constructor(message = "Identification run cancelled") {
    super(message);
    this.name = "RunCancelledError";
  }
}

export interface CandidateInputs {
  /** Validated catalog, or raw entries validated one by one. */
  catalog: CandidateCatalog | readonly unknown[];
  /** Validated registry, or raw templates validated one by one. */
  templates: TemplateRegistry | readonly unknown[];
  gates?: DetectionGatesInput;
  constraints?: UserConstraintsInput;
  /** Hard rules; defaults to DEFAULT_CANDIDATE_RULES. */
  rules?: readonly CandidateRule[];
}

export interface IdentifyOptions {
  /** Scoring pool size (default: SPECTRAL_WORKERS or the core count). */
  concurrency?: number;
  signal?: AbortSignal;
  logger?: Logger;
  sessionId?: string;
  datasetId?: string;
}

interface ScoringTask {
  candidate: Readonly<CandidateEntry>;
  template: Readonly<Template>;
}

interface FusedCandidate {
  candidate: Readonly<CandidateEntry>;
  scores: ModalityScore[];
  prior: ResolvedPrior;
  posterior: Posterior;
}

/**
 * Fisher–Yates shuffle driven by a seeded generator.
 */
export function seededShuffle<T>(items: readonly T[], seed: RunSeed): T[] {
  const rng = seedrandom(String(seed));
  const out = [...items];
  for (let i = out.length - 1; i > 0; i--) {
    const j = Math.floor(rng() * (i + 1));
    const a = out[i];
    const b = out[j];
    if (a !== undefined && b !== undefined) {
      out[i] = b;
      out[j] = a;
    }
  }
  return out;
}

function throwIfCancelled(signal: AbortSignal | undefined, where: string): void {
  if (signal?.aborted) {
    throw new RunCancelledError(`Identification run cancelled ${where}`);
  }
}

function scoreTask(task: ScoringTask, store: FeatureStore, rubric: Readonly<Rubric>): ModalityScore {
  const { template } = task;
  const section = rubric.modalities[template.modality];
  if (template.kind === "sparse" && section?.sparse) {
    return scoreSparse({
      template,
      features: store.getByModality(template.modality),
      spectrum: (id) => store.getSpectrum(id),
      rubric: section.sparse,
      numerics: rubric.numerics,
    });
  }
  if (template.kind === "dense" && section?.dense) {
    return scoreDense({
      template,
      spectra: store.getSpectraByModality(template.modality),
      rubric: section.dense,
      numerics: rubric.numerics,
    });
  }
  // The registry only keeps templates whose kind matches a configured section.
  throw new Error(
    `No ${template.kind} rubric section for ${template.modality} (template ${template.sourceId})`
  );
}

function matchedCount(score: ModalityScore): number {
  return score.mode === "sparse" ? score.counts.matched : 0;
}

function dedupeWarnings(warnings: readonly RunWarning[]): RunWarning[] {
  const seen = new Set<string>();
  const out: RunWarning[] = [];
  for (const warning of [...warnings].sort(compareWarnings)) {
    const key = JSON.stringify([
      warning.code,
      warning.modality,
      warning.candidateId,
      warning.featureId,
      warning.spectrumId,
      warning.message,
    ]);
    if (!seen.has(key)) {
      seen.add(key);
      out.push(warning);
    }
  }
  return out;
}

/**
 * Identify the sample composition behind a set of observations.
 *
 * @param features - Feature store, or raw observations validated one by one
 * @param candidates - Catalog, templates, detection gates and user constraints
 * @param priors - Raw priors ({ candidateId, logPrior, parameters? })
 * @param rubric - Rubric document; validated before any scoring
 * @param seed - Seed of the dispatch shuffle; recorded in the document
 * @param options - Pool size, cancellation, logging and graph id parts
 * @throws RubricConfigError if the rubric is invalid
 * @throws BundleValidationError if the seed, gates or constraints are invalid
 * @throws RunCancelledError if the signal aborts the run
 */
export async function identify(
  features: FeatureStore | ObservationBundle,
  candidates: CandidateInputs,
  priors: readonly unknown[],
  rubric: unknown,
  seed: RunSeed,
  options: IdentifyOptions = {}
): Promise<IdentificationResult> {
  const active = loadRubric(rubric);
  const runSeed = parseRunSection("seed", RunSeedSchema, seed);
  const gates = parseRunSection("gates", DetectionGatesSchema, candidates.gates ?? {});
  const constraints = parseRunSection(
    "constraints",
    UserConstraintsSchema,
    candidates.constraints ?? {}
  );
  const concurrency = options.concurrency ?? config.workerPoolSize;
  if (!Number.isInteger(concurrency) || concurrency < 1) {
    throw new BundleValidationError(`Invalid concurrency ${concurrency}: must be a positive integer`, [
      { path: ["concurrency"], message: "Must be a positive integer", code: "invalid_concurrency" },
    ]);
  }

  const sessionId = options.sessionId ?? "session";
  const datasetId = options.datasetId ?? "dataset";
  const logger = (options.logger ?? createSilentLogger()).child({ sessionId, datasetId });
  const signal = options.signal;
  throwIfCancelled(signal, "before start");

  const store = features instanceof FeatureStore ? features : FeatureStore.create(features, active);
  const catalog =
    candidates.catalog instanceof CandidateCatalog
      ? candidates.catalog
      : CandidateCatalog.create(candidates.catalog);
  const templates =
    candidates.templates instanceof TemplateRegistry
      ? candidates.templates
      : TemplateRegistry.create(candidates.templates, active, {
          knownCandidateIds: new Set(catalog.entries.map((c) => c.id)),
        });

  const generation = generateCandidates(
    catalog,
    gates,
    constraints,
    candidates.rules ?? DEFAULT_CANDIDATE_RULES
  );
  const selected = generation.candidates;
  const selectedIds = new Set(selected.map((c) => c.id));
  const priorTable = resolvePriors(priors, selectedIds, active);

  logger.info("Identification started", {
    features: store.features.length,
    candidates: selected.length,
    excluded: generation.exclusions.length,
    concurrency,
  });

  const configured = MODALITY_ORDER.filter((m) => active.modalities[m] !== undefined);

  const quality = new Map<Modality, QualityAssessment>();
  for (const modality of configured) {
    const section = active.modalities[modality];
    if (section === undefined) continue;
    quality.set(
      modality,
      assessQuality({
        modality,
        spectra: store.getSpectraByModality(modality),
        coefficients: section.quality,
        bounds: active.quality,
      })
    );
  }

  const warnings: RunWarning[] = [
    ...store.warnings,
    ...catalog.warnings,
    ...templates.warnings,
    ...generation.warnings,
    ...priorTable.warnings,
    ...[...quality.values()].flatMap((q) => q.warnings),
  ];

  for (const modality of configured) {
    if (active.modalities[modality]?.mode !== "dense") continue;
    const sampled = store.getSpectraByModality(modality).filter((s) => s.samples !== undefined);
    const first = sampled[0];
    if (sampled.length > 1 && first) {
      warnings.push({
        code: "dense_multiple_spectra",
        message: `${sampled.length} sampled ${modality} spectra; dense scoring uses "${first.id}"`,
        modality,
        spectrumId: first.id,
      });
    }
  }

  const rubricReference = {
    name: active.name,
    version: active.rubricVersion,
    digest: digestOf(active),
  };

  if (selected.length === 0) {
    logger.warn("No candidates available after gating and constraints", {
      excluded: generation.exclusions.length,
    });
    const empty: IdentificationDocument = {
      documentVersion: DOCUMENT_VERSION,
      sessionId,
      datasetId,
      rubric: rubricReference,
      templateVersions: [],
      seed: runSeed,
      reasonCode: "no_candidates_available",
      candidates: { considered: catalog.entries.length, excluded: generation.exclusions },
      warnings: dedupeWarnings(warnings),
      hypotheses: [],
    };
    return deepFreeze(empty);
  }

  // ── scoring: candidate × modality through the bounded pool ──────────────
  const tasks: ScoringTask[] = selected.flatMap((candidate) =>
    templates
      .forCandidate(candidate.id)
      .filter((template) => active.modalities[template.modality] !== undefined)
      .map((template) => ({ candidate, template }))
  );

  const limit = pLimit(concurrency);
  const pending = new Map<string, Promise<ModalityScore>[]>();
  for (const task of seededShuffle(tasks, runSeed)) {
    const promise = limit(async () => {
      throwIfCancelled(signal, `before scoring ${task.template.modality} for "${task.candidate.id}"`);
      return scoreTask(task, store, active);
    });
    const list = pending.get(task.candidate.id) ?? [];
    list.push(promise);
    pending.set(task.candidate.id, list);
  }

  // Every candidate carries a term for each modality scored in this run; a
  // candidate without a template there fuses S = 0, as for no observations.
  const runModalities = configured.filter((m) => tasks.some((t) => t.template.modality === m));
  const qualityWeightOf = (modality: Modality): number =>
    quality.get(modality)?.weight ?? active.quality.ceiling;
  const fusionWeightOf = (modality: Modality): number =>
    active.modalities[modality]?.fusionWeight ?? 0;

  const fused = await Promise.all(
    selected.map(async (candidate): Promise<FusedCandidate> => {
      const scores = (await Promise.all(pending.get(candidate.id) ?? [])).sort((a, b) =>
        compareModalities(a.modality, b.modality)
      );
      const prior = priorTable.resolve(candidate.id);
      const scoredTerms: FusionTerm[] = scores.map((score) => ({
        modality: score.modality,
        basis: "scored",
        score: score.score,
        qualityWeight: qualityWeightOf(score.modality),
        fusionWeight: fusionWeightOf(score.modality),
      }));
      const missingTerms: FusionTerm[] = runModalities
        .filter((m) => !scores.some((score) => score.modality === m))
        .map((modality) => ({
          modality,
          basis: "no_template",
          score: 0,
          qualityWeight: qualityWeightOf(modality),
          fusionWeight: fusionWeightOf(modality),
        }));
      const posterior = fuse(
        {
          logPrior: prior.logPrior,
          priorSource: prior.source,
          componentCount: candidate.components.length,
          terms: [...scoredTerms, ...missingTerms],
        },
        active
      );
      logger.debug("Candidate fused", {
        candidateId: candidate.id,
        modalities: scores.length,
        logPosterior: posterior.logPosterior,
      });
      throwIfCancelled(signal, `after fusing "${candidate.id}"`);
      return { candidate, scores, prior, posterior };
    })
  );

  for (const entry of fused) {
    for (const score of entry.scores) {
      if (score.status === "degraded") {
        warnings.push({
          code: "score_degraded",
          message: `${score.modality} score for "${entry.candidate.id}" degraded: ${score.messages.join("; ")}`,
          modality: score.modality,
          candidateId: entry.candidate.id,
        });
      }
    }
  }
  const runWarnings = dedupeWarnings(warnings);

  // ── ranking, tiers, alternatives, follow-ups, evidence ──────────────────
  const ranked = rankHypotheses(
    fused.map((entry) => ({
      ...entry,
      candidateId: entry.candidate.id,
      label: entry.candidate.label,
      logPosterior: entry.posterior.logPosterior,
      modalityScores: entry.scores.map((s) => s.score),
    })),
    active.fusion.tieTolerance,
    active.tiers.sMin
  );

  const hypotheses: Hypothesis[] = ranked.map((entry, i) => {
    const rank = i + 1;
    const rivalIndex = i === 0 ? 1 : 0;
    const rival = ranked[rivalIndex];
    const g = entry.posterior.score;

    const tier = assignTier(
      {
        score: g,
        ...(rival ? { rivalScore: rival.posterior.score } : {}),
        modalities: entry.scores.map((s) => ({
          modality: s.modality,
          score: s.score,
          matched: matchedCount(s),
          observed: s.status !== "no_observations",
        })),
      },
      active.tiers
    );

    const alternatives = ranked
      .map((other, j) => ({ other, rank: j + 1 }))
      .filter(({ other }) => other !== entry)
      .slice(0, active.fusion.maxAlternatives)
      .map(({ other, rank: otherRank }) => ({
        candidateId: other.candidateId,
        label: other.label,
        rank: otherRank,
        score: other.posterior.score,
        scoreGap: g - other.posterior.score,
        logPosteriorGap: entry.posterior.logPosterior - other.posterior.logPosterior,
      }));

    const followup =
      tier.tier === "C"
        ? recommendFollowup(
            { candidateId: entry.candidateId, rank, scores: entry.scores },
            rival ? { candidateId: rival.candidateId, rank: rivalIndex + 1, scores: rival.scores } : undefined,
            configured
          )
        : undefined;

    const scoredModalities = new Set(entry.scores.map((s) => s.modality));
    const hypothesisWarnings = runWarnings.filter((w) =>
      w.candidateId !== undefined
        ? w.candidateId === entry.candidateId
        : w.modality !== undefined && scoredModalities.has(w.modality)
    );

    const evidence = buildHypothesisEvidence({
      graphId: evidenceGraphId(sessionId, datasetId, entry.candidateId),
      candidateId: entry.candidateId,
      label: entry.label,
      scores: entry.scores,
      quality,
      priorParameters: entry.prior.parameters,
    });

    return {
      candidateId: entry.candidateId,
      label: entry.label,
      components: [...entry.candidate.components],
      rank,
      priorParameters: entry.prior.parameters.map((p) => ({ ...p })),
      modalityScores: entry.scores,
      posterior: entry.posterior,
      tier,
      alternatives,
      requiredFollowups: followup ? [followup] : [],
      warnings: hypothesisWarnings,
      evidence,
    };
  });

  const document: IdentificationDocument = {
    documentVersion: DOCUMENT_VERSION,
    sessionId,
    datasetId,
    rubric: rubricReference,
    templateVersions: templates.sourceIds(selectedIds),
    seed: runSeed,
    reasonCode: "ok",
    candidates: { considered: catalog.entries.length, excluded: generation.exclusions },
    warnings: runWarnings,
    hypotheses,
  };

  const leader = hypotheses[0];
  logger.info("Identification finished", {
    hypotheses: hypotheses.length,
    ...(leader ? { leader: leader.candidateId, tier: leader.tier.tier } : {}),
  });

  return deepFreeze(document);
}
