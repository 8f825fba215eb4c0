/**
 * Read-only introspection of a scored hypothesis.
 *
 * explain() returns a per-feature contribution table plus a per-term summary.
 *
 * Feature rows are read off the evidence graph: one per feature node, with
 * the weight of its `supports` edge and its likelihood share within the
 * modality. A feature's contribution is that share of the modality's
 * λ·q·f(S), so the rows of one modality sum to its term.
 *
 * Term rows are the prior, each modality's λ·q·f(S) and the parsimony
 * penalty. Their contributions sum to the hypothesis' log-posterior.
 */

import type { Modality } from "../config/rubric/enums.js";
import type { ContributionBasis } from "../fusion/schema.js";
import type { Hypothesis } from "../identification/schema.js";
import { normalizeZero } from "../scoring/numeric.js";
import type { ModalityScore, ModalityStatus } from "../scoring/schema.js";
import { HYPOTHESIS_NODE_INDEX } from "./builder.js";
import type { EvidenceGraph, FeatureNode } from "./schema.js";

export interface FeatureContributionRow {
  /** Key of the feature node in the evidence graph. */
  nodeKey: string;
  featureId: string;
  modality: Modality;
  spectrumId: string;
  templateSourceId: string;
  label: string | null;
  observedCenter: number;
  expectedCenter: number;
  z: number;
  likelihood: number;
  /** Weight of the feature's `supports` edge into the hypothesis node. */
  edgeWeight: number;
  /** likelihood / Σ likelihood over the modality's features */
  share: number;
  contribution: number;
}

export interface ContributionRow {
  term: "prior" | "modality" | "parsimony";
  modality: Modality | null;
  basis: ContributionBasis | null;
  status: ModalityStatus | null;
  score: number | null;
  qualityWeight: number | null;
  fusionWeight: number | null;
  contribution: number;
  detail: string;
  /** Keys of the evidence nodes that support this term. */
  supportingNodes: string[];
}

export interface Explanation {
  features: FeatureContributionRow[];
  terms: ContributionRow[];
}

function describeScore(score: ModalityScore): string {
  if (score.mode === "sparse") {
    const { counts, components } = score;
    const intensity = components.intensity === null ? "omitted" : components.intensity.toFixed(3);
    return (
      `${counts.matched}/${counts.expected} matched, FP ${counts.falsePositives}; ` +
      `pos ${components.position.toFixed(3)} cov ${components.coverage.toFixed(3)} ` +
      `pen ${components.penalty.toFixed(3)} int ${intensity} (${score.templateSourceId})`
    );
  }
  return (
    `C ${score.correlation.toFixed(3)} at Δ ${score.shift} γ ${score.broadening} ` +
    `via ${score.transform} (${score.templateSourceId})`
  );
}

function supportsWeight(graph: Readonly<EvidenceGraph>, from: number): number {
  const edge = graph.edges.find(
    (e) => e.from === from && e.to === HYPOTHESIS_NODE_INDEX && e.relation === "supports"
  );
  return edge?.weight ?? 0;
}

function explainFeatures(hypothesis: Readonly<Hypothesis>): FeatureContributionRow[] {
  const { evidence, posterior } = hypothesis;
  const features = evidence.nodes.filter((n): n is FeatureNode => n.kind === "feature");

  const totals = new Map<Modality, number>();
  for (const node of features) {
    totals.set(node.modality, (totals.get(node.modality) ?? 0) + node.likelihood);
  }

  return features.map((node) => {
    const total = totals.get(node.modality) ?? 0;
    const share = total > 0 ? node.likelihood / total : 0;
    const term = posterior.contributions.find((c) => c.modality === node.modality);
    return {
      nodeKey: node.key,
      featureId: node.featureId,
      modality: node.modality,
      spectrumId: node.spectrumId,
      templateSourceId: node.templateSourceId,
      label: node.label ?? null,
      observedCenter: node.observedCenter,
      expectedCenter: node.expectedCenter,
      z: node.z,
      likelihood: node.likelihood,
      edgeWeight: supportsWeight(evidence, node.index),
      share,
      contribution: normalizeZero((term?.contribution ?? 0) * share),
    };
  });
}

function explainTerms(hypothesis: Readonly<Hypothesis>): ContributionRow[] {
  const { posterior, evidence } = hypothesis;
  const rows: ContributionRow[] = [
    {
      term: "prior",
      modality: null,
      basis: null,
      status: null,
      score: null,
      qualityWeight: null,
      fusionWeight: null,
      contribution: posterior.logPrior,
      detail: posterior.priorSource === "supplied" ? "supplied log prior" : "rubric default log prior",
      supportingNodes: evidence.nodes.filter((n) => n.kind === "context").map((n) => n.key),
    },
  ];

  for (const contribution of posterior.contributions) {
    const score = hypothesis.modalityScores.find((s) => s.modality === contribution.modality);
    rows.push({
      term: "modality",
      modality: contribution.modality,
      basis: contribution.basis,
      status: score?.status ?? null,
      score: contribution.score,
      qualityWeight: contribution.qualityWeight,
      fusionWeight: contribution.fusionWeight,
      contribution: contribution.contribution,
      detail: score ? describeScore(score) : "no template; fused as S = 0",
      supportingNodes: evidence.nodes
        .filter(
          (n) => (n.kind === "feature" || n.kind === "spectrum") && n.modality === contribution.modality
        )
        .map((n) => n.key),
    });
  }

  rows.push({
    term: "parsimony",
    modality: null,
    basis: null,
    status: null,
    score: null,
    qualityWeight: null,
    fusionWeight: null,
    contribution: normalizeZero(-posterior.parsimonyPenalty),
    detail: `${hypothesis.components.length} component(s)`,
    supportingNodes: [],
  });

  return rows;
}

export function explain(hypothesis: Readonly<Hypothesis>): Explanation {
  return { features: explainFeatures(hypothesis), terms: explainTerms(hypothesis) };
}
