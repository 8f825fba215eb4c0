/**
 * Evidence graph builder.
 *
 * Append-only: nodes and edges can be added but never removed or edited.
 * build() seals the builder and returns a deep-frozen graph; any later
 * mutation attempt throws.
 */

import type { Modality } from "../config/rubric/enums.js";
import { compareModalities } from "../config/rubric/enums.js";
import type { PriorParameter } from "../fusion/priors.js";
import type { ModalityScore, ModalityStatus, QualityAssessment } from "../scoring/schema.js";
import { deepFreeze } from "../shared/deep-freeze.js";
import type {
  EdgeRelation,
  EvidenceEdge,
  EvidenceGraph,
  EvidenceNode,
  ModalityAnnotation,
} from "./schema.js";

type DistributiveOmit<T, K extends PropertyKey> = T extends unknown ? Omit<T, K> : never;

/** A node as supplied to the builder; the index is assigned on insertion. */
export type EvidenceNodeInput = DistributiveOmit<EvidenceNode, "index">;

export const HYPOTHESIS_NODE_INDEX = 0;

export class EvidenceGraphBuilder {
  private readonly nodes: EvidenceNode[] = [];
  private readonly keys = new Map<string, number>();
  private readonly edges: EvidenceEdge[] = [];
  private readonly annotations = new Map<Modality, ModalityAnnotation>();
  private sealed: Readonly<EvidenceGraph> | undefined;

  constructor(
    private readonly id: string,
    hypothesis: { candidateId: string; label: string }
  ) {
    this.addNode({
      kind: "hypothesis",
      key: `hypothesis:${hypothesis.candidateId}`,
      candidateId: hypothesis.candidateId,
      label: hypothesis.label,
    });
  }

  private assertOpen(): void {
    if (this.sealed !== undefined) {
      throw new Error(`Evidence graph "${this.id}" is sealed; it cannot be modified after build()`);
    }
  }

  /**
   * Append a node, or return the index of the node already stored under
   * the same key.
   */
  addNode(input: EvidenceNodeInput): number {
    this.assertOpen();
    const existing = this.keys.get(input.key);
    if (existing !== undefined) return existing;

    const index = this.nodes.length;
    const node: EvidenceNode = { ...input, index };
    this.nodes.push(node);
    this.keys.set(input.key, index);
    return index;
  }

  addEdge(from: number, to: number, relation: EdgeRelation, weight: number): void {
    this.assertOpen();
    for (const end of [from, to]) {
      if (!Number.isInteger(end) || end < 0 || end >= this.nodes.length) {
        throw new Error(`Evidence graph "${this.id}": edge endpoint ${end} is not a node index`);
      }
    }
    if (!Number.isFinite(weight)) {
      throw new Error(`Evidence graph "${this.id}": edge ${from} → ${to} has non-finite weight`);
    }
    this.edges.push({ from, to, relation, weight });
  }

  annotate(modality: Modality, status: ModalityStatus, messages: readonly string[]): void {
    this.assertOpen();
    this.annotations.set(modality, { modality, status, messages: [...messages] });
  }

  get isSealed(): boolean {
    return this.sealed !== undefined;
  }

  build(): Readonly<EvidenceGraph> {
    if (this.sealed === undefined) {
      this.sealed = deepFreeze({
        id: this.id,
        nodes: [...this.nodes],
        edges: [...this.edges],
        annotations: [...this.annotations.values()].sort((a, b) =>
          compareModalities(a.modality, b.modality)
        ),
      });
    }
    return this.sealed;
  }
}

export type ModalityQuality = Pick<QualityAssessment, "weight" | "status" | "messages">;

export interface HypothesisEvidenceInput {
  graphId: string;
  candidateId: string;
  label: string;
  /** Modality scores in canonical order. */
  scores: readonly ModalityScore[];
  quality: ReadonlyMap<Modality, ModalityQuality>;
  priorParameters: readonly PriorParameter[];
}

/**
 * A modality's annotation carries its score status, downgraded to
 * "degraded" when the quality assessment was, plus both sets of messages.
 */
function annotationFor(
  score: ModalityScore,
  quality: ModalityQuality | undefined
): { status: ModalityStatus; messages: string[] } {
  if (quality === undefined) return { status: score.status, messages: [...score.messages] };
  const status = score.status === "ok" && quality.status === "degraded" ? "degraded" : score.status;
  return { status, messages: [...score.messages, ...quality.messages] };
}

/**
 * Evidence graph id for one hypothesis.
 */
export function evidenceGraphId(sessionId: string, datasetId: string, candidateId: string): string {
  return `${sessionId}/${datasetId}/${candidateId}`;
}

/**
 * Build the evidence graph justifying one hypothesis' scores.
 */
export function buildHypothesisEvidence(input: HypothesisEvidenceInput): Readonly<EvidenceGraph> {
  const builder = new EvidenceGraphBuilder(input.graphId, {
    candidateId: input.candidateId,
    label: input.label,
  });
  const root = HYPOTHESIS_NODE_INDEX;

  for (const score of input.scores) {
    if (score.mode === "sparse") {
      const totalLikelihood = score.matches.reduce((acc, m) => acc + m.likelihood, 0);
      for (const match of score.matches) {
        const node = builder.addNode({
          kind: "feature",
          key: `feature:${match.featureId}`,
          featureId: match.featureId,
          modality: score.modality,
          spectrumId: match.spectrumId,
          templateSourceId: score.templateSourceId,
          observedCenter: match.observedCenter,
          expectedCenter: match.expectedCenter,
          z: match.z,
          likelihood: match.likelihood,
          ...(match.label !== undefined ? { label: match.label } : {}),
        });
        const share = totalLikelihood > 0 ? match.likelihood / totalLikelihood : 0;
        builder.addEdge(node, root, "supports", score.components.position * share);
      }
    } else if (score.spectrumId !== null) {
      const spectrum = builder.addNode({
        kind: "spectrum",
        key: `spectrum:${score.spectrumId}`,
        spectrumId: score.spectrumId,
        modality: score.modality,
        templateSourceId: score.templateSourceId,
        correlation: score.correlation,
      });
      builder.addEdge(spectrum, root, "supports", score.correlation);

      const shift = builder.addNode({
        kind: "parameter",
        key: `parameter:shift:${score.modality}`,
        name: "shift",
        modality: score.modality,
        value: score.shift,
      });
      builder.addEdge(shift, spectrum, "conditions", 1);

      const broadening = builder.addNode({
        kind: "parameter",
        key: `parameter:broadening:${score.modality}`,
        name: "broadening",
        modality: score.modality,
        value: score.broadening,
      });
      builder.addEdge(broadening, spectrum, "conditions", 1);
    }

    const quality = input.quality.get(score.modality);
    if (quality !== undefined) {
      const node = builder.addNode({
        kind: "parameter",
        key: `parameter:quality:${score.modality}`,
        name: "quality_weight",
        modality: score.modality,
        value: quality.weight,
      });
      builder.addEdge(node, root, "conditions", quality.weight);
    }

    const annotation = annotationFor(score, quality);
    builder.annotate(score.modality, annotation.status, annotation.messages);
  }

  const parameters = [...input.priorParameters].sort((a, b) =>
    a.name < b.name ? -1 : a.name > b.name ? 1 : 0
  );
  for (const parameter of parameters) {
    const node = builder.addNode({
      kind: "context",
      key: `context:${parameter.name}`,
      name: parameter.name,
      value: parameter.value,
      ...(parameter.unit !== undefined ? { unit: parameter.unit } : {}),
    });
    builder.addEdge(node, root, "conditions", parameter.weight ?? 1);
  }

  return builder.build();
}
