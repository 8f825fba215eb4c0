/**
 * Evidence module: justification graphs and their introspection.
 */

export {
  EvidenceNodeKind,
  EdgeRelation,
  EvidenceNodeSchema,
  EvidenceEdgeSchema,
  ModalityAnnotationSchema,
  EvidenceGraphSchema,
  type EvidenceNode,
  type HypothesisNode,
  type FeatureNode,
  type SpectrumNode,
  type ParameterNode,
  type ContextNode,
  type EvidenceEdge,
  type ModalityAnnotation,
  type EvidenceGraph,
} from "./schema.js";

export {
  EvidenceGraphBuilder,
  buildHypothesisEvidence,
  evidenceGraphId,
  HYPOTHESIS_NODE_INDEX,
  type EvidenceNodeInput,
  type HypothesisEvidenceInput,
  type ModalityQuality,
} from "./builder.js";

export { explain, type ContributionRow, type Explanation, type FeatureContributionRow } from "./explain.js";
