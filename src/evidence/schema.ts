/**
 * Evidence graph schema.
 *
 * ═══════════════════════════════════════════════════════════════════════════
 * ARENA LAYOUT
 * ═══════════════════════════════════════════════════════════════════════════
 *
 * Nodes live in one array and are addressed by their integer index; each
 * also carries a stable string key ("feature:f-12", "parameter:quality:raman")
 * so graphs from different runs can be compared. Edges reference nodes by
 * index only. There are no back-pointers: the graph is plain data and
 * round-trips through JSON unchanged.
 *
 * Node 0 is always the hypothesis node. Evidence flows into it:
 *   feature   ──supports──▶ hypothesis   (weight: share of s_pos)
 *   spectrum  ──supports──▶ hypothesis   (weight: correlation C)
 *   parameter ──conditions─▶ spectrum    (best Δ and γ)
 *   parameter ──conditions─▶ hypothesis  (quality weight q_k)
 *   context   ──conditions─▶ hypothesis  (prior parameters)
 */

import { z } from "zod";
import { Modality } from "../config/rubric/enums.js";
import { ModalityStatus } from "../scoring/schema.js";

export const EvidenceNodeKind = z.enum(["hypothesis", "feature", "spectrum", "parameter", "context"]);
export type EvidenceNodeKind = z.infer<typeof EvidenceNodeKind>;

export const EdgeRelation = z.enum(["supports", "conditions"]);
export type EdgeRelation = z.infer<typeof EdgeRelation>;

const nodeBase = {
  index: z.number().int().min(0),
  key: z.string().min(1),
};

export const HypothesisNodeSchema = z
  .object({
    ...nodeBase,
    kind: z.literal("hypothesis"),
    candidateId: z.string(),
    label: z.string(),
  })
  .strict();

export const FeatureNodeSchema = z
  .object({
    ...nodeBase,
    kind: z.literal("feature"),
    featureId: z.string(),
    modality: Modality,
    spectrumId: z.string(),
    templateSourceId: z.string(),
    observedCenter: z.number(),
    expectedCenter: z.number(),
    z: z.number(),
    likelihood: z.number().min(0).max(1),
    label: z.string().optional(),
  })
  .strict();

export const SpectrumNodeSchema = z
  .object({
    ...nodeBase,
    kind: z.literal("spectrum"),
    spectrumId: z.string(),
    modality: Modality,
    templateSourceId: z.string(),
    correlation: z.number().min(-1).max(1),
  })
  .strict();

export const ParameterNodeSchema = z
  .object({
    ...nodeBase,
    kind: z.literal("parameter"),
    name: z.string(),
    modality: Modality.nullable(),
    value: z.number(),
    unit: z.string().optional(),
  })
  .strict();

export const ContextNodeSchema = z
  .object({
    ...nodeBase,
    kind: z.literal("context"),
    name: z.string(),
    value: z.union([z.number(), z.string(), z.boolean()]),
    unit: z.string().optional(),
  })
  .strict();

export const EvidenceNodeSchema = z.discriminatedUnion("kind", [
  HypothesisNodeSchema,
  FeatureNodeSchema,
  SpectrumNodeSchema,
  ParameterNodeSchema,
  ContextNodeSchema,
]);

export type EvidenceNode = z.infer<typeof EvidenceNodeSchema>;
export type HypothesisNode = z.infer<typeof HypothesisNodeSchema>;
export type FeatureNode = z.infer<typeof FeatureNodeSchema>;
export type SpectrumNode = z.infer<typeof SpectrumNodeSchema>;
export type ParameterNode = z.infer<typeof ParameterNodeSchema>;
export type ContextNode = z.infer<typeof ContextNodeSchema>;

export const EvidenceEdgeSchema = z
  .object({
    from: z.number().int().min(0),
    to: z.number().int().min(0),
    relation: EdgeRelation,
    weight: z.number(),
  })
  .strict();

export type EvidenceEdge = z.infer<typeof EvidenceEdgeSchema>;

export const ModalityAnnotationSchema = z
  .object({
    modality: Modality,
    status: ModalityStatus,
    messages: z.array(z.string()),
  })
  .strict();

export type ModalityAnnotation = z.infer<typeof ModalityAnnotationSchema>;

export const EvidenceGraphSchema = z
  .object({
    /** "session/dataset/candidateId" */
    id: z.string().min(1),
    nodes: z.array(EvidenceNodeSchema),
    edges: z.array(EvidenceEdgeSchema),
    annotations: z.array(ModalityAnnotationSchema),
  })
  .strict()
  .superRefine((graph, ctx) => {
    graph.nodes.forEach((node, i) => {
      if (node.index !== i) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `Node at position ${i} carries index ${node.index}`,
          path: ["nodes", i, "index"],
        });
      }
    });
    graph.edges.forEach((edge, i) => {
      if (edge.from >= graph.nodes.length || edge.to >= graph.nodes.length) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `Edge ${edge.from} → ${edge.to} references a missing node`,
          path: ["edges", i],
        });
      }
    });
  });

export type EvidenceGraph = z.infer<typeof EvidenceGraphSchema>;
