/**
 * Tests for evidence graph construction.
 *
 * Run: node --import tsx --test src/evidence/builder.test.ts
 */

import { strict as assert } from "node:assert";
import { describe, it } from "node:test";

import type { Modality } from "../config/rubric/enums.js";
import { makeDenseScore, makeMatch, makeSparseScore } from "../testing/fixtures.js";
import { buildHypothesisEvidence, evidenceGraphId, EvidenceGraphBuilder, type ModalityQuality } from "./builder.js";
import { EvidenceGraphSchema } from "./schema.js";

// ═══════════════════════════════════════════════════════════════════════════
// BUILDER
// ═══════════════════════════════════════════════════════════════════════════

describe("EvidenceGraphBuilder", () => {
  it("starts with the hypothesis at index 0", () => {
    const graph = new EvidenceGraphBuilder("s/d/water", { candidateId: "water", label: "Water" }).build();
    assert.deepStrictEqual(graph.nodes, [
      { kind: "hypothesis", key: "hypothesis:water", candidateId: "water", label: "Water", index: 0 },
    ]);
  });

  it("deduplicates nodes by key", () => {
    const builder = new EvidenceGraphBuilder("g", { candidateId: "water", label: "Water" });
    const node = { kind: "context" as const, key: "context:pH", name: "pH", value: 7 };
    assert.equal(builder.addNode(node), 1);
    assert.equal(builder.addNode({ ...node, value: 8 }), 1);
    assert.equal(builder.build().nodes.length, 2);
  });

  it("rejects edges to missing nodes and non-finite weights", () => {
    const builder = new EvidenceGraphBuilder("g", { candidateId: "water", label: "Water" });
    assert.throws(() => builder.addEdge(1, 0, "supports", 1), /edge endpoint 1 is not a node index/);
    const node = builder.addNode({ kind: "context", key: "context:pH", name: "pH", value: 7 });
    assert.throws(() => builder.addEdge(node, 0, "supports", Number.NaN), /non-finite weight/);
  });

  it("seals on build", () => {
    const builder = new EvidenceGraphBuilder("g", { candidateId: "water", label: "Water" });
    const graph = builder.build();
    assert.equal(builder.isSealed, true);
    assert.equal(builder.build(), graph);
    assert.equal(Object.isFrozen(graph.nodes), true);
    assert.throws(() => builder.addNode({ kind: "context", key: "context:x", name: "x", value: 1 }), /sealed/);
    assert.throws(() => builder.annotate("raman", "ok", []), /sealed/);
  });
});

// ═══════════════════════════════════════════════════════════════════════════
// HYPOTHESIS EVIDENCE
// ═══════════════════════════════════════════════════════════════════════════

describe("buildHypothesisEvidence", () => {
  const secondLikelihood = Math.exp(-0.5);
  const graph = buildHypothesisEvidence({
    graphId: evidenceGraphId("session-1", "dataset-1", "water"),
    candidateId: "water",
    label: "Water",
    scores: [
      makeSparseScore("infrared", 0.8, {
        matches: [makeMatch("f1", 0, 1000, 1000, 5), makeMatch("f2", 1, 1500, 1505, 5)],
      }),
      makeDenseScore("uv_vis", 0.9, { status: "degraded", correlation: 0.9 }),
    ],
    quality: new Map<Modality, ModalityQuality>([
      ["infrared", { weight: 0.9, status: "ok", messages: [] }],
      ["uv_vis", { weight: 0.7, status: "ok", messages: [] }],
    ]),
    priorParameters: [
      { name: "temperature", value: 298, unit: "K" },
      { name: "pressure", value: 1, weight: 0.5 },
    ],
  });

  it("names the graph after session, dataset and candidate", () => {
    assert.equal(graph.id, "session-1/dataset-1/water");
  });

  it("lays out nodes in scoring order, then context by name", () => {
    assert.deepStrictEqual(
      graph.nodes.map((n) => n.key),
      [
        "hypothesis:water",
        "feature:f1",
        "feature:f2",
        "parameter:quality:infrared",
        "spectrum:uv_vis-1",
        "parameter:shift:uv_vis",
        "parameter:broadening:uv_vis",
        "parameter:quality:uv_vis",
        "context:pressure",
        "context:temperature",
      ]
    );
  });

  it("weights edges by the evidence they carry", () => {
    const total = 1 + secondLikelihood;
    const edges = graph.edges.map((e) => [e.from, e.to, e.relation]);
    assert.deepStrictEqual(edges, [
      [1, 0, "supports"],
      [2, 0, "supports"],
      [3, 0, "conditions"],
      [4, 0, "supports"],
      [5, 4, "conditions"],
      [6, 4, "conditions"],
      [7, 0, "conditions"],
      [8, 0, "conditions"],
      [9, 0, "conditions"],
    ]);
    const weights = graph.edges.map((e) => e.weight);
    assert.ok(Math.abs((weights[0] ?? 0) - 0.8 / total) < 1e-12);
    assert.ok(Math.abs((weights[1] ?? 0) - (0.8 * secondLikelihood) / total) < 1e-12);
    assert.deepStrictEqual(weights.slice(2), [0.9, 0.9, 1, 1, 0.7, 0.5, 1]);
  });

  it("annotates each modality with its status", () => {
    assert.deepStrictEqual(graph.annotations, [
      { modality: "infrared", status: "ok", messages: [] },
      { modality: "uv_vis", status: "degraded", messages: [] },
    ]);
  });

  it("marks a modality degraded when its quality assessment was", () => {
    const message = 'Spectrum "ir-1" (infrared) reports non-positive SNR 0; quality weight set to the floor 0.3';
    const degraded = buildHypothesisEvidence({
      graphId: "g",
      candidateId: "water",
      label: "Water",
      scores: [makeSparseScore("infrared", 0.8, { matches: [makeMatch("f1", 0, 1000, 1000, 5)] })],
      quality: new Map<Modality, ModalityQuality>([
        ["infrared", { weight: 0.3, status: "degraded", messages: [message] }],
      ]),
      priorParameters: [],
    });
    assert.deepStrictEqual(degraded.annotations, [{ modality: "infrared", status: "degraded", messages: [message] }]);
    const quality = degraded.nodes.find((n) => n.key === "parameter:quality:infrared");
    assert.ok(quality && quality.kind === "parameter");
    assert.equal(quality.value, 0.3);
  });

  it("passes its own schema", () => {
    assert.doesNotThrow(() => EvidenceGraphSchema.parse(graph));
  });

  it("is frozen", () => {
    assert.equal(Object.isFrozen(graph), true);
    assert.equal(Object.isFrozen(graph.edges[0]), true);
  });
});
