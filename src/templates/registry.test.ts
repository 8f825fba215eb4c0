/**
 * Tests for the template registry.
 *
 * Run: node --import tsx --test src/templates/registry.test.ts
 */

import { strict as assert } from "node:assert";
import { describe, it } from "node:test";

import { DEFAULT_RUBRIC } from "../config/rubric/defaults.js";
import { makeDenseTemplate, makeSparseTemplate } from "../testing/fixtures.js";
import { TemplateRegistry } from "./registry.js";

const line = (center: number) => ({ center, sigma: 2 });

// ═══════════════════════════════════════════════════════════════════════════
// INDEXING
// ═══════════════════════════════════════════════════════════════════════════

describe("TemplateRegistry", () => {
  it("indexes by candidate and modality in canonical order", () => {
    const registry = TemplateRegistry.create(
      [
        makeSparseTemplate("water", [line(1640)], { modality: "raman", sourceId: "raman-lib@2" }),
        makeDenseTemplate("water", [200, 210, 220], [0, 1, 0]),
        makeSparseTemplate("water", [line(1640), line(3400)]),
        makeSparseTemplate("ethanol", [line(1050)]),
      ],
      DEFAULT_RUBRIC
    );

    assert.deepStrictEqual(registry.warnings, []);
    assert.deepStrictEqual(
      registry.forCandidate("water").map((t) => t.modality),
      ["infrared", "raman", "uv_vis"]
    );
    assert.equal(registry.get("ethanol", "infrared")?.sourceId, "ref-ethanol@1");
    assert.equal(registry.get("ethanol", "raman"), undefined);
  });

  it("lists sorted, de-duplicated source ids", () => {
    const registry = TemplateRegistry.create(
      [
        makeSparseTemplate("b", [line(1000)], { sourceId: "lib@2" }),
        makeSparseTemplate("a", [line(1000)], { sourceId: "lib@2" }),
        makeSparseTemplate("a", [line(500)], { modality: "raman", sourceId: "alpha@1" }),
      ],
      DEFAULT_RUBRIC
    );
    assert.deepStrictEqual(registry.sourceIds(), ["alpha@1", "lib@2"]);
    assert.deepStrictEqual(registry.sourceIds(new Set(["b"])), ["lib@2"]);
  });

  it("keeps the smallest source id of duplicates whatever the input order", () => {
    const first = makeSparseTemplate("water", [line(1640)], { sourceId: "zeta@1" });
    const second = makeSparseTemplate("water", [line(1650)], { sourceId: "alpha@3" });

    for (const input of [[first, second], [second, first]]) {
      const registry = TemplateRegistry.create(input, DEFAULT_RUBRIC);
      assert.equal(registry.get("water", "infrared")?.sourceId, "alpha@3");
      assert.deepStrictEqual(
        registry.warnings.map((w) => w.code),
        ["template_duplicate"]
      );
    }
  });
});

// ═══════════════════════════════════════════════════════════════════════════
// SET-ASIDE TEMPLATES
// ═══════════════════════════════════════════════════════════════════════════

describe("TemplateRegistry set-aside templates", () => {
  const infraredOnly = { modalities: { infrared: DEFAULT_RUBRIC.modalities.infrared } };

  it("rejects a malformed source id", () => {
    const registry = TemplateRegistry.create(
      [makeSparseTemplate("water", [line(1640)], { sourceId: "no-version" })],
      DEFAULT_RUBRIC
    );
    assert.equal(registry.templates.length, 0);
    assert.equal(registry.warnings[0]?.code, "template_rejected");
    assert.match(registry.warnings[0]?.message ?? "", /^Template at index 0 rejected: sourceId: /);
  });

  it("sets aside templates for unscored modalities", () => {
    const registry = TemplateRegistry.create(
      [makeSparseTemplate("water", [line(1640)], { modality: "raman" })],
      infraredOnly
    );
    assert.equal(registry.templates.length, 0);
    assert.deepStrictEqual(
      registry.warnings.map((w) => [w.code, w.candidateId, w.modality]),
      [["template_unscored_modality", "water", "raman"]]
    );
  });

  it("sets aside templates whose kind disagrees with the mode", () => {
    const registry = TemplateRegistry.create(
      [makeDenseTemplate("water", [1000, 1010], [0, 1], { modality: "infrared" })],
      DEFAULT_RUBRIC
    );
    assert.equal(registry.templates.length, 0);
    assert.equal(registry.warnings[0]?.code, "template_mode_mismatch");
  });

  it("sets aside templates for candidates outside the catalog", () => {
    const registry = TemplateRegistry.create(
      [makeSparseTemplate("water", [line(1640)]), makeSparseTemplate("ghost", [line(900)])],
      DEFAULT_RUBRIC,
      { knownCandidateIds: new Set(["water"]) }
    );
    assert.deepStrictEqual(
      registry.templates.map((t) => t.candidateId),
      ["water"]
    );
    assert.equal(registry.warnings[0]?.code, "template_unknown_candidate");
    assert.equal(registry.warnings[0]?.candidateId, "ghost");
  });
});
