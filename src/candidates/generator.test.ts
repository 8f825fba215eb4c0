/**
 * Tests for the candidate catalog and candidate generation.
 *
 * Run: node --import tsx --test src/candidates/generator.test.ts
 */

import { strict as assert } from "node:assert";
import { describe, it } from "node:test";

import { makeCandidate } from "../testing/fixtures.js";
import { CandidateCatalog } from "./catalog.js";
import { generateCandidates, BLACKLIST_RULE_ID, WHITELIST_RULE_ID } from "./generator.js";
import type { CandidateRule } from "./rules.js";
import { DetectionGatesSchema, UserConstraintsSchema } from "./schema.js";

const catalog = CandidateCatalog.create([
  makeCandidate({ id: "sodium-chloride", requiredElements: ["Na", "Cl"], tags: ["salt"] }),
  makeCandidate({ id: "water", requiredElements: [], environment: { phases: ["liquid", "solution"] } }),
  makeCandidate({ id: "iron-oxide", requiredElements: ["Fe", "O"], forbiddenElements: ["Cl"] }),
  makeCandidate({
    id: "ethanol",
    requiredElements: ["C", "O"],
    environment: { temperatureRange: { min: 159, max: 351 }, solvents: ["water"] },
  }),
]);

const gates = (input: unknown) => DetectionGatesSchema.parse(input);
const constraints = (input: unknown) => UserConstraintsSchema.parse(input);
const ids = (result: ReturnType<typeof generateCandidates>) => result.candidates.map((c) => c.id);

// ═══════════════════════════════════════════════════════════════════════════
// CATALOG
// ═══════════════════════════════════════════════════════════════════════════

describe("CandidateCatalog", () => {
  it("sorts entries and indexes them", () => {
    assert.deepStrictEqual(
      catalog.entries.map((e) => e.id),
      ["ethanol", "iron-oxide", "sodium-chloride", "water"]
    );
    assert.deepStrictEqual(
      catalog.getByRequiredElement("O").map((e) => e.id),
      ["ethanol", "iron-oxide"]
    );
    assert.deepStrictEqual(
      catalog.getByTag("salt").map((e) => e.id),
      ["sodium-chloride"]
    );
    assert.equal(catalog.has("water"), true);
    assert.equal(catalog.getById("nope"), undefined);
  });

  it("rejects invalid entries and duplicates with warnings", () => {
    const withProblems = CandidateCatalog.create([
      makeCandidate({ id: "a" }),
      makeCandidate({ id: "b", requiredElements: ["iron"] }),
      makeCandidate({ id: "a", label: "second" }),
    ]);
    assert.deepStrictEqual(
      withProblems.entries.map((e) => [e.id, e.label]),
      [["a", "a"]]
    );
    assert.deepStrictEqual(
      withProblems.warnings.map((w) => w.code),
      ["catalog_duplicate", "catalog_entry_rejected"]
    );
    assert.equal(withProblems.getStats().rejectedEntries, 1);
  });
});

// ═══════════════════════════════════════════════════════════════════════════
// HARD RULES
// ═══════════════════════════════════════════════════════════════════════════

describe("generateCandidates rules", () => {
  it("passes every candidate when no gates were established", () => {
    const result = generateCandidates(catalog);
    assert.deepStrictEqual(ids(result), ["ethanol", "iron-oxide", "sodium-chloride", "water"]);
    assert.deepStrictEqual(result.exclusions, []);
  });

  it("excludes candidates whose required elements were not detected", () => {
    const result = generateCandidates(catalog, gates({ detectedElements: ["Na", "Cl", "O"] }));
    assert.deepStrictEqual(ids(result), ["sodium-chloride", "water"]);
    assert.deepStrictEqual(
      result.exclusions.map((e) => [e.candidateId, e.ruleId]),
      [
        ["ethanol", "required_elements_detected"],
        ["iron-oxide", "forbidden_elements_absent"],
        ["iron-oxide", "required_elements_detected"],
      ]
    );
    assert.equal(result.exclusions[0]?.message, "Required element(s) not detected: C");
  });

  it("fails a required element confirmed absent even without screening", () => {
    const result = generateCandidates(catalog, gates({ absentElements: ["Fe"] }));
    assert.deepStrictEqual(result.exclusions, [
      {
        candidateId: "iron-oxide",
        ruleId: "required_elements_detected",
        message: "Required element(s) confirmed absent: Fe",
      },
    ]);
  });

  it("applies environment rules only where both sides are known", () => {
    const result = generateCandidates(
      catalog,
      gates({ environment: { phase: "gas", temperature: 400, solvent: "hexane" } })
    );
    assert.deepStrictEqual(ids(result), ["iron-oxide", "sodium-chloride"]);
    assert.deepStrictEqual(
      result.exclusions.map((e) => [e.candidateId, e.ruleId]),
      [
        ["ethanol", "solvent_compatible"],
        ["ethanol", "temperature_in_range"],
        ["water", "phase_compatible"],
      ]
    );
  });

  it("accepts caller-supplied rules", () => {
    const noSalts: CandidateRule = {
      id: "no_salts",
      evaluate: (candidate) =>
        candidate.tags.includes("salt") ? { passed: false, message: "salts excluded" } : { passed: true },
    };
    const result = generateCandidates(catalog, undefined, undefined, [noSalts]);
    assert.deepStrictEqual(ids(result), ["ethanol", "iron-oxide", "water"]);
  });
});

// ═══════════════════════════════════════════════════════════════════════════
// USER CONSTRAINTS
// ═══════════════════════════════════════════════════════════════════════════

describe("generateCandidates user constraints", () => {
  const screened = gates({ detectedElements: ["Na", "Cl", "O"] });

  it("replaces the selection with the whitelist, overriding the rules", () => {
    const result = generateCandidates(catalog, screened, constraints({ whitelist: ["ethanol", "water"] }));
    assert.deepStrictEqual(ids(result), ["ethanol", "water"]);
    assert.deepStrictEqual(
      result.exclusions.map((e) => [e.candidateId, e.ruleId]),
      [
        ["iron-oxide", "forbidden_elements_absent"],
        ["iron-oxide", "required_elements_detected"],
        ["sodium-chloride", WHITELIST_RULE_ID],
      ]
    );
  });

  it("lets the blacklist win over the whitelist", () => {
    const result = generateCandidates(
      catalog,
      undefined,
      constraints({ whitelist: ["water", "ethanol"], blacklist: ["water"] })
    );
    assert.deepStrictEqual(ids(result), ["ethanol"]);
    assert.ok(result.exclusions.some((e) => e.candidateId === "water" && e.ruleId === BLACKLIST_RULE_ID));
  });

  it("warns about unknown ids", () => {
    const result = generateCandidates(catalog, undefined, constraints({ blacklist: ["unobtainium"] }));
    assert.equal(result.candidates.length, 4);
    assert.deepStrictEqual(
      result.warnings.map((w) => [w.code, w.candidateId]),
      [["constraint_unknown_candidate", "unobtainium"]]
    );
  });

  it("returns an empty set without throwing", () => {
    const result = generateCandidates(
      catalog,
      undefined,
      constraints({ blacklist: ["ethanol", "iron-oxide", "sodium-chloride", "water"] })
    );
    assert.deepStrictEqual(ids(result), []);
    assert.equal(result.exclusions.length, 4);
  });
});
