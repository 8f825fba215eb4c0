/**
 * Tests for confidence tiers and follow-up recommendations.
 *
 * Run: node --import tsx --test src/fusion/tiers.test.ts
 */

import { strict as assert } from "node:assert";
import { describe, it } from "node:test";

import { DEFAULT_RUBRIC } from "../config/rubric/defaults.js";
import { makeDenseScore, makeSparseScore } from "../testing/fixtures.js";
import { recommendFollowup } from "./followups.js";
import { assignTier, type TierModalityInput } from "./tiers.js";

const thresholds = DEFAULT_RUBRIC.tiers;

const observed = (modality: TierModalityInput["modality"], score: number, matched = 3): TierModalityInput => ({
  modality,
  score,
  matched,
  observed: true,
});

// ═══════════════════════════════════════════════════════════════════════════
// TIERS
// ═══════════════════════════════════════════════════════════════════════════

describe("assignTier", () => {
  it("assigns A with a clear gap and two corroborating modalities", () => {
    const result = assignTier(
      { score: 0.9, rivalScore: 0.7, modalities: [observed("infrared", 0.7), observed("raman", 0.6)] },
      thresholds
    );
    assert.equal(result.tier, "A");
    assert.deepStrictEqual(result.corroboratingModalities, ["infrared", "raman"]);
    assert.equal(result.singleModality.applied, false);
    assert.deepStrictEqual(result.rationale, [
      "G 0.900 ≥ θ_A 0.850 and Δ 0.200 ≥ δ_A 0.150",
      "2 modalities with S ≥ s_min 0.550: infrared, raman",
    ]);
  });

  it("withholds A from a single observed modality below the diagnostic count", () => {
    const result = assignTier(
      {
        score: 0.9,
        rivalScore: 0.7,
        modalities: [
          observed("infrared", 0.9, 3),
          { modality: "raman", score: 0, matched: 0, observed: false },
        ],
      },
      thresholds
    );
    assert.equal(result.tier, "B");
    assert.deepStrictEqual(result.singleModality, {
      applied: true,
      modality: "infrared",
      matched: 3,
      required: 5,
      satisfied: false,
    });
    assert.match(result.rationale[0] ?? "", /^tier A withheld: single observed modality infrared has 3 of 5/);
  });

  it("grants A to a single modality with enough matched features", () => {
    const result = assignTier(
      { score: 0.9, rivalScore: 0.7, modalities: [observed("infrared", 0.9, 6)] },
      thresholds
    );
    assert.equal(result.tier, "A");
    assert.equal(result.singleModality.satisfied, true);
  });

  it("never grants A to a lone dense modality", () => {
    const result = assignTier(
      { score: 0.95, rivalScore: 0.1, modalities: [observed("uv_vis", 0.99, 0)] },
      thresholds
    );
    assert.equal(result.tier, "B");
  });

  it("assigns B to a strong, uncontradicted modality despite a small gap", () => {
    const result = assignTier(
      { score: 0.7, rivalScore: 0.68, modalities: [observed("infrared", 0.85), observed("raman", 0.3)] },
      thresholds
    );
    assert.equal(result.tier, "B");
    assert.match(result.rationale[0] ?? "", /infrared S 0\.850 ≥ s_strong 0\.800 without contradiction$/);
  });

  it("falls to C when another observed modality contradicts", () => {
    const result = assignTier(
      { score: 0.7, rivalScore: 0.68, modalities: [observed("infrared", 0.85), observed("raman", 0.2)] },
      thresholds
    );
    assert.equal(result.tier, "C");
  });

  it("ignores unobserved modalities when looking for contradictions", () => {
    const result = assignTier(
      {
        score: 0.7,
        rivalScore: 0.68,
        modalities: [
          observed("infrared", 0.85),
          observed("raman", 0.5),
          { modality: "uv_vis", score: 0, matched: 0, observed: false },
        ],
      },
      thresholds
    );
    assert.equal(result.tier, "B");
  });

  it("assigns C below θ_B", () => {
    const result = assignTier({ score: 0.5, modalities: [observed("infrared", 0.5)] }, thresholds);
    assert.equal(result.tier, "C");
    assert.deepStrictEqual(result.rationale, ["G 0.500 < θ_B 0.600"]);
  });

  it("measures the gap against 0 without a rival", () => {
    const result = assignTier({ score: 0.62, modalities: [observed("infrared", 0.6)] }, thresholds);
    assert.equal(result.delta, 0.62);
    assert.equal(result.tier, "B");
  });
});

// ═══════════════════════════════════════════════════════════════════════════
// FOLLOW-UPS
// ═══════════════════════════════════════════════════════════════════════════

describe("recommendFollowup", () => {
  const configured = ["infrared", "raman", "uv_vis"] as const;

  it("picks the worst-explained expected line across the hypothesis and its rival", () => {
    const subject = {
      candidateId: "water",
      rank: 2,
      scores: [
        makeSparseScore("infrared", 0.4, {
          unmatched: [{ expectedIndex: 0, expectedCenter: 1700, nearestFeatureId: "f1", nearestLikelihood: 0.4 }],
        }),
      ],
    };
    const rival = {
      candidateId: "ethanol",
      rank: 1,
      scores: [
        makeSparseScore("raman", 0.5, {
          unmatched: [
            { expectedIndex: 2, expectedCenter: 1200, label: "C-O", nearestFeatureId: "r1", nearestLikelihood: 0.1 },
          ],
        }),
      ],
    };
    assert.deepStrictEqual(recommendFollowup(subject, rival, configured), {
      kind: "expected_feature",
      candidateId: "ethanol",
      modality: "raman",
      templateSourceId: "raman-lib@1",
      expectedCenter: 1200,
      label: "C-O",
      nearestLikelihood: 0.1,
      rationale: 'Re-measure raman around the expected C-O at 1200 of "ethanol" (nearest-feature likelihood 0.100)',
    });
  });

  it("breaks likelihood ties by rank, then modality, then center", () => {
    const line = (expectedCenter: number) => ({
      expectedIndex: 0,
      expectedCenter,
      nearestFeatureId: null,
      nearestLikelihood: 0,
    });
    const subject = {
      candidateId: "a",
      rank: 1,
      scores: [
        makeSparseScore("raman", 0.3, { unmatched: [line(900)] }),
        makeSparseScore("infrared", 0.3, { unmatched: [line(1500), line(1400)] }),
      ],
    };
    const rival = { candidateId: "b", rank: 2, scores: [makeSparseScore("infrared", 0.3, { unmatched: [line(100)] })] };
    const followup = recommendFollowup(subject, rival, configured);
    assert.equal(followup?.kind, "expected_feature");
    assert.equal(followup?.candidateId, "a");
    assert.equal(followup?.modality, "infrared");
    assert.ok(followup?.kind === "expected_feature" && followup.expectedCenter === 1400);
  });

  it("asks for an unobserved modality when every line was matched", () => {
    const subject = {
      candidateId: "water",
      rank: 1,
      scores: [makeSparseScore("infrared", 0.5), makeSparseScore("raman", 0, { status: "no_observations" })],
    };
    assert.deepStrictEqual(recommendFollowup(subject, undefined, configured), {
      kind: "acquire_modality",
      candidateId: "water",
      modality: "raman",
      rationale: 'Acquire raman data for "water"; it has no usable observations yet',
    });
  });

  it("asks for a configured modality the hypothesis was not scored in", () => {
    const subject = {
      candidateId: "water",
      rank: 1,
      scores: [makeSparseScore("infrared", 0.5), makeSparseScore("raman", 0.4)],
    };
    assert.equal(recommendFollowup(subject, undefined, configured)?.modality, "uv_vis");
  });

  it("falls back to repeating the weakest modality", () => {
    const subject = {
      candidateId: "water",
      rank: 1,
      scores: [makeSparseScore("infrared", 0.5), makeSparseScore("raman", 0.4), makeDenseScore("uv_vis", 0.45)],
    };
    const followup = recommendFollowup(subject, undefined, configured);
    assert.equal(followup?.modality, "raman");
    assert.equal(
      followup?.rationale,
      'Repeat the raman measurement for "water"; it is the weakest modality (S 0.400)'
    );
  });
});
