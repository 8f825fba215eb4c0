/**
 * Tests for the feature store.
 *
 * Run: node --import tsx --test src/features/store.test.ts
 */

import { strict as assert } from "node:assert";
import { describe, it } from "node:test";

import { DEFAULT_RUBRIC } from "../config/rubric/defaults.js";
import { makeFeature, makeSpectrum } from "../testing/fixtures.js";
import { FeatureStore } from "./store.js";

const spectra = [
  makeSpectrum({ id: "ir-1", modality: "infrared" }),
  makeSpectrum({ id: "ram-1", modality: "raman" }),
];

// ═══════════════════════════════════════════════════════════════════════════
// INDEXING
// ═══════════════════════════════════════════════════════════════════════════

describe("FeatureStore indexing", () => {
  const store = FeatureStore.create(
    {
      features: [
        makeFeature({ id: "f-3", center: 1700 }),
        makeFeature({ id: "f-1", center: 1000 }),
        makeFeature({ id: "r-1", center: 520, modality: "raman", spectrumId: "ram-1" }),
        makeFeature({ id: "f-2", center: 1500 }),
      ],
      spectra,
    },
    DEFAULT_RUBRIC
  );

  it("sorts features by id whatever the input order", () => {
    assert.deepStrictEqual(
      store.features.map((f) => f.id),
      ["f-1", "f-2", "f-3", "r-1"]
    );
  });

  it("indexes by modality", () => {
    assert.deepStrictEqual(
      store.getByModality("infrared").map((f) => f.id),
      ["f-1", "f-2", "f-3"]
    );
    assert.deepStrictEqual(store.getByModality("uv_vis"), []);
    assert.deepStrictEqual(store.observedModalities, ["infrared", "raman"]);
  });

  it("applies schema defaults", () => {
    const feature = store.getById("f-1");
    assert.ok(feature);
    assert.equal(feature.shape, "unknown");
    assert.deepStrictEqual(feature.flags, []);
    assert.equal(store.getSpectrum("ir-1")?.intensityCalibration, "reliable");
  });

  it("freezes what it stores", () => {
    const feature = store.getById("f-2");
    assert.ok(feature);
    assert.equal(Object.isFrozen(feature), true);
    assert.equal(Object.isFrozen(feature.intensity), true);
    assert.equal(Object.isFrozen(store.features), true);
  });

  it("has no warnings for clean input", () => {
    assert.deepStrictEqual(store.warnings, []);
  });
});

// ═══════════════════════════════════════════════════════════════════════════
// REJECTION
// ═══════════════════════════════════════════════════════════════════════════

describe("FeatureStore rejection", () => {
  const store = FeatureStore.create(
    {
      features: [
        makeFeature({ id: "ok", center: 1000 }),
        makeFeature({ id: "no-unit", center: 1100, intensity: { value: 1, unit: "", uncertainty: 0 } }),
        makeFeature({ id: "hot", center: 1200, flags: ["saturated"] }),
        makeFeature({ id: "soft", center: 1250, flags: ["low_snr"] }),
        makeFeature({ id: "ok", center: 1300 }),
        makeFeature({ id: "orphan", center: 1400, spectrumId: "ir-9" }),
      ],
      spectra: [
        ...spectra,
        { id: "bad", modality: "uv_vis", samples: { x: [1, 2, 3], y: [1, 2] } },
      ],
    },
    DEFAULT_RUBRIC
  );

  it("rejects one feature without rejecting its neighbours", () => {
    assert.deepStrictEqual(
      store.features.map((f) => f.id),
      ["ok", "orphan", "soft"]
    );
  });

  it("keeps the first of duplicate ids", () => {
    assert.equal(store.getById("ok")?.center, 1000);
  });

  it("reports each problem as a warning naming the entry", () => {
    assert.deepStrictEqual(
      store.warnings.map((w) => [w.code, w.featureId ?? w.spectrumId]),
      [
        ["feature_duplicate", "ok"],
        ["feature_excluded_flag", "hot"],
        ["feature_rejected", "no-unit"],
        ["feature_unknown_spectrum", "orphan"],
        ["spectrum_rejected", "bad"],
      ]
    );
  });

  it("names the offending field", () => {
    const rejected = store.warnings.find((w) => w.code === "feature_rejected");
    assert.ok(rejected);
    assert.equal(rejected.modality, "infrared");
    assert.match(rejected.message, /intensity\.unit \(Intensity unit tag is required\)/);
  });

  it("counts rejections in its stats", () => {
    assert.deepStrictEqual(store.getStats(), {
      acceptedFeatures: 3,
      rejectedFeatures: 3,
      spectra: 2,
      byModality: { infrared: 3 },
    });
  });
});
