import { describe, it } from "node:test";
import { strict as assert } from "node:assert";
import { mkdtempSync, readFileSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { UserConstraintsSchema } from "../candidates/schema.js";
import { BundleValidationError, loadRunBundle, loadRunBundleFromFile, parseRunSection } from "./bundle.js";
import { canonicalJson, digestOf, sha256Hex } from "./digest.js";
import { RunManifestSchema, createRunManifest, getManifestFilename, saveRunManifest } from "./manifest.js";

const SHA256_ABC = "ba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad";

describe("loadRunBundle", () => {
  it("fills defaults for optional sections", () => {
    const bundle = loadRunBundle({ observations: { features: [] }, catalog: [], templates: [] });
    assert.equal(bundle.sessionId, "session");
    assert.equal(bundle.datasetId, "dataset");
    assert.equal(bundle.seed, 0);
    assert.deepEqual(bundle.observations.spectra, []);
    assert.deepEqual(bundle.priors, []);
    assert.deepEqual(bundle.gates, { absentElements: [], environment: {} });
    assert.deepEqual(bundle.constraints, { whitelist: [], blacklist: [] });
    assert.equal(bundle.rubric, undefined);
    assert.ok(Object.isFrozen(bundle));
  });

  it("keeps entries unvalidated", () => {
    const bundle = loadRunBundle({
      observations: { features: [{ id: "anything" }] },
      catalog: [42],
      templates: ["x"],
    });
    assert.deepEqual(bundle.observations.features, [{ id: "anything" }]);
    assert.deepEqual(bundle.catalog, [42]);
  });

  it("reports shell errors with paths", () => {
    assert.throws(
      () => loadRunBundle({ observations: { features: [] }, catalog: [], templates: [], extra: true }),
      (err: unknown) => {
        assert.ok(err instanceof BundleValidationError);
        assert.equal(err.issues[0]?.code, "unrecognized_keys");
        return true;
      }
    );
    assert.throws(
      () => loadRunBundle({ observations: { features: [] }, catalog: [], templates: [], seed: 0.5 }),
      (err: unknown) => {
        assert.ok(err instanceof BundleValidationError);
        assert.deepEqual(err.issues[0]?.path, ["seed"]);
        assert.match(err.format(), /^Run bundle validation failed:\n {2}- seed: /);
        return true;
      }
    );
  });

  it("reads bundles from disk", () => {
    const dir = mkdtempSync(join(tmpdir(), "bundle-"));
    try {
      const good = join(dir, "run.json");
      writeFileSync(
        good,
        JSON.stringify({ seed: "abc", observations: { features: [] }, catalog: [], templates: [] }),
        "utf-8"
      );
      assert.equal(loadRunBundleFromFile(good).seed, "abc");

      const bad = join(dir, "bad.json");
      writeFileSync(bad, "{", "utf-8");
      assert.throws(
        () => loadRunBundleFromFile(bad),
        (err: unknown) => {
          assert.ok(err instanceof BundleValidationError);
          assert.equal(err.issues[0]?.code, "unreadable");
          return true;
        }
      );
    } finally {
      rmSync(dir, { recursive: true, force: true });
    }
  });
});

describe("parseRunSection", () => {
  it("returns parsed values", () => {
    assert.deepEqual(parseRunSection("constraints", UserConstraintsSchema, { blacklist: ["a"] }), {
      whitelist: [],
      blacklist: ["a"],
    });
  });

  it("roots issue paths at the section name", () => {
    assert.throws(
      () => parseRunSection("constraints", UserConstraintsSchema, { whitelist: [""] }),
      (err: unknown) => {
        assert.ok(err instanceof BundleValidationError);
        assert.deepEqual(err.issues[0]?.path, ["constraints", "whitelist", 0]);
        assert.match(err.message, /^Invalid constraints: 1 validation error\(s\)/);
        return true;
      }
    );
  });
});

describe("digests", () => {
  it("hashes canonical JSON independent of key order", () => {
    assert.equal(canonicalJson({ b: 1, a: { d: [2, { f: 1, e: 0 }], c: null } }), '{"a":{"c":null,"d":[2,{"e":0,"f":1}]},"b":1}');
    assert.equal(digestOf({ x: 1, y: 2 }), digestOf({ y: 2, x: 1 }));
    assert.equal(sha256Hex("abc"), SHA256_ABC);
  });
});

describe("run manifest", () => {
  it("digests inputs and links the document", () => {
    const manifest = createRunManifest({
      runId: "run-1",
      startedAt: new Date("2026-01-01T00:00:00.000Z"),
      finishedAt: new Date("2026-01-01T00:00:05.000Z"),
      inputs: [{ name: "bundle.json", content: "abc" }],
      document: "abc",
      concurrency: 4,
      captureGit: false,
      captureHostname: false,
    });
    assert.deepEqual(manifest, {
      manifestVersion: "1.0.0",
      runId: "run-1",
      startedAt: "2026-01-01T00:00:00.000Z",
      finishedAt: "2026-01-01T00:00:05.000Z",
      inputs: [{ name: "bundle.json", sha256: SHA256_ABC, bytes: 3 }],
      concurrency: 4,
      documentDigest: SHA256_ABC,
    });
    assert.ok(RunManifestSchema.safeParse(manifest).success);
  });

  it("digests files by path and saves beside the document", () => {
    const dir = mkdtempSync(join(tmpdir(), "manifest-"));
    try {
      const input = join(dir, "rubric.json");
      writeFileSync(input, "abc", "utf-8");
      const manifest = createRunManifest({ runId: "run-2", inputs: [{ path: input }], captureGit: false });
      assert.deepEqual(manifest.inputs, [{ name: "rubric.json", sha256: SHA256_ABC, bytes: 3 }]);
      assert.equal(typeof manifest.hostname, "string");

      const saved = saveRunManifest(manifest, join(dir, "out"));
      assert.equal(saved, join(dir, "out", getManifestFilename("run-2")));
      assert.deepEqual(JSON.parse(readFileSync(saved, "utf-8")), manifest);
    } finally {
      rmSync(dir, { recursive: true, force: true });
    }
  });
});
