#!/usr/bin/env node
/**
 * CLI command to run an identification over a run bundle.
 *
 * Usage:
 *   npx tsx src/cli/identify.ts --input samples/sample-run.json [options]
 *   npm run identify -- --input <path>
 *
 * Options:
 *   --input <path>     Run bundle JSON (required)
 *   --rubric <path>    Rubric JSON (default: the bundle's rubric, else the default rubric)
 *   --seed <value>     Override the bundle's seed
 *   --workers <n>      Scoring pool size (default: SPECTRAL_WORKERS or core count)
 *   --out <dir>        Write the identification document and provenance manifest here
 *   --json             Print the identification document as JSON
 *   --explain          Print term and per-feature contribution tables per hypothesis
 *   -h, --help         Show help
 *
 * Exit codes:
 *   0 - Run completed
 *   1 - Invalid configuration, rubric or bundle, or the run was cancelled
 */

import { resolve } from "node:path";
import { parseArgs } from "node:util";

import {
  config,
  validateConfig,
  ConfigError,
  DEFAULT_RUBRIC,
  loadRubricFromFile,
  RubricConfigError,
} from "../config/index.js";
import { explain } from "../evidence/explain.js";
import {
  identify,
  loadRunBundleFromFile,
  BundleValidationError,
  RunCancelledError,
  serializeIdentification,
  saveIdentification,
  getIdentificationFilename,
  createRunManifest,
  saveRunManifest,
  type ManifestInput,
  type RunSeed,
} from "../identification/index.js";
import { createLogger, initRunId, isLogLevel } from "../logging/index.js";
import { formatExplainTable, formatFeatureTable, formatRankingTable, formatWarnings } from "./format.js";

// ============================================================
// CLI Parsing
// ============================================================

function parseCliArgs() {
  const { values } = parseArgs({
    options: {
      input: { type: "string" },
      rubric: { type: "string" },
      seed: { type: "string" },
      workers: { type: "string" },
      out: { type: "string" },
      json: { type: "boolean", default: false },
      explain: { type: "boolean", default: false },
      help: { type: "boolean", short: "h", default: false },
    },
  });

  if (values.help || values.input === undefined) {
    console.log(`
Usage: identify --input <path> [options]

Options:
  --input <path>     Run bundle JSON (required)
  --rubric <path>    Rubric JSON (default: the bundle's rubric, else the default rubric)
  --seed <value>     Override the bundle's seed
  --workers <n>      Scoring pool size (default: SPECTRAL_WORKERS or core count)
  --out <dir>        Write the identification document and provenance manifest here
  --json             Print the identification document as JSON
  --explain          Print term and per-feature contribution tables per hypothesis
  -h, --help         Show this help message
`);
    process.exit(values.help ? 0 : 1);
  }

  return { ...values, input: values.input };
}

/**
 * Integer-looking seeds are numbers; anything else stays a string.
 */
function parseSeed(value: string): RunSeed {
  return /^-?\d+$/.test(value) && Number.isSafeInteger(Number(value)) ? Number(value) : value;
}

function parseWorkers(value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  const workers = Number(value);
  if (!Number.isInteger(workers) || workers < 1) {
    throw new ConfigError(`--workers must be a positive integer, got: ${value}`);
  }
  return workers;
}

// ============================================================
// Output Formatting
// ============================================================

const COLORS = {
  reset: "\x1b[0m",
  bold: "\x1b[1m",
  green: "\x1b[32m",
  red: "\x1b[31m",
  yellow: "\x1b[33m",
};

const useColors = process.stdout.isTTY && !process.env.NO_COLOR;

function c(color: keyof typeof COLORS, text: string): string {
  return useColors ? `${COLORS[color]}${text}${COLORS.reset}` : text;
}

function describeError(err: unknown): string {
  if (
    err instanceof RubricConfigError ||
    err instanceof BundleValidationError
  ) {
    return err.format();
  }
  if (err instanceof ConfigError || err instanceof RunCancelledError) {
    return `${err.name}: ${err.message}`;
  }
  return err instanceof Error ? (err.stack ?? err.message) : String(err);
}

// ============================================================
// Main
// ============================================================

async function main(): Promise<void> {
  const args = parseCliArgs();
  validateConfig();

  const startedAt = new Date();
  const runId = initRunId();
  const logger = createLogger({
    level: isLogLevel(config.logLevel) ? config.logLevel : "info",
    console: !args.json,
    file: config.logToFile,
    logDir: config.logDir,
    bindings: { app: config.appName },
  });

  const inputPath = resolve(args.input);
  const bundle = loadRunBundleFromFile(inputPath);
  const rubricPath = args.rubric !== undefined ? resolve(args.rubric) : undefined;
  const rubric = rubricPath ? loadRubricFromFile(rubricPath) : (bundle.rubric ?? DEFAULT_RUBRIC);
  const seed = args.seed !== undefined ? parseSeed(args.seed) : bundle.seed;
  const concurrency = parseWorkers(args.workers) ?? config.workerPoolSize;

  const controller = new AbortController();
  process.once("SIGINT", () => {
    logger.warn("Interrupted; cancelling run");
    controller.abort();
  });

  const result = await identify(
    bundle.observations,
    {
      catalog: bundle.catalog,
      templates: bundle.templates,
      gates: bundle.gates,
      constraints: bundle.constraints,
    },
    bundle.priors,
    rubric,
    seed,
    {
      concurrency,
      signal: controller.signal,
      logger,
      sessionId: bundle.sessionId,
      datasetId: bundle.datasetId,
    }
  );

  const serialized = serializeIdentification(result);

  if (args.json) {
    console.log(serialized);
  } else {
    const leader = result.hypotheses[0];
    console.log("");
    console.log(
      leader
        ? `${c("green", "✓")} ${c("bold", "Identification")}: ${leader.candidateId} leads (tier ${leader.tier.tier}, G = ${leader.posterior.score.toFixed(3)})`
        : `${c("yellow", "!")} ${c("bold", "Identification")}: ${result.reasonCode}`
    );
    console.log("");
    console.log(formatRankingTable(result));
    if (result.warnings.length > 0) {
      console.log("");
      console.log(`Warnings (${result.warnings.length}):`);
      console.log(formatWarnings(result.warnings));
    }
    if (args.explain) {
      for (const hypothesis of result.hypotheses) {
        console.log("");
        console.log(`#${hypothesis.rank} ${hypothesis.candidateId} (tier ${hypothesis.tier.tier})`);
        const explanation = explain(hypothesis);
        console.log(formatExplainTable(explanation.terms));
        console.log("");
        console.log(formatFeatureTable(explanation.features));
        for (const line of hypothesis.tier.rationale) {
          console.log(`  • ${line}`);
        }
        for (const followup of hypothesis.requiredFollowups) {
          console.log(`  → ${followup.rationale}`);
        }
      }
    }
    console.log("");
  }

  if (args.out !== undefined) {
    const outDir = resolve(args.out);
    const documentPath = saveIdentification(result, outDir, getIdentificationFilename(runId));
    const inputs: ManifestInput[] = [{ path: inputPath }];
    if (rubricPath) inputs.push({ path: rubricPath });
    const manifestPath = saveRunManifest(
      createRunManifest({
        runId,
        startedAt,
        finishedAt: new Date(),
        inputs,
        document: serialized,
        concurrency,
      }),
      outDir
    );
    logger.info("Run written", { document: documentPath, manifest: manifestPath });
  }
}

main().catch((err: unknown) => {
  console.error(`${c("red", "✗")} ${describeError(err)}`);
  process.exit(1);
});
