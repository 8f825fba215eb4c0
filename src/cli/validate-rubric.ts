#!/usr/bin/env node
/**
 * CLI command to validate a rubric and, optionally, a run bundle.
 *
 * Validates:
 * - Rubric (schema, weight sums, mode sections)
 * - Run bundle shell (sections and their shapes)
 * - Observations, catalog, templates and priors entry by entry
 *
 * Entry-level problems are reported as warnings, the same ones a run would
 * record; they only fail validation under --strict.
 *
 * Usage:
 *   npx tsx src/cli/validate-rubric.ts [options]
 *   npm run validate-rubric -- --bundle samples/sample-run.json
 *
 * Options:
 *   --rubric <path>   Rubric JSON (default: the bundle's rubric, else the default rubric)
 *   --bundle <path>   Run bundle JSON to check against the rubric
 *   --json            Output the report as JSON (for CI parsing)
 *   --strict          Treat entry-level warnings as failures
 *   -h, --help        Show help
 *
 * Exit codes:
 *   0 - All validations passed
 *   1 - One or more validations failed
 */

import { existsSync } from "node:fs";
import { resolve } from "node:path";
import { parseArgs } from "node:util";

import { CandidateCatalog } from "../candidates/index.js";
import {
  DEFAULT_RUBRIC,
  MODALITY_ORDER,
  loadRubric,
  loadRubricFromFile,
  RubricConfigError,
  type Rubric,
} from "../config/index.js";
import { FeatureStore } from "../features/index.js";
import { resolvePriors } from "../fusion/index.js";
import {
  BundleValidationError,
  loadRunBundleFromFile,
  type RunBundle,
} from "../identification/index.js";
import type { RunWarning } from "../shared/warnings.js";
import { TemplateRegistry } from "../templates/index.js";

// ============================================================
// Types
// ============================================================

interface StepResult {
  success: boolean;
  component: string;
  message: string;
  details?: string[];
}

interface ValidationReport {
  timestamp: string;
  steps: StepResult[];
  summary: {
    stepsPassed: number;
    stepsFailed: number;
    stepsTotal: number;
    warnings: number;
  };
}

// ============================================================
// CLI Parsing
// ============================================================

function parseCliArgs() {
  const { values } = parseArgs({
    options: {
      rubric: { type: "string" },
      bundle: { type: "string" },
      json: { type: "boolean", default: false },
      strict: { type: "boolean", default: false },
      help: { type: "boolean", short: "h", default: false },
    },
  });

  if (values.help) {
    console.log(`
Usage: validate-rubric [options]

Options:
  --rubric <path>   Rubric JSON (default: the bundle's rubric, else the default rubric)
  --bundle <path>   Run bundle JSON to check against the rubric
  --json            Output the report as JSON (for CI parsing)
  --strict          Treat entry-level warnings as failures
  -h, --help        Show this help message
`);
    process.exit(0);
  }

  return values;
}

// ============================================================
// Output Formatting
// ============================================================

const COLORS = {
  reset: "\x1b[0m",
  bold: "\x1b[1m",
  dim: "\x1b[2m",
  green: "\x1b[32m",
  red: "\x1b[31m",
  yellow: "\x1b[33m",
};

const useColors = process.stdout.isTTY && !process.env.NO_COLOR;

function c(color: keyof typeof COLORS, text: string): string {
  return useColors ? `${COLORS[color]}${text}${COLORS.reset}` : text;
}

function printHeader(): void {
  console.log("");
  console.log(c("bold", "═".repeat(60)));
  console.log(c("bold", " Rubric and Run Bundle Validation"));
  console.log(c("bold", "═".repeat(60)));
  console.log("");
}

function printStep(step: StepResult): void {
  const mark = step.success ? c("green", "✓") : c("red", "✗");
  console.log(`${mark} ${c("bold", step.component)}: ${step.message}`);
  for (const detail of step.details ?? []) {
    console.log(`  ${c(step.success ? "dim" : "red", "•")} ${detail}`);
  }
}

function printFooter(passed: number, failed: number): void {
  console.log("");
  console.log("─".repeat(60));
  if (failed === 0) {
    console.log(c("green", `✓ All validations passed (${passed}/${passed})`));
  } else {
    console.log(c("red", `✗ Validation failed: ${failed} error(s)`));
  }
  console.log("─".repeat(60));
  console.log("");
}

function warningDetails(warnings: readonly RunWarning[]): string[] {
  return warnings.map((w) => `[${w.code}] ${w.message}`);
}

// ============================================================
// Validation Step Functions
// ============================================================

function runRubricStep(
  rubricPath: string | undefined,
  bundle: Readonly<RunBundle> | undefined
): { step: StepResult; rubric?: Readonly<Rubric> } {
  const source = rubricPath ?? (bundle?.rubric !== undefined ? "bundle" : "default");
  if (rubricPath !== undefined && !existsSync(rubricPath)) {
    return {
      step: { success: false, component: "Rubric", message: `file not found: ${rubricPath}` },
    };
  }

  try {
    const rubric =
      rubricPath !== undefined
        ? loadRubricFromFile(rubricPath)
        : loadRubric(bundle?.rubric ?? DEFAULT_RUBRIC);
    const modalities = MODALITY_ORDER.filter((m) => rubric.modalities[m] !== undefined);
    return {
      step: {
        success: true,
        component: "Rubric",
        message: `${rubric.name} v${rubric.rubricVersion} (${source})`,
        details: modalities.map((m) => {
          const section = rubric.modalities[m];
          return `${m}: ${section?.mode ?? "?"}, λ = ${section?.fusionWeight ?? 0}`;
        }),
      },
      rubric,
    };
  } catch (err) {
    return {
      step: {
        success: false,
        component: "Rubric",
        message: "validation failed",
        details: [err instanceof RubricConfigError ? err.format() : String(err)],
      },
    };
  }
}

function runBundleStep(bundlePath: string): { step: StepResult; bundle?: Readonly<RunBundle> } {
  if (!existsSync(bundlePath)) {
    return {
      step: { success: false, component: "Run Bundle", message: `file not found: ${bundlePath}` },
    };
  }

  try {
    const bundle = loadRunBundleFromFile(bundlePath);
    return {
      step: {
        success: true,
        component: "Run Bundle",
        message: `${bundle.sessionId}/${bundle.datasetId}`,
        details: [
          `Features: ${bundle.observations.features.length}, spectra: ${bundle.observations.spectra.length}`,
          `Catalog entries: ${bundle.catalog.length}, templates: ${bundle.templates.length}, priors: ${bundle.priors.length}`,
        ],
      },
      bundle,
    };
  } catch (err) {
    return {
      step: {
        success: false,
        component: "Run Bundle",
        message: "validation failed",
        details: [err instanceof BundleValidationError ? err.format() : String(err)],
      },
    };
  }
}

/**
 * Validate every entry the way a run would and report the warnings it
 * would record.
 */
function runEntriesSteps(
  bundle: Readonly<RunBundle>,
  rubric: Readonly<Rubric>,
  strict: boolean
): { steps: StepResult[]; warnings: number } {
  const store = FeatureStore.create(bundle.observations, rubric);
  const catalog = CandidateCatalog.create(bundle.catalog);
  const registry = TemplateRegistry.create(bundle.templates, rubric, {
    knownCandidateIds: new Set(catalog.entries.map((e) => e.id)),
  });
  const priors = resolvePriors(bundle.priors, new Set(catalog.entries.map((e) => e.id)), rubric);

  const storeStats = store.getStats();
  const catalogStats = catalog.getStats();

  const sections: Array<{ component: string; message: string; warnings: readonly RunWarning[] }> = [
    {
      component: "Observations",
      message: `${storeStats.acceptedFeatures} features accepted, ${storeStats.rejectedFeatures} rejected`,
      warnings: store.warnings,
    },
    {
      component: "Catalog",
      message: `${catalogStats.totalCandidates} candidates, ${catalogStats.rejectedEntries} rejected`,
      warnings: catalog.warnings,
    },
    {
      component: "Templates",
      message: `${registry.templates.length} templates usable`,
      warnings: registry.warnings,
    },
    {
      component: "Priors",
      message: `${bundle.priors.length} supplied`,
      warnings: priors.warnings,
    },
  ];

  return {
    steps: sections.map(({ component, message, warnings }) => ({
      success: !strict || warnings.length === 0,
      component,
      message: warnings.length > 0 ? `${message}; ${warnings.length} warning(s)` : message,
      ...(warnings.length > 0 ? { details: warningDetails(warnings) } : {}),
    })),
    warnings: sections.reduce((n, s) => n + s.warnings.length, 0),
  };
}

// ============================================================
// Main
// ============================================================

function main(): void {
  const args = parseCliArgs();
  const steps: StepResult[] = [];
  let warnings = 0;

  let bundle: Readonly<RunBundle> | undefined;
  if (args.bundle !== undefined) {
    const bundleResult = runBundleStep(resolve(args.bundle));
    steps.push(bundleResult.step);
    bundle = bundleResult.bundle;
  }

  const rubricResult = runRubricStep(
    args.rubric !== undefined ? resolve(args.rubric) : undefined,
    bundle
  );
  steps.push(rubricResult.step);

  if (bundle && rubricResult.rubric) {
    const entries = runEntriesSteps(bundle, rubricResult.rubric, args.strict);
    steps.push(...entries.steps);
    warnings = entries.warnings;
  }

  const passed = steps.filter((s) => s.success).length;
  const failed = steps.length - passed;

  if (args.json) {
    const report: ValidationReport = {
      timestamp: new Date().toISOString(),
      steps,
      summary: { stepsPassed: passed, stepsFailed: failed, stepsTotal: steps.length, warnings },
    };
    console.log(JSON.stringify(report, null, 2));
  } else {
    printHeader();
    for (const step of steps) {
      printStep(step);
    }
    if (warnings > 0 && !args.strict) {
      console.log("");
      console.log(c("yellow", `! ${warnings} warning(s); rerun with --strict to fail on them`));
    }
    printFooter(passed, failed);
  }

  process.exit(failed === 0 ? 0 : 1);
}

try {
  main();
} catch (err) {
  console.error(err instanceof Error ? (err.stack ?? err.message) : String(err));
  process.exit(1);
}
