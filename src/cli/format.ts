/**
 * Plain-text rendering of identification results for the CLIs.
 * No colors here; the commands decorate the output for a TTY themselves.
 */

import type { ContributionRow, FeatureContributionRow } from "../evidence/explain.js";
import type { IdentificationResult } from "../identification/schema.js";
import type { RunWarning } from "../shared/warnings.js";

/**
 * Render rows as a left-aligned table with a header rule.
 */
export function renderTable(headers: readonly string[], rows: readonly (readonly string[])[]): string {
  const widths = headers.map((h, i) =>
    Math.max(h.length, ...rows.map((row) => (row[i] ?? "").length))
  );
  const line = (cells: readonly string[]): string =>
    cells
      .map((cell, i) => cell.padEnd(widths[i] ?? cell.length))
      .join("  ")
      .trimEnd();
  return [line(headers), widths.map((w) => "─".repeat(w)).join("  "), ...rows.map(line)].join("\n");
}

export function formatNumber(value: number | null, digits = 3): string {
  return value === null ? "-" : value.toFixed(digits);
}

/**
 * Ranking table: one row per hypothesis in rank order.
 */
export function formatRankingTable(result: IdentificationResult): string {
  if (result.hypotheses.length === 0) {
    return `No hypotheses (${result.reasonCode})`;
  }
  const rows = result.hypotheses.map((h) => [
    String(h.rank),
    h.candidateId,
    h.label,
    formatNumber(h.posterior.score),
    formatNumber(h.posterior.logPosterior),
    h.tier.tier,
    h.modalityScores.map((s) => `${s.modality}=${formatNumber(s.score, 2)}`).join(" "),
  ]);
  return renderTable(["#", "candidate", "label", "G", "log P", "tier", "modalities"], rows);
}

/**
 * Contribution table for one hypothesis, with a closing total row.
 */
export function formatExplainTable(rows: readonly ContributionRow[]): string {
  const body = rows.map((row) => [
    row.term === "modality" && row.modality !== null ? row.modality : row.term,
    row.status ?? (row.basis === "no_template" ? "no_template" : ""),
    formatNumber(row.score),
    formatNumber(row.qualityWeight),
    formatNumber(row.fusionWeight),
    formatNumber(row.contribution),
    row.detail,
  ]);
  const total = rows.reduce((acc, row) => acc + row.contribution, 0);
  body.push(["total", "", "", "", "", formatNumber(total), ""]);
  return renderTable(["term", "status", "S", "q", "λ", "contribution", "detail"], body);
}

/**
 * Per-feature table: where each matched feature sits against its expected
 * line and how much of its modality's term it carries.
 */
export function formatFeatureTable(rows: readonly FeatureContributionRow[]): string {
  if (rows.length === 0) {
    return "No matched features";
  }
  const body = rows.map((row) => [
    row.featureId,
    row.modality,
    row.label ?? "",
    formatNumber(row.observedCenter, 2),
    formatNumber(row.expectedCenter, 2),
    formatNumber(row.z, 2),
    formatNumber(row.likelihood),
    formatNumber(row.edgeWeight),
    formatNumber(row.share),
    formatNumber(row.contribution),
    row.templateSourceId,
  ]);
  return renderTable(
    ["feature", "modality", "line", "observed", "expected", "z", "L", "edge", "share", "contribution", "template"],
    body
  );
}

export function formatWarnings(warnings: readonly RunWarning[]): string {
  return warnings.map((w) => `[${w.code}] ${w.message}`).join("\n");
}
