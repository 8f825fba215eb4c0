/**
 * Quality weighting of modality scores from calibration QC metadata.
 *
 *   q = clip(1 − a·RMS/τ_RMS − b·|ΔFWHM|/τ_FWHM − c·τ_SNR/SNR, floor, ceiling)
 *
 * A pure function of the supplied metadata: the weight of a modality does
 * not depend on which candidate is being scored, so it is computed once per
 * run. With several spectra the lowest weight wins.
 */

import type { Modality } from "../config/rubric/enums.js";
import type { QualityBounds, QualityCoefficients } from "../config/rubric/schema.js";
import type { SpectrumMetadata } from "../features/schema.js";
import type { RunWarning } from "../shared/warnings.js";
import { clamp } from "./numeric.js";
import type { QualityAssessment } from "./schema.js";

export interface QualityInput {
  modality: Modality;
  /** Spectra of the modality, sorted by id. */
  spectra: ReadonlyArray<Readonly<SpectrumMetadata>>;
  coefficients: Readonly<QualityCoefficients>;
  bounds: Readonly<QualityBounds>;
}

const METRIC_NAMES = {
  calibrationRms: "calibration RMS",
  fwhmDeviation: "FWHM deviation",
  snr: "SNR",
} as const;

export function assessQuality(input: QualityInput): QualityAssessment {
  const { modality, coefficients, bounds } = input;
  const messages: string[] = [];
  const warnings: RunWarning[] = [];

  if (input.spectra.length === 0) {
    warnings.push({
      code: "qc_spectrum_missing",
      message: `No ${modality} spectrum metadata; quality weight set to the ceiling ${bounds.ceiling}`,
      modality,
    });
    return {
      modality,
      weight: bounds.ceiling,
      status: "ok",
      spectra: [],
      messages,
      warnings,
    };
  }

  let status: QualityAssessment["status"] = "ok";
  const spectra = input.spectra.map((spectrum) => {
    const qc = spectrum.qc;

    for (const key of ["calibrationRms", "fwhmDeviation", "snr"] as const) {
      if (qc[key] === undefined) {
        warnings.push({
          code: "qc_metric_missing",
          message: `Spectrum "${spectrum.id}" (${modality}) has no ${METRIC_NAMES[key]}; no penalty applied for it`,
          modality,
          spectrumId: spectrum.id,
        });
      }
    }

    if (qc.snr !== undefined && qc.snr <= 0) {
      status = "degraded";
      const message = `Spectrum "${spectrum.id}" (${modality}) reports non-positive SNR ${qc.snr}; quality weight set to the floor ${bounds.floor}`;
      messages.push(message);
      warnings.push({ code: "qc_degraded", message, modality, spectrumId: spectrum.id });
      return { spectrumId: spectrum.id, weight: bounds.floor, penalty: 1 };
    }

    let penalty = 0;
    if (qc.calibrationRms !== undefined) {
      penalty += (coefficients.a * qc.calibrationRms) / coefficients.tauRms;
    }
    if (qc.fwhmDeviation !== undefined) {
      penalty += (coefficients.b * Math.abs(qc.fwhmDeviation)) / coefficients.tauFwhm;
    }
    if (qc.snr !== undefined) {
      penalty += (coefficients.c * coefficients.tauSnr) / qc.snr;
    }

    // Anything above 1 already drives q to the floor.
    const capped = Number.isFinite(penalty) ? Math.min(penalty, 1) : 1;
    return {
      spectrumId: spectrum.id,
      weight: clamp(1 - capped, bounds.floor, bounds.ceiling),
      penalty: capped,
    };
  });

  const weight = Math.min(...spectra.map((s) => s.weight));

  return { modality, weight, status, spectra, messages, warnings };
}
