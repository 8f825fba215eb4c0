/**
 * Hard candidate rules.
 *
 * Rules are data: each one is an id plus a pure evaluate function, so a
 * caller can extend or replace the default set without touching the
 * generator.
 */

import type { CandidateEntry, DetectionGates } from "./schema.js";

export type RuleOutcome = { passed: true } | { passed: false; message: string };

export interface CandidateRule {
  readonly id: string;
  evaluate(candidate: Readonly<CandidateEntry>, gates: Readonly<DetectionGates>): RuleOutcome;
}

const PASS: RuleOutcome = { passed: true };

function fail(message: string): RuleOutcome {
  return { passed: false, message };
}

export const requiredElementsDetected: CandidateRule = {
  id: "required_elements_detected",
  evaluate(candidate, gates) {
    const absent = new Set(gates.absentElements);
    const confirmedAbsent = candidate.requiredElements.filter((el) => absent.has(el));
    if (confirmedAbsent.length > 0) {
      return fail(`Required element(s) confirmed absent: ${confirmedAbsent.join(", ")}`);
    }
    if (gates.detectedElements === undefined) return PASS;
    const detected = new Set(gates.detectedElements);
    const missing = candidate.requiredElements.filter((el) => !detected.has(el));
    return missing.length === 0
      ? PASS
      : fail(`Required element(s) not detected: ${missing.join(", ")}`);
  },
};

export const forbiddenElementsAbsent: CandidateRule = {
  id: "forbidden_elements_absent",
  evaluate(candidate, gates) {
    if (gates.detectedElements === undefined) return PASS;
    const detected = new Set(gates.detectedElements);
    const present = candidate.forbiddenElements.filter((el) => detected.has(el));
    return present.length === 0
      ? PASS
      : fail(`Forbidden element(s) detected: ${present.join(", ")}`);
  },
};

export const phaseCompatible: CandidateRule = {
  id: "phase_compatible",
  evaluate(candidate, gates) {
    const phase = gates.environment.phase;
    const allowed = candidate.environment.phases;
    if (phase === undefined || allowed === undefined) return PASS;
    return allowed.includes(phase)
      ? PASS
      : fail(`Phase "${phase}" not among allowed phases: ${allowed.join(", ")}`);
  },
};

export const temperatureInRange: CandidateRule = {
  id: "temperature_in_range",
  evaluate(candidate, gates) {
    const temperature = gates.environment.temperature;
    const range = candidate.environment.temperatureRange;
    if (temperature === undefined || range === undefined) return PASS;
    return temperature >= range.min && temperature <= range.max
      ? PASS
      : fail(`Temperature ${temperature} K outside [${range.min}, ${range.max}] K`);
  },
};

export const solventCompatible: CandidateRule = {
  id: "solvent_compatible",
  evaluate(candidate, gates) {
    const solvent = gates.environment.solvent;
    const allowed = candidate.environment.solvents;
    if (solvent === undefined || allowed === undefined) return PASS;
    return allowed.includes(solvent)
      ? PASS
      : fail(`Solvent "${solvent}" not among compatible solvents: ${allowed.join(", ")}`);
  },
};

/** Default hard rules, evaluated in this order. */
export const DEFAULT_CANDIDATE_RULES: readonly CandidateRule[] = Object.freeze([
  requiredElementsDetected,
  forbiddenElementsAbsent,
  phaseCompatible,
  temperatureInRange,
  solventCompatible,
]);
