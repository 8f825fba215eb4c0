/**
 * Candidate generation.
 *
 * Catalog entries pass through the hard rules; user constraints are applied
 * last and always win:
 *
 *   1. Every rule is evaluated; each failure becomes one exclusion.
 *   2. A non-empty whitelist replaces the gated set with the whitelisted
 *      catalog entries, whether or not they passed the rules.
 *   3. The blacklist removes ids from whatever remains.
 *
 * The result is sorted by candidate id. An empty result is a valid outcome,
 * not an error.
 */

import { compareWarnings, type RunWarning } from "../shared/warnings.js";
import type { CandidateCatalog } from "./catalog.js";
import { DEFAULT_CANDIDATE_RULES, type CandidateRule } from "./rules.js";
import type {
  CandidateEntry,
  CandidateExclusion,
  DetectionGates,
  UserConstraints,
} from "./schema.js";

export const WHITELIST_RULE_ID = "user_whitelist";
export const BLACKLIST_RULE_ID = "user_blacklist";

export interface CandidateGenerationResult {
  candidates: ReadonlyArray<Readonly<CandidateEntry>>;
  exclusions: CandidateExclusion[];
  warnings: RunWarning[];
}

const NO_GATES: DetectionGates = { absentElements: [], environment: {} };
const NO_CONSTRAINTS: UserConstraints = { whitelist: [], blacklist: [] };

function compareExclusions(a: CandidateExclusion, b: CandidateExclusion): number {
  if (a.candidateId !== b.candidateId) return a.candidateId < b.candidateId ? -1 : 1;
  if (a.ruleId !== b.ruleId) return a.ruleId < b.ruleId ? -1 : 1;
  return 0;
}

/**
 * Propose candidates from the catalog under the gates and user constraints.
 */
export function generateCandidates(
  catalog: CandidateCatalog,
  gates: Readonly<DetectionGates> = NO_GATES,
  constraints: Readonly<UserConstraints> = NO_CONSTRAINTS,
  rules: readonly CandidateRule[] = DEFAULT_CANDIDATE_RULES
): CandidateGenerationResult {
  const warnings: RunWarning[] = [];
  const ruleExclusions = new Map<string, CandidateExclusion[]>();
  let selected: Readonly<CandidateEntry>[] = [];

  for (const candidate of catalog.entries) {
    const failures: CandidateExclusion[] = [];
    for (const rule of rules) {
      const outcome = rule.evaluate(candidate, gates);
      if (!outcome.passed) {
        failures.push({ candidateId: candidate.id, ruleId: rule.id, message: outcome.message });
      }
    }
    if (failures.length > 0) {
      ruleExclusions.set(candidate.id, failures);
    } else {
      selected.push(candidate);
    }
  }

  const userExclusions: CandidateExclusion[] = [];

  if (constraints.whitelist.length > 0) {
    const whitelist = new Set(constraints.whitelist);
    for (const id of [...whitelist].sort()) {
      if (!catalog.has(id)) {
        warnings.push({
          code: "constraint_unknown_candidate",
          message: `Whitelisted candidate "${id}" is not in the catalog`,
          candidateId: id,
        });
      }
    }
    selected = catalog.entries.filter((c) => whitelist.has(c.id));
    for (const candidate of selected) {
      ruleExclusions.delete(candidate.id);
    }
    for (const candidate of catalog.entries) {
      if (!whitelist.has(candidate.id) && !ruleExclusions.has(candidate.id)) {
        userExclusions.push({
          candidateId: candidate.id,
          ruleId: WHITELIST_RULE_ID,
          message: "Not in the user whitelist",
        });
      }
    }
  }

  if (constraints.blacklist.length > 0) {
    const blacklist = new Set(constraints.blacklist);
    for (const id of [...blacklist].sort()) {
      if (!catalog.has(id)) {
        warnings.push({
          code: "constraint_unknown_candidate",
          message: `Blacklisted candidate "${id}" is not in the catalog`,
          candidateId: id,
        });
      }
    }
    for (const candidate of selected) {
      if (blacklist.has(candidate.id)) {
        userExclusions.push({
          candidateId: candidate.id,
          ruleId: BLACKLIST_RULE_ID,
          message: "Removed by the user blacklist",
        });
      }
    }
    selected = selected.filter((c) => !blacklist.has(c.id));
  }

  const exclusions = [...[...ruleExclusions.values()].flat(), ...userExclusions].sort(
    compareExclusions
  );

  return {
    candidates: Object.freeze(selected),
    exclusions,
    warnings: warnings.sort(compareWarnings),
  };
}
