/**
 * Template registry.
 *
 * Validates templates one by one and indexes them by (candidate, modality).
 * Only templates the active rubric can score are kept: a template for an
 * unconfigured modality, or whose kind disagrees with the modality's mode,
 * is set aside with a warning. When two templates claim the same
 * (candidate, modality) pair, the one with the lexically smallest source id
 * wins, independent of input order.
 */

import type { Modality } from "../config/rubric/enums.js";
import type { Rubric } from "../config/rubric/schema.js";
import { compareModalities } from "../config/rubric/enums.js";
import { deepFreeze } from "../shared/deep-freeze.js";
import { compareWarnings, type RunWarning } from "../shared/warnings.js";
import { formatFieldPath, toFieldIssues } from "../shared/zod-issues.js";
import { TemplateSchema, type Template } from "./schema.js";

type TemplateKey = `${string}::${Modality}`;

function makeKey(candidateId: string, modality: Modality): TemplateKey {
  return `${candidateId}::${modality}`;
}

function compareTemplates(a: Template, b: Template): number {
  if (a.candidateId !== b.candidateId) return a.candidateId < b.candidateId ? -1 : 1;
  const byModality = compareModalities(a.modality, b.modality);
  if (byModality !== 0) return byModality;
  if (a.sourceId !== b.sourceId) return a.sourceId < b.sourceId ? -1 : 1;
  return 0;
}

export interface TemplateRegistryOptions {
  /** When given, templates for other candidate ids are set aside with a warning. */
  knownCandidateIds?: ReadonlySet<string>;
}

export class TemplateRegistry {
  private readonly _templates: ReadonlyArray<Readonly<Template>>;
  private readonly _byKey: ReadonlyMap<TemplateKey, Readonly<Template>>;
  private readonly _warnings: ReadonlyArray<Readonly<RunWarning>>;

  private constructor(templates: Template[], warnings: RunWarning[]) {
    this._templates = Object.freeze(templates.map((t) => deepFreeze(t)));
    this._byKey = new Map(
      this._templates.map((t): [TemplateKey, Readonly<Template>] => [
        makeKey(t.candidateId, t.modality),
        t,
      ])
    );
    this._warnings = Object.freeze([...warnings].sort(compareWarnings).map((w) => deepFreeze(w)));
  }

  /**
   * Validate raw templates against the schema and the active rubric.
   */
  static create(
    input: readonly unknown[],
    rubric: Pick<Rubric, "modalities">,
    options: TemplateRegistryOptions = {}
  ): TemplateRegistry {
    const warnings: RunWarning[] = [];
    const valid: Template[] = [];

    input.forEach((raw, index) => {
      const parsed = TemplateSchema.safeParse(raw);
      if (!parsed.success) {
        const issue = toFieldIssues(parsed.error.issues)[0];
        warnings.push({
          code: "template_rejected",
          message: `Template at index ${index} rejected: ${formatFieldPath(issue?.path ?? [])}: ${issue?.message ?? "invalid"}`,
        });
        return;
      }

      const template = parsed.data;
      const section = rubric.modalities[template.modality];
      if (section === undefined) {
        warnings.push({
          code: "template_unscored_modality",
          message: `Template ${template.sourceId} for candidate "${template.candidateId}" targets ${template.modality}, which the rubric does not score`,
          candidateId: template.candidateId,
          modality: template.modality,
        });
        return;
      }
      if (section.mode !== template.kind) {
        warnings.push({
          code: "template_mode_mismatch",
          message: `Template ${template.sourceId} for candidate "${template.candidateId}" is ${template.kind} but the rubric scores ${template.modality} in ${section.mode} mode`,
          candidateId: template.candidateId,
          modality: template.modality,
        });
        return;
      }
      if (options.knownCandidateIds && !options.knownCandidateIds.has(template.candidateId)) {
        warnings.push({
          code: "template_unknown_candidate",
          message: `Template ${template.sourceId} references candidate "${template.candidateId}", which is not in the catalog`,
          candidateId: template.candidateId,
          modality: template.modality,
        });
        return;
      }
      valid.push(template);
    });

    valid.sort(compareTemplates);

    const kept: Template[] = [];
    const seen = new Set<TemplateKey>();
    for (const template of valid) {
      const key = makeKey(template.candidateId, template.modality);
      if (seen.has(key)) {
        warnings.push({
          code: "template_duplicate",
          message: `Template ${template.sourceId} ignored: candidate "${template.candidateId}" already has a ${template.modality} template`,
          candidateId: template.candidateId,
          modality: template.modality,
        });
        continue;
      }
      seen.add(key);
      kept.push(template);
    }

    return new TemplateRegistry(kept, warnings);
  }

  /** All kept templates, sorted by candidate, modality, then source id. */
  get templates(): ReadonlyArray<Readonly<Template>> {
    return this._templates;
  }

  get warnings(): ReadonlyArray<Readonly<RunWarning>> {
    return this._warnings;
  }

  get(candidateId: string, modality: Modality): Readonly<Template> | undefined {
    return this._byKey.get(makeKey(candidateId, modality));
  }

  /** Templates of one candidate in canonical modality order. */
  forCandidate(candidateId: string): ReadonlyArray<Readonly<Template>> {
    return this._templates.filter((t) => t.candidateId === candidateId);
  }

  /** Sorted, de-duplicated "source_id@version" strings of the given candidates' templates. */
  sourceIds(candidateIds?: ReadonlySet<string>): string[] {
    const ids = new Set<string>();
    for (const template of this._templates) {
      if (candidateIds === undefined || candidateIds.has(template.candidateId)) {
        ids.add(template.sourceId);
      }
    }
    return [...ids].sort();
  }
}
