/**
 * Candidate catalog with deterministic indexing.
 *
 * ═══════════════════════════════════════════════════════════════════════════
 * IMMUTABLE CANDIDATE CATALOG
 * ═══════════════════════════════════════════════════════════════════════════
 *
 * The catalog is the universe of candidates a run can propose. It provides:
 *
 * 1. PER-ENTRY VALIDATION: malformed entries are skipped with a warning,
 *    duplicates keep their first occurrence.
 *
 * 2. DETERMINISTIC INDEXING: entries are sorted by ID and indexed by
 *    required element, component and tag.
 *
 * 3. IMMUTABILITY: entries are deep-frozen once created.
 */

import { deepFreeze } from "../shared/deep-freeze.js";
import { compareWarnings, type RunWarning } from "../shared/warnings.js";
import { formatFieldPath, toFieldIssues } from "../shared/zod-issues.js";
import { CandidateEntrySchema, type CandidateEntry } from "./schema.js";

export interface CatalogStats {
  totalCandidates: number;
  rejectedEntries: number;
  uniqueElements: number;
  uniqueComponents: number;
  uniqueTags: number;
}

export class CandidateCatalog {
  private readonly _entries: ReadonlyArray<Readonly<CandidateEntry>>;
  private readonly _byId: ReadonlyMap<string, Readonly<CandidateEntry>>;

  /**
   * Index: required element -> entries (sorted by ID).
   */
  private readonly _byRequiredElement: ReadonlyMap<string, ReadonlyArray<Readonly<CandidateEntry>>>;

  /**
   * Index: component -> entries (sorted by ID).
   */
  private readonly _byComponent: ReadonlyMap<string, ReadonlyArray<Readonly<CandidateEntry>>>;

  /**
   * Index: tag -> entries (sorted by ID).
   */
  private readonly _byTag: ReadonlyMap<string, ReadonlyArray<Readonly<CandidateEntry>>>;

  private readonly _warnings: ReadonlyArray<Readonly<RunWarning>>;

  private constructor(entries: CandidateEntry[], warnings: RunWarning[]) {
    const sorted = [...entries].sort((a, b) => (a.id < b.id ? -1 : a.id > b.id ? 1 : 0));
    this._entries = Object.freeze(sorted.map((e) => deepFreeze(e)));
    this._byId = new Map(
      this._entries.map((e): [string, Readonly<CandidateEntry>] => [e.id, e])
    );
    this._byRequiredElement = buildIndex(this._entries, (e) => e.requiredElements);
    this._byComponent = buildIndex(this._entries, (e) => e.components);
    this._byTag = buildIndex(this._entries, (e) => e.tags);
    this._warnings = Object.freeze([...warnings].sort(compareWarnings).map((w) => deepFreeze(w)));
  }

  /**
   * Validate raw catalog entries and build the catalog.
   */
  static create(input: readonly unknown[]): CandidateCatalog {
    const warnings: RunWarning[] = [];
    const entries = new Map<string, CandidateEntry>();

    input.forEach((raw, index) => {
      const parsed = CandidateEntrySchema.safeParse(raw);
      if (!parsed.success) {
        const issue = toFieldIssues(parsed.error.issues)[0];
        warnings.push({
          code: "catalog_entry_rejected",
          message: `Catalog entry at index ${index} rejected: ${formatFieldPath(issue?.path ?? [])}: ${issue?.message ?? "invalid"}`,
        });
        return;
      }
      if (entries.has(parsed.data.id)) {
        warnings.push({
          code: "catalog_duplicate",
          message: `Duplicate catalog id "${parsed.data.id}" at index ${index}; first occurrence kept`,
          candidateId: parsed.data.id,
        });
        return;
      }
      entries.set(parsed.data.id, parsed.data);
    });

    return new CandidateCatalog([...entries.values()], warnings);
  }

  /** All entries, sorted by ID. */
  get entries(): ReadonlyArray<Readonly<CandidateEntry>> {
    return this._entries;
  }

  get warnings(): ReadonlyArray<Readonly<RunWarning>> {
    return this._warnings;
  }

  getById(id: string): Readonly<CandidateEntry> | undefined {
    return this._byId.get(id);
  }

  has(id: string): boolean {
    return this._byId.has(id);
  }

  getByRequiredElement(element: string): ReadonlyArray<Readonly<CandidateEntry>> {
    return this._byRequiredElement.get(element) ?? [];
  }

  getByComponent(component: string): ReadonlyArray<Readonly<CandidateEntry>> {
    return this._byComponent.get(component) ?? [];
  }

  getByTag(tag: string): ReadonlyArray<Readonly<CandidateEntry>> {
    return this._byTag.get(tag) ?? [];
  }

  getStats(): CatalogStats {
    return {
      totalCandidates: this._entries.length,
      rejectedEntries: this._warnings.filter((w) => w.code === "catalog_entry_rejected").length,
      uniqueElements: this._byRequiredElement.size,
      uniqueComponents: this._byComponent.size,
      uniqueTags: this._byTag.size,
    };
  }
}

function buildIndex(
  entries: ReadonlyArray<Readonly<CandidateEntry>>,
  keysOf: (entry: Readonly<CandidateEntry>) => readonly string[]
): ReadonlyMap<string, ReadonlyArray<Readonly<CandidateEntry>>> {
  const index = new Map<string, Readonly<CandidateEntry>[]>();
  for (const entry of entries) {
    for (const key of new Set(keysOf(entry))) {
      const list = index.get(key) ?? [];
      list.push(entry);
      index.set(key, list);
    }
  }

  const frozenIndex = new Map<string, ReadonlyArray<Readonly<CandidateEntry>>>();
  for (const [key, value] of index) {
    frozenIndex.set(key, Object.freeze(value));
  }
  return frozenIndex;
}
