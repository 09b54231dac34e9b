/**
 * Taxonomy store with deterministic indexing.
 *
 * The TaxonomyStore is the read-only access point for field records. It
 * keeps the records in load order (matcher tie-breaks depend on it) and
 * indexes them by:
 *
 *   - field ID (1:1)
 *   - pillar   (1:N, load order within each pillar)
 *   - issue    (1:N, load order within each issue)
 *
 * A store is built once and never mutated, so one instance can be shared
 * by any number of conversation sessions.
 */

import type { FieldRecord } from "./schema.js";

/**
 * Diagnostics about the store contents.
 */
export interface TaxonomyStats {
  totalFields: number;
  totalPillars: number;
  totalIssues: number;
  /** Distinct pillar names, first-seen order */
  pillars: string[];
  /** Distinct issue names, first-seen order */
  issues: string[];
}

/**
 * Immutable field store with lookup indexes.
 *
 * @example
 *   const { records } = loadTaxonomyFile("data/taxonomy.sample.json");
 *   const store = TaxonomyStore.create(records);
 *
 *   store.get("ENV-W-001");           // FieldRecord | undefined
 *   store.byIssue("Water Management"); // [] if unknown
 */
export class TaxonomyStore {
  private readonly _fields: ReadonlyArray<Readonly<FieldRecord>>;
  private readonly _byId: ReadonlyMap<string, Readonly<FieldRecord>>;
  private readonly _byPillar: ReadonlyMap<string, ReadonlyArray<Readonly<FieldRecord>>>;
  private readonly _byIssue: ReadonlyMap<string, ReadonlyArray<Readonly<FieldRecord>>>;

  private constructor(records: readonly FieldRecord[]) {
    this._fields = Object.freeze(records.map((r) => Object.freeze({ ...r })));

    this._byId = this.buildIdIndex(this._fields);
    this._byPillar = this.buildGroupIndex(this._fields, (f) => f.pillar);
    this._byIssue = this.buildGroupIndex(this._fields, (f) => f.issue);
  }

  /**
   * Create a store from loader output.
   *
   * Records are expected to satisfy the FieldRecord invariants (non-empty
   * id and name, unique id). A repeated id keeps its first record in the
   * id index.
   */
  static create(records: readonly FieldRecord[]): TaxonomyStore {
    return new TaxonomyStore(records);
  }

  // ============================================================
  // Index Builders (private)
  // ============================================================

  private buildIdIndex(
    fields: ReadonlyArray<Readonly<FieldRecord>>
  ): ReadonlyMap<string, Readonly<FieldRecord>> {
    const index = new Map<string, Readonly<FieldRecord>>();
    for (const field of fields) {
      if (!index.has(field.id)) {
        index.set(field.id, field);
      }
    }
    return index;
  }

  private buildGroupIndex(
    fields: ReadonlyArray<Readonly<FieldRecord>>,
    keyOf: (field: Readonly<FieldRecord>) => string
  ): ReadonlyMap<string, ReadonlyArray<Readonly<FieldRecord>>> {
    const index = new Map<string, Readonly<FieldRecord>[]>();

    for (const field of fields) {
      const key = keyOf(field).trim();
      if (!key) {
        continue;
      }
      const group = index.get(key);
      if (group) {
        group.push(field);
      } else {
        index.set(key, [field]);
      }
    }

    const frozenIndex = new Map<string, ReadonlyArray<Readonly<FieldRecord>>>();
    for (const [key, value] of index) {
      frozenIndex.set(key, Object.freeze(value));
    }
    return frozenIndex;
  }

  // ============================================================
  // Public Accessors
  // ============================================================

  /**
   * All records in load order.
   */
  get fields(): ReadonlyArray<Readonly<FieldRecord>> {
    return this._fields;
  }

  get size(): number {
    return this._fields.length;
  }

  /**
   * Get a record by field ID, or undefined if not found.
   */
  get(id: string): Readonly<FieldRecord> | undefined {
    return this._byId.get(id);
  }

  has(id: string): boolean {
    return this._byId.has(id);
  }

  /**
   * Records under a pillar, or an empty array for an unknown pillar.
   */
  byPillar(pillar: string): ReadonlyArray<Readonly<FieldRecord>> {
    return this._byPillar.get(pillar) ?? [];
  }

  /**
   * Records under an issue, or an empty array for an unknown issue.
   */
  byIssue(issue: string): ReadonlyArray<Readonly<FieldRecord>> {
    return this._byIssue.get(issue) ?? [];
  }

  pillars(): string[] {
    return [...this._byPillar.keys()];
  }

  issues(): string[] {
    return [...this._byIssue.keys()];
  }

  /**
   * Case-insensitive substring search over each record's search blob,
   * in load order, stopping once `limit` records are found.
   */
  search(query: string, limit = 10): Readonly<FieldRecord>[] {
    const needle = query.toLowerCase();
    const matches: Readonly<FieldRecord>[] = [];

    for (const field of this._fields) {
      if (matches.length >= limit) {
        break;
      }
      if (field.searchText.includes(needle)) {
        matches.push(field);
      }
    }

    return matches;
  }

  /**
   * Get statistics about the store.
   */
  stats(): TaxonomyStats {
    return {
      totalFields: this._fields.length,
      totalPillars: this._byPillar.size,
      totalIssues: this._byIssue.size,
      pillars: this.pillars(),
      issues: this.issues(),
    };
  }
}
