/**
 * User priority tracker.
 *
 * Accumulates the taxonomy fields a user cares about, each with an
 * importance tier and provenance. `add` is an upsert: the latest call for a
 * field ID replaces the whole entry. Entries never expire on their own.
 *
 * One tracker belongs to one conversation session.
 */

import { IMPORTANCE_TIERS, type ImportanceTier } from "../config/engine/enums.js";

export interface PriorityEntry {
  readonly importance: ImportanceTier;
  /** Why the field matters, in the user's words */
  readonly notes: string;
  /** The statement the field was captured from */
  readonly source: string;
}

/**
 * Plain-object form of a tracker: field ID → entry.
 */
export type PrioritiesRecord = Record<string, PriorityEntry>;

export type PrioritySummary = Record<ImportanceTier, number> & { total: number };

export class PriorityTracker {
  private readonly entries = new Map<string, PriorityEntry>();

  /**
   * Track a field, replacing any existing entry for the same ID.
   *
   * @throws RangeError when `fieldId` is empty
   */
  add(fieldId: string, importance: ImportanceTier = "high", notes = "", source = ""): void {
    if (fieldId.length === 0) {
      throw new RangeError("Field ID must not be empty");
    }
    this.entries.set(fieldId, { importance, notes, source });
  }

  /**
   * Stop tracking a field. No-op if it is not tracked.
   */
  remove(fieldId: string): void {
    this.entries.delete(fieldId);
  }

  /**
   * Change the tier of a tracked field. Untracked fields are not created.
   */
  updateImportance(fieldId: string, importance: ImportanceTier): void {
    const entry = this.entries.get(fieldId);
    if (entry) {
      this.entries.set(fieldId, { ...entry, importance });
    }
  }

  get(fieldId: string): PriorityEntry | undefined {
    return this.entries.get(fieldId);
  }

  has(fieldId: string): boolean {
    return this.entries.has(fieldId);
  }

  get size(): number {
    return this.entries.size;
  }

  /**
   * Tracked field IDs. Order is for display only.
   */
  allIds(): string[] {
    return [...this.entries.keys()];
  }

  byImportance(importance: ImportanceTier): string[] {
    const ids: string[] = [];
    for (const [fieldId, entry] of this.entries) {
      if (entry.importance === importance) {
        ids.push(fieldId);
      }
    }
    return ids;
  }

  critical(): string[] {
    return this.byImportance("critical");
  }

  high(): string[] {
    return this.byImportance("high");
  }

  medium(): string[] {
    return this.byImportance("medium");
  }

  low(): string[] {
    return this.byImportance("low");
  }

  /**
   * Counts per tier plus the total.
   */
  summary(): PrioritySummary {
    const summary: PrioritySummary = { total: this.entries.size, critical: 0, high: 0, medium: 0, low: 0 };
    for (const entry of this.entries.values()) {
      summary[entry.importance]++;
    }
    return summary;
  }

  toRecord(): PrioritiesRecord {
    const record: PrioritiesRecord = {};
    for (const [fieldId, entry] of this.entries) {
      record[fieldId] = { ...entry };
    }
    return record;
  }

  static fromRecord(record: PrioritiesRecord): PriorityTracker {
    const tracker = new PriorityTracker();
    for (const [fieldId, entry] of Object.entries(record)) {
      tracker.add(fieldId, entry.importance, entry.notes, entry.source);
    }
    return tracker;
  }

  toString(): string {
    const summary = this.summary();
    const tiers = IMPORTANCE_TIERS.map((tier) => `${tier}=${summary[tier]}`).join(", ");
    return `PriorityTracker(total=${summary.total}, ${tiers})`;
  }
}
