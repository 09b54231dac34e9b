/**
 * Navigable taxonomy hierarchy.
 *
 * Derives an explicit Pillar → Issue → Sub-Issue → Field tree from a
 * TaxonomyStore. Records missing a pillar or issue stay in the store but
 * are left out of the tree. Records without a sub-issue live in an
 * unnamed bucket (keyed "") under their issue; subIssues() does not list
 * it, but fields() for the issue includes it.
 */

import { CANONICAL_PILLARS, type Pillar } from "../config/engine/enums.js";
import type { FieldRecord } from "./schema.js";
import type { TaxonomyStore } from "./store.js";
import { issueAgendaNode, pillarIntroNode, type AgendaNode } from "./agenda.js";

export interface SubIssueNode {
  /** "" for fields filed directly under the issue */
  readonly name: string;
  readonly fields: ReadonlyArray<Readonly<FieldRecord>>;
}

export interface IssueNode {
  readonly name: string;
  readonly pillar: string;
  /** Sub-issue buckets in first-seen order */
  readonly subIssues: ReadonlyMap<string, SubIssueNode>;
}

export interface PillarNode {
  readonly name: string;
  /** Issues in first-seen order */
  readonly issues: ReadonlyMap<string, IssueNode>;
}

export interface HierarchySummary {
  pillarCount: number;
  issueCount: number;
  subIssueCount: number;
  fieldCount: number;
}

const byName = (a: string, b: string): number => (a < b ? -1 : a > b ? 1 : 0);

export class HierarchyIndex {
  private readonly _pillars: ReadonlyMap<string, PillarNode>;

  private constructor(pillars: ReadonlyMap<string, PillarNode>) {
    this._pillars = pillars;
  }

  /**
   * Build the tree from a store's records, in store order.
   */
  static fromStore(store: TaxonomyStore): HierarchyIndex {
    return HierarchyIndex.fromRecords(store.fields);
  }

  static fromRecords(records: ReadonlyArray<Readonly<FieldRecord>>): HierarchyIndex {
    // pillar -> issue -> sub-issue -> fields
    const tree = new Map<string, Map<string, Map<string, Readonly<FieldRecord>[]>>>();

    for (const field of records) {
      const pillar = field.pillar.trim();
      const issue = field.issue.trim();
      const subIssue = field.subIssue.trim();

      if (!pillar || !issue) {
        continue;
      }

      let issues = tree.get(pillar);
      if (!issues) {
        issues = new Map();
        tree.set(pillar, issues);
      }

      let subIssues = issues.get(issue);
      if (!subIssues) {
        subIssues = new Map();
        issues.set(issue, subIssues);
      }

      const bucket = subIssues.get(subIssue);
      if (bucket) {
        bucket.push(field);
      } else {
        subIssues.set(subIssue, [field]);
      }
    }

    const pillars = new Map<string, PillarNode>();
    for (const [pillarName, issues] of tree) {
      const issueNodes = new Map<string, IssueNode>();
      for (const [issueName, subIssues] of issues) {
        const subIssueNodes = new Map<string, SubIssueNode>();
        for (const [subIssueName, fields] of subIssues) {
          subIssueNodes.set(subIssueName, { name: subIssueName, fields: Object.freeze(fields) });
        }
        issueNodes.set(issueName, { name: issueName, pillar: pillarName, subIssues: subIssueNodes });
      }
      pillars.set(pillarName, { name: pillarName, issues: issueNodes });
    }

    return new HierarchyIndex(pillars);
  }

  /**
   * Pillars present in the data, in canonical order.
   * Pillar names outside the canonical set are dropped.
   */
  pillars(): Pillar[] {
    return CANONICAL_PILLARS.filter((p) => this._pillars.has(p));
  }

  /**
   * Every pillar name in the data, canonical or not, first-seen order.
   */
  allPillarNames(): string[] {
    return [...this._pillars.keys()];
  }

  /**
   * Alphabetically sorted issue names under a pillar; [] if unknown.
   */
  issues(pillar: string): string[] {
    const node = this._pillars.get(pillar);
    return node ? [...node.issues.keys()].sort(byName) : [];
  }

  /**
   * Alphabetically sorted, non-empty sub-issue names under an issue.
   */
  subIssues(pillar: string, issue: string): string[] {
    const node = this.issueNode(pillar, issue);
    if (!node) {
      return [];
    }
    return [...node.subIssues.keys()].filter((s) => s !== "").sort(byName);
  }

  /**
   * Fields under a path.
   *
   * With a sub-issue: that bucket's fields in insertion order.
   * Without: every bucket of the issue, buckets in first-seen order.
   */
  fields(pillar: string, issue: string, subIssue?: string): ReadonlyArray<Readonly<FieldRecord>> {
    const node = this.issueNode(pillar, issue);
    if (!node) {
      return [];
    }

    if (subIssue !== undefined && subIssue !== "") {
      return node.subIssues.get(subIssue)?.fields ?? [];
    }

    const all: Readonly<FieldRecord>[] = [];
    for (const bucket of node.subIssues.values()) {
      all.push(...bucket.fields);
    }
    return all;
  }

  pillarNode(pillar: string): PillarNode | undefined {
    return this._pillars.get(pillar);
  }

  issueNode(pillar: string, issue: string): IssueNode | undefined {
    return this._pillars.get(pillar)?.issues.get(issue);
  }

  /**
   * Build the conversation agenda: for each canonical pillar present, one
   * intro node followed by one node per issue in issues() order.
   */
  buildAgenda(): AgendaNode[] {
    const agenda: AgendaNode[] = [];

    for (const pillar of this.pillars()) {
      agenda.push(pillarIntroNode(pillar));
      for (const issue of this.issues(pillar)) {
        agenda.push(issueAgendaNode(pillar, issue));
      }
    }

    return agenda;
  }

  summary(): HierarchySummary {
    let issueCount = 0;
    let subIssueCount = 0;
    let fieldCount = 0;

    for (const pillar of this._pillars.values()) {
      issueCount += pillar.issues.size;
      for (const issue of pillar.issues.values()) {
        for (const bucket of issue.subIssues.values()) {
          if (bucket.name !== "") {
            subIssueCount++;
          }
          fieldCount += bucket.fields.length;
        }
      }
    }

    return {
      pillarCount: this._pillars.size,
      issueCount,
      subIssueCount,
      fieldCount,
    };
  }
}
