/**
 * Conversation session state.
 *
 * One session per user conversation. It owns the agenda position, per-node
 * turn counters, the discussed / deep-dive bookkeeping, the issues the user
 * has mentioned within the current pillar, and the priority tracker.
 *
 * The agenda index only ever moves forward. Once it reaches the agenda
 * length the session is complete and stays that way.
 */

import type { Pillar } from "../config/engine/enums.js";
import type { AgendaNode } from "../taxonomy/agenda.js";
import { generateRunId } from "../logging/index.js";
import { PriorityTracker } from "../priorities/tracker.js";

/**
 * Progress readout for display. `current` is 1-based and never exceeds
 * `total`; `percentage` is the share of nodes already left behind.
 */
export interface Progress {
  current: number;
  total: number;
  percentage: number;
}

export class ConversationStateError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConversationStateError";
  }
}

export interface ConversationSessionOptions {
  /** Defaults to a generated ID */
  id?: string;
  /** Resume with previously captured priorities */
  priorities?: PriorityTracker;
}

/**
 * Issues the user referenced, scoped to one pillar.
 */
interface MentionScope {
  readonly pillar: Pillar;
  /** lowercased name → name as first mentioned */
  readonly issues: Map<string, string>;
}

export class ConversationSession {
  readonly id: string;
  readonly agenda: ReadonlyArray<AgendaNode>;
  readonly priorities: PriorityTracker;

  private _index = 0;
  private readonly turnCounts = new Map<string, number>();
  private readonly discussed = new Set<string>();
  private readonly deepDiveOffered = new Set<string>();
  private mentionScope: MentionScope | undefined;

  constructor(agenda: ReadonlyArray<AgendaNode>, options: ConversationSessionOptions = {}) {
    this.id = options.id ?? generateRunId();
    this.agenda = Object.freeze([...agenda]);
    this.priorities = options.priorities ?? new PriorityTracker();
  }

  get index(): number {
    return this._index;
  }

  get isComplete(): boolean {
    return this._index >= this.agenda.length;
  }

  /**
   * The node under discussion, or undefined once complete.
   */
  currentNode(): AgendaNode | undefined {
    return this.agenda[this._index];
  }

  /**
   * Count one more turn on a node and return the new count.
   */
  recordTurn(nodeId: string): number {
    const count = (this.turnCounts.get(nodeId) ?? 0) + 1;
    this.turnCounts.set(nodeId, count);
    return count;
  }

  turnCount(nodeId: string): number {
    return this.turnCounts.get(nodeId) ?? 0;
  }

  markDiscussed(nodeId: string): void {
    this.discussed.add(nodeId);
  }

  isDiscussed(nodeId: string): boolean {
    return this.discussed.has(nodeId);
  }

  discussedIds(): string[] {
    return [...this.discussed];
  }

  markDeepDiveOffered(nodeId: string): void {
    this.deepDiveOffered.add(nodeId);
  }

  wasDeepDiveOffered(nodeId: string): boolean {
    return this.deepDiveOffered.has(nodeId);
  }

  /**
   * Record issue names the user referenced while on the current node.
   * A mention made under a different pillar than the stored scope starts
   * a fresh scope.
   */
  noteMentionedIssues(issues: readonly string[]): void {
    const node = this.currentNode();
    if (!node) {
      return;
    }

    if (!this.mentionScope || this.mentionScope.pillar !== node.pillar) {
      this.mentionScope = { pillar: node.pillar, issues: new Map() };
    }

    for (const issue of issues) {
      const name = issue.trim();
      const key = name.toLowerCase();
      if (key && !this.mentionScope.issues.has(key)) {
        this.mentionScope.issues.set(key, name);
      }
    }
  }

  /**
   * Issues mentioned within the current pillar, in mention order.
   */
  mentionedIssues(): string[] {
    const node = this.currentNode();
    if (!node || !this.mentionScope || this.mentionScope.pillar !== node.pillar) {
      return [];
    }
    return [...this.mentionScope.issues.values()];
  }

  isIssueMentioned(issue: string): boolean {
    const node = this.currentNode();
    if (!node || !this.mentionScope || this.mentionScope.pillar !== node.pillar) {
      return false;
    }
    return this.mentionScope.issues.has(issue.trim().toLowerCase());
  }

  /**
   * Move the agenda position forward. Targets past the end complete the
   * session. Leaving the pillar drops the mentioned-issues scope.
   *
   * @throws ConversationStateError on a backward move
   */
  moveTo(index: number): void {
    if (index < this._index) {
      throw new ConversationStateError(
        `Agenda position cannot move backwards (from ${this._index} to ${index})`
      );
    }

    this._index = Math.min(index, this.agenda.length);

    const node = this.currentNode();
    if (this.mentionScope && (!node || node.pillar !== this.mentionScope.pillar)) {
      this.mentionScope = undefined;
    }
  }

  progress(): Progress {
    const total = this.agenda.length;
    if (total === 0) {
      return { current: 0, total: 0, percentage: 100 };
    }

    const shown = Math.min(this._index, total);
    return {
      current: Math.min(this._index + 1, total),
      total,
      percentage: Math.floor((shown / total) * 100),
    };
  }
}
