/**
 * Conversation router.
 *
 * Walks the agenda one user turn at a time. Each turn goes through two
 * steps:
 *
 *   1. processTurn(utterance): count the turn, detect an explicit move-on,
 *      detect looping, match the utterance against the taxonomy and
 *      capture strong matches into the priority tracker.
 *   2. route(turn, classification): combine the turn analysis with the
 *      generator's classification and move the agenda position.
 *
 * Keeping the two apart lets the caller build the classification prompt
 * from the turn analysis before routing.
 */

import type { EngineConfig } from "../config/engine/schema.js";
import { DEFAULT_ENGINE_CONFIG } from "../config/engine/defaults.js";
import type { Logger } from "../logging/logger.js";
import { silentLogger } from "../logging/logger.js";
import type { MatchResult } from "../matching/matcher.js";
import { Matcher } from "../matching/matcher.js";
import type { AgendaNode } from "../taxonomy/agenda.js";
import { HierarchyIndex } from "../taxonomy/hierarchy.js";
import type { TaxonomyStore } from "../taxonomy/store.js";
import type { Classification } from "./classification.js";
import { detectMoveOn } from "./move-on.js";
import type { Progress } from "./session.js";
import { ConversationSession, ConversationStateError } from "./session.js";

export interface TurnResult {
  readonly nodeId: string;
  /** Turns spent on this node, including this one */
  readonly turnCount: number;
  readonly explicitMoveOn: boolean;
  readonly isLooping: boolean;
  readonly matches: readonly MatchResult[];
  /** IDs captured into the priority tracker on this turn */
  readonly matchedFieldIds: readonly string[];
  readonly shouldMoveOn: boolean;
}

export type RoutingDecision =
  | { readonly kind: "stay"; readonly index: number }
  | { readonly kind: "advance"; readonly from: number; readonly to: number; readonly forced: boolean }
  | { readonly kind: "skip_pillar"; readonly from: number; readonly to: number }
  | { readonly kind: "complete"; readonly from: number; readonly forced: boolean };

/**
 * Where the router's session comes from: a fresh one over `agenda`, or an
 * existing `session` that already owns its agenda. Never both.
 */
export type RouterSessionSource =
  | { readonly agenda: ReadonlyArray<AgendaNode>; readonly session?: undefined }
  | { readonly session: ConversationSession; readonly agenda?: undefined };

export type ConversationRouterOptions = RouterSessionSource & {
  readonly matcher: Matcher;
  readonly config?: Readonly<EngineConfig>;
  readonly logger?: Logger;
};

export interface CreateRouterOptions {
  readonly store: TaxonomyStore;
  readonly hierarchy?: HierarchyIndex;
  readonly config?: Readonly<EngineConfig>;
  readonly logger?: Logger;
}

function sessionFrom(source: RouterSessionSource): ConversationSession {
  if (source.session !== undefined) {
    return source.session;
  }
  return new ConversationSession(source.agenda);
}

export class ConversationRouter {
  readonly session: ConversationSession;
  private readonly matcher: Matcher;
  private readonly config: Readonly<EngineConfig>;
  private readonly logger: Logger;

  constructor(options: ConversationRouterOptions) {
    this.matcher = options.matcher;
    this.config = options.config ?? DEFAULT_ENGINE_CONFIG;
    this.session = sessionFrom(options);
    this.logger = (options.logger ?? silentLogger).child({ sessionId: this.session.id });
  }

  /**
   * Build a router over a store with a fresh session and the store's agenda.
   */
  static create(options: CreateRouterOptions): ConversationRouter {
    const config = options.config ?? DEFAULT_ENGINE_CONFIG;
    const hierarchy = options.hierarchy ?? HierarchyIndex.fromStore(options.store);
    return new ConversationRouter({
      agenda: hierarchy.buildAgenda(),
      matcher: new Matcher(options.store, config.matcher),
      config,
      logger: options.logger,
    });
  }

  get agenda(): ReadonlyArray<AgendaNode> {
    return this.session.agenda;
  }

  currentNode(): AgendaNode | undefined {
    return this.session.currentNode();
  }

  isComplete(): boolean {
    return this.session.isComplete;
  }

  progress(): Progress {
    return this.session.progress();
  }

  /**
   * Analyse one user utterance on the current node.
   *
   * @throws ConversationStateError when the session is complete
   */
  processTurn(utterance: string): TurnResult {
    const node = this.session.currentNode();
    if (!node) {
      throw new ConversationStateError("Conversation is complete; no further turns accepted");
    }

    const { capture, routing } = this.config;

    const turnCount = this.session.recordTurn(node.id);
    const explicitMoveOn = detectMoveOn(utterance, routing.moveOnPhrases);
    const isLooping = turnCount >= routing.loopTurnCap;

    const matches = this.matcher.findMatches(utterance, capture.topK);
    const matchedFieldIds: string[] = [];

    const top = matches[0];
    if (top && top.score >= capture.threshold) {
      for (const match of matches) {
        if (matchedFieldIds.length >= capture.limit) {
          break;
        }
        if (match.score < capture.threshold) {
          continue;
        }
        const importance = match.score > capture.highImportanceThreshold ? "high" : "medium";
        this.session.priorities.add(match.field.id, importance, utterance, utterance);
        matchedFieldIds.push(match.field.id);
      }
    }

    if (explicitMoveOn) {
      this.session.markDiscussed(node.id);
    }

    const shouldMoveOn = explicitMoveOn || isLooping;

    this.logger.debug("Turn analysed", {
      nodeId: node.id,
      turnCount,
      explicitMoveOn,
      isLooping,
      matchCount: matches.length,
      captured: matchedFieldIds,
    });

    return {
      nodeId: node.id,
      turnCount,
      explicitMoveOn,
      isLooping,
      matches,
      matchedFieldIds,
      shouldMoveOn,
    };
  }

  /**
   * Apply a turn analysis and the generator's classification to the
   * agenda position.
   *
   * @throws ConversationStateError when the session is complete or the
   *   turn was analysed on a different node
   */
  route(turn: TurnResult, classification: Classification): RoutingDecision {
    const node = this.session.currentNode();
    if (!node) {
      throw new ConversationStateError("Conversation is complete; nothing to route");
    }
    if (turn.nodeId !== node.id) {
      throw new ConversationStateError(
        `Turn was analysed on "${turn.nodeId}" but the current node is "${node.id}"`
      );
    }

    this.session.noteMentionedIssues(classification.mentionedIssues);

    const from = this.session.index;

    if (turn.shouldMoveOn) {
      return this.moveTo(from, this.issueNavigationTarget(from), true);
    }

    switch (classification.suggestedAction) {
      case "SKIP_PILLAR": {
        const to = this.nextPillarStart(from);
        if (to >= this.agenda.length) {
          return this.moveTo(from, to, false);
        }
        this.session.moveTo(to);
        this.logger.info("Skipped rest of pillar", {
          from: node.id,
          to: this.agenda[to]?.id,
        });
        return { kind: "skip_pillar", from, to };
      }
      case "NEXT_ISSUE":
        return this.moveTo(from, this.issueNavigationTarget(from), false);
      case "CONTINUE":
        return { kind: "stay", index: from };
    }
  }

  /**
   * From a pillar intro: the first issue of this pillar the user mentioned,
   * else the next pillar's intro. From an issue: the next node.
   */
  private issueNavigationTarget(index: number): number {
    const node = this.agenda[index];
    if (!node) {
      return this.agenda.length;
    }

    switch (node.kind) {
      case "pillar_intro": {
        for (let i = index + 1; i < this.agenda.length; i++) {
          const candidate = this.agenda[i];
          if (!candidate || candidate.pillar !== node.pillar) {
            break;
          }
          if (candidate.kind === "issue" && this.session.isIssueMentioned(candidate.issue)) {
            return i;
          }
        }
        return this.nextPillarStart(index);
      }
      case "issue":
        return index + 1;
    }
  }

  private nextPillarStart(index: number): number {
    for (let i = index + 1; i < this.agenda.length; i++) {
      if (this.agenda[i]?.kind === "pillar_intro") {
        return i;
      }
    }
    return this.agenda.length;
  }

  private moveTo(from: number, to: number, forced: boolean): RoutingDecision {
    const fromId = this.agenda[from]?.id;
    this.session.moveTo(to);

    if (this.session.isComplete) {
      this.logger.info("Conversation complete", { from: fromId, forced });
      return { kind: "complete", from, forced };
    }

    this.logger.info("Advanced agenda", { from: fromId, to: this.agenda[to]?.id, forced });
    return { kind: "advance", from, to, forced };
  }
}
