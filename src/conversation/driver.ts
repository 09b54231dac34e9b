/**
 * Dialogue driver.
 *
 * Runs a whole conversation on top of the router: asks the agenda's
 * questions, sends each user turn to a text generator for classification,
 * routes on the result and composes the next message.
 *
 * The generator is the only async dependency and is injected, so any
 * model client (or a scripted fake in tests) can sit behind it.
 */

import type { Logger } from "../logging/logger.js";
import { silentLogger } from "../logging/logger.js";
import type { PriorityReport } from "../priorities/report.js";
import { buildPriorityReport } from "../priorities/report.js";
import { CLOSING_MESSAGE, WELCOME_MESSAGE } from "../prompts/library.js";
import { classificationPrompt, deepDiveQuestion, nodeQuestion } from "../prompts/questions.js";
import type { AgendaNode } from "../taxonomy/agenda.js";
import type { HierarchyIndex } from "../taxonomy/hierarchy.js";
import type { TaxonomyStore } from "../taxonomy/store.js";
import type { Classification } from "./classification.js";
import { parseClassification } from "./classification.js";
import type { ConversationRouter, RoutingDecision, TurnResult } from "./router.js";
import { ConversationStateError } from "./session.js";

export interface TextGenerator {
  generate(prompt: string): Promise<string>;
}

export interface DialogueTurn {
  readonly turn: TurnResult;
  readonly classification: Classification;
  readonly decision: RoutingDecision;
  /** Message to show the user next */
  readonly message: string;
  readonly complete: boolean;
}

export interface DialogueDriverOptions {
  readonly router: ConversationRouter;
  readonly store: TaxonomyStore;
  readonly hierarchy: HierarchyIndex;
  readonly generator: TextGenerator;
  readonly logger?: Logger;
}

export class DialogueDriver {
  private readonly router: ConversationRouter;
  private readonly store: TaxonomyStore;
  private readonly hierarchy: HierarchyIndex;
  private readonly generator: TextGenerator;
  private readonly logger: Logger;

  constructor(options: DialogueDriverOptions) {
    this.router = options.router;
    this.store = options.store;
    this.hierarchy = options.hierarchy;
    this.generator = options.generator;
    this.logger = (options.logger ?? silentLogger).child({ sessionId: options.router.session.id });
  }

  /**
   * Welcome message followed by the first question.
   */
  start(): string {
    const node = this.router.currentNode();
    return joinParagraphs([WELCOME_MESSAGE, node ? nodeQuestion(node) : CLOSING_MESSAGE]);
  }

  /**
   * Handle one user message.
   *
   * The turn is only recorded once the generator has replied, so a failed
   * call leaves the session untouched and the same message can be retried.
   *
   * @throws ConversationStateError when the conversation is already complete
   */
  async respond(utterance: string): Promise<DialogueTurn> {
    const node = this.router.currentNode();
    if (!node) {
      throw new ConversationStateError("Conversation is complete; no further turns accepted");
    }

    const prompt = classificationPrompt({
      node,
      utterance,
      issues: this.hierarchy.issues(node.pillar),
      turnCount: this.router.session.turnCount(node.id) + 1,
    });

    const raw = await this.generator.generate(prompt);
    const turn = this.router.processTurn(utterance);
    const classification = parseClassification(raw);
    if (!classification.parsed) {
      this.logger.warn("Classification reply had no recognised tags", { nodeId: node.id });
    }

    const decision = this.router.route(turn, classification);
    const message = this.compose(node, classification, decision);

    return {
      turn,
      classification,
      decision,
      message,
      complete: this.router.isComplete(),
    };
  }

  /**
   * Priority report for the conversation so far.
   */
  report(): PriorityReport {
    return buildPriorityReport(this.router.session.priorities, this.store, {
      progress: this.router.progress(),
    });
  }

  private compose(
    node: AgendaNode,
    classification: Classification,
    decision: RoutingDecision
  ): string {
    const parts = [classification.responseText];

    switch (decision.kind) {
      case "stay":
        if (node.kind === "issue" && this.wantsDeepDive(classification)) {
          const session = this.router.session;
          if (!session.wasDeepDiveOffered(node.id)) {
            session.markDeepDiveOffered(node.id);
            parts.push(deepDiveQuestion(node));
          }
        }
        break;
      case "advance":
      case "skip_pillar": {
        const next = this.router.currentNode();
        if (next) {
          parts.push(nodeQuestion(next));
        }
        break;
      }
      case "complete":
        parts.push(CLOSING_MESSAGE);
        break;
    }

    return joinParagraphs(parts);
  }

  private wantsDeepDive(classification: Classification): boolean {
    switch (classification.interestLevel) {
      case "HIGH":
        return true;
      case "MEDIUM":
      case "LOW":
      case "UNCERTAIN":
        return false;
    }
  }
}

function joinParagraphs(parts: readonly string[]): string {
  return parts.filter((part) => part.trim() !== "").join("\n\n");
}
