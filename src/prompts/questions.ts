/**
 * Questions and prompts built from agenda nodes.
 */

import type { AgendaNode, IssueAgendaNode } from "../taxonomy/agenda.js";
import {
  CLASSIFICATION_TEMPLATE,
  DEEP_DIVE_TEMPLATE,
  ISSUE_QUESTION_TEMPLATE,
  PILLAR_INTRO_TEMPLATE,
  SYSTEM_PROMPT,
} from "./library.js";
import { renderPrompt } from "./renderer.js";

/**
 * The opening question shown when the agenda reaches a node.
 */
export function nodeQuestion(node: AgendaNode): string {
  switch (node.kind) {
    case "pillar_intro":
      return renderPrompt(PILLAR_INTRO_TEMPLATE, {
        pillar: node.pillar,
        pillarLower: node.pillar.toLowerCase(),
      });
    case "issue":
      return renderPrompt(ISSUE_QUESTION_TEMPLATE, {
        issue: node.issue,
        issueLower: node.issue.toLowerCase(),
        pillar: node.pillar,
      });
  }
}

export function deepDiveQuestion(node: IssueAgendaNode): string {
  return renderPrompt(DEEP_DIVE_TEMPLATE, { issueLower: node.issue.toLowerCase() });
}

export interface ClassificationPromptInput {
  readonly node: AgendaNode;
  readonly utterance: string;
  /** Issue names under the node's pillar */
  readonly issues: readonly string[];
  readonly turnCount: number;
}

export function classificationPrompt(input: ClassificationPromptInput): string {
  const { node } = input;
  return renderPrompt(CLASSIFICATION_TEMPLATE, {
    systemPrompt: SYSTEM_PROMPT,
    topic: node.name,
    pillar: node.pillar,
    turnCount: input.turnCount,
    issueList: input.issues.length > 0 ? input.issues.join(", ") : "NONE",
    utterance: input.utterance,
  });
}
