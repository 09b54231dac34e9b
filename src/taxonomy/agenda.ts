/**
 * Conversation agenda nodes.
 *
 * The agenda is the fixed walk a conversation follows: for each pillar, one
 * broad intro node, then one node per issue under that pillar. Sub-issues
 * are never shown to the user; the matcher picks up field-level detail in
 * the background.
 */

import type { Pillar } from "../config/engine/enums.js";

/**
 * Broad opening question for a pillar.
 */
export interface PillarIntroNode {
  readonly kind: "pillar_intro";
  /** Stable ID, e.g. "environmental_intro" */
  readonly id: string;
  readonly name: string;
  readonly pillar: Pillar;
  readonly description: string;
}

/**
 * One issue within a pillar.
 */
export interface IssueAgendaNode {
  readonly kind: "issue";
  /** Stable ID, e.g. "social_diversity_and_inclusion" */
  readonly id: string;
  readonly name: string;
  readonly pillar: Pillar;
  readonly issue: string;
  readonly description: string;
}

export type AgendaNode = PillarIntroNode | IssueAgendaNode;

function slug(name: string): string {
  return name.toLowerCase().replace(/ /g, "_").replace(/&/g, "and");
}

export function pillarIntroNode(pillar: Pillar): PillarIntroNode {
  return {
    kind: "pillar_intro",
    id: `${slug(pillar)}_intro`,
    name: pillar,
    pillar,
    description: `${pillar} topics in general`,
  };
}

export function issueAgendaNode(pillar: Pillar, issue: string): IssueAgendaNode {
  return {
    kind: "issue",
    id: `${slug(pillar)}_${slug(issue)}`,
    name: issue,
    pillar,
    issue,
    description: `${issue} within ${pillar}`,
  };
}
