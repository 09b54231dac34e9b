/**
 * Field matcher.
 *
 * Scores free text against every taxonomy field with weighted lexical
 * overlap plus domain keyword boosts:
 *
 *   +10  field name appears verbatim in the input
 *   +3   per whitespace token shared with the field name
 *   +5   issue name appears in the input
 *   +4   sub-issue name appears in the input
 *   +2   pillar name appears in the input
 *   +n   keyword boosts (see keywords.ts)
 *
 * Everything is lowercased first. Scores are unbounded and never negative.
 */

import type { FieldRecord } from "../taxonomy/schema.js";
import type { TaxonomyStore } from "../taxonomy/store.js";
import type { MatcherSettings } from "../config/engine/schema.js";
import { DEFAULT_ENGINE_CONFIG } from "../config/engine/defaults.js";
import { keywordBoost } from "./keywords.js";

export const SCORE_WEIGHTS = {
  exactName: 10,
  sharedToken: 3,
  issue: 5,
  subIssue: 4,
  pillar: 2,
} as const;

export interface MatchResult {
  readonly field: Readonly<FieldRecord>;
  readonly score: number;
}

/**
 * Per-component score, for diagnostics.
 */
export interface ScoreBreakdown {
  exactName: number;
  tokenOverlap: number;
  issue: number;
  subIssue: number;
  pillar: number;
  keywordBoost: number;
  total: number;
}

function tokenize(text: string): Set<string> {
  return new Set(text.split(/\s+/).filter((token) => token.length > 0));
}

function containsPhrase(input: string, phrase: string): boolean {
  const needle = phrase.toLowerCase();
  return needle.length > 0 && input.includes(needle);
}

export class Matcher {
  private readonly store: TaxonomyStore;
  private readonly defaultTopK: number;

  constructor(store: TaxonomyStore, settings: MatcherSettings = DEFAULT_ENGINE_CONFIG.matcher) {
    this.store = store;
    this.defaultTopK = settings.defaultTopK;
  }

  /**
   * Score one field against the input text.
   */
  score(text: string, field: Readonly<FieldRecord>): number {
    return this.explain(text, field).total;
  }

  /**
   * Score one field and return each component.
   */
  explain(text: string, field: Readonly<FieldRecord>): ScoreBreakdown {
    const input = text.toLowerCase();
    const inputTokens = tokenize(input);
    const fieldName = field.name.toLowerCase();

    const exactName = containsPhrase(input, fieldName) ? SCORE_WEIGHTS.exactName : 0;

    let shared = 0;
    for (const token of tokenize(fieldName)) {
      if (inputTokens.has(token)) {
        shared++;
      }
    }
    const tokenOverlap = shared * SCORE_WEIGHTS.sharedToken;

    const issue = containsPhrase(input, field.issue) ? SCORE_WEIGHTS.issue : 0;
    const subIssue = containsPhrase(input, field.subIssue) ? SCORE_WEIGHTS.subIssue : 0;
    const pillar = containsPhrase(input, field.pillar) ? SCORE_WEIGHTS.pillar : 0;
    const boost = keywordBoost(input, inputTokens, fieldName);

    return {
      exactName,
      tokenOverlap,
      issue,
      subIssue,
      pillar,
      keywordBoost: boost,
      total: exactName + tokenOverlap + issue + subIssue + pillar + boost,
    };
  }

  /**
   * Rank every field against the input.
   *
   * @returns at most `topK` matches, highest score first; zero scores are
   *   dropped and equal scores keep store order
   */
  findMatches(text: string, topK: number = this.defaultTopK): MatchResult[] {
    if (topK <= 0) {
      return [];
    }

    const scored: MatchResult[] = [];
    for (const field of this.store.fields) {
      const score = this.score(text, field);
      if (score > 0) {
        scored.push({ field, score });
      }
    }

    // Array.prototype.sort is stable, so ties keep store order.
    scored.sort((a, b) => b.score - a.score);
    return scored.slice(0, topK);
  }

  /**
   * Match a keyword list as if it were one space-separated sentence.
   */
  findByKeywords(keywords: readonly string[], topK: number = this.defaultTopK): MatchResult[] {
    return this.findMatches(keywords.join(" "), topK);
  }

  /**
   * Human-readable path for a field, e.g.
   * "Pillar: Environmental > Issue: Water Management > Field: Water Quality (ENV-W-002)".
   * Unknown IDs produce a "not found" message rather than an error.
   */
  fieldContext(id: string): string {
    const field = this.store.get(id);
    if (!field) {
      return `Field ${id} not found`;
    }

    const parts: string[] = [];
    if (field.pillar) {
      parts.push(`Pillar: ${field.pillar}`);
    }
    if (field.issue) {
      parts.push(`Issue: ${field.issue}`);
    }
    if (field.subIssue) {
      parts.push(`Sub-Issue: ${field.subIssue}`);
    }
    parts.push(`Field: ${field.name} (${field.id})`);

    return parts.join(" > ");
  }
}
