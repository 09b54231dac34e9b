/**
 * Parsing of the generator's tagged classification reply.
 *
 * Expected shape (tags in any order, MENTIONED_ISSUES optional):
 *
 *   INTEREST_LEVEL: HIGH
 *   SUGGESTED_ACTION: CONTINUE
 *   MENTIONED_ISSUES: Water Management, Climate Exposure
 *   RESPONSE: That makes sense...
 *
 * RESPONSE may run over several lines, up to the next tag. Parsing never
 * throws: unknown values fall back to MEDIUM / CONTINUE and a reply with no
 * RESPONSE tag is used as the response text verbatim.
 */

import { InterestLevel, SuggestedAction } from "../config/engine/enums.js";

export interface Classification {
  readonly interestLevel: InterestLevel;
  readonly suggestedAction: SuggestedAction;
  readonly responseText: string;
  readonly mentionedIssues: readonly string[];
  /** False when no tag at all was recognised */
  readonly parsed: boolean;
}

type Tag = "INTEREST_LEVEL" | "SUGGESTED_ACTION" | "MENTIONED_ISSUES" | "RESPONSE";

// Tolerates markdown emphasis around the tag, e.g. "**RESPONSE:** ..."
const TAG_LINE =
  /^[\s*_]*(INTEREST_LEVEL|SUGGESTED_ACTION|MENTIONED_ISSUES|RESPONSE)[\s*_]*:[\s*_]*(.*)$/i;

const EMPTY_MENTIONS = new Set(["none", "n/a", "na", "null", "-"]);

function toTag(value: string): Tag | undefined {
  switch (value.toUpperCase()) {
    case "INTEREST_LEVEL":
      return "INTEREST_LEVEL";
    case "SUGGESTED_ACTION":
      return "SUGGESTED_ACTION";
    case "MENTIONED_ISSUES":
      return "MENTIONED_ISSUES";
    case "RESPONSE":
      return "RESPONSE";
    default:
      return undefined;
  }
}

/**
 * "next issue." / "Next-Issue" → "NEXT_ISSUE"
 */
function normalizeEnumValue(value: string): string {
  return value
    .trim()
    .replace(/[.*_!]+$/g, "")
    .trim()
    .toUpperCase()
    .replace(/[\s-]+/g, "_");
}

export function parseInterestLevel(value: string): InterestLevel {
  const result = InterestLevel.safeParse(normalizeEnumValue(value));
  return result.success ? result.data : "MEDIUM";
}

export function parseSuggestedAction(value: string): SuggestedAction {
  const result = SuggestedAction.safeParse(normalizeEnumValue(value));
  return result.success ? result.data : "CONTINUE";
}

export function parseMentionedIssues(value: string): string[] {
  const issues: string[] = [];
  for (const part of value.split(/[,;]/)) {
    const name = part.trim().replace(/^["'[]+|["'\].]+$/g, "").trim();
    if (name && !EMPTY_MENTIONS.has(name.toLowerCase())) {
      issues.push(name);
    }
  }
  return issues;
}

export function parseClassification(text: string): Classification {
  let interestLevel: InterestLevel = "MEDIUM";
  let suggestedAction: SuggestedAction = "CONTINUE";
  let mentionedIssues: string[] = [];
  let responseLines: string[] | undefined;
  let current: Tag | undefined;
  let parsed = false;

  for (const line of text.split(/\r?\n/)) {
    const match = TAG_LINE.exec(line);
    const tag = match?.[1] ? toTag(match[1]) : undefined;

    if (!tag) {
      if (current === "RESPONSE" && responseLines) {
        responseLines.push(line);
      }
      continue;
    }

    parsed = true;
    current = tag;
    const value = match?.[2] ?? "";

    switch (tag) {
      case "INTEREST_LEVEL":
        interestLevel = parseInterestLevel(value);
        break;
      case "SUGGESTED_ACTION":
        suggestedAction = parseSuggestedAction(value);
        break;
      case "MENTIONED_ISSUES":
        mentionedIssues = parseMentionedIssues(value);
        break;
      case "RESPONSE":
        responseLines = [value];
        break;
    }
  }

  const responseText = responseLines ? responseLines.join("\n").trim() : text.trim();

  return { interestLevel, suggestedAction, responseText, mentionedIssues, parsed };
}
