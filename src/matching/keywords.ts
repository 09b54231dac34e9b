/**
 * Domain keyword boosts.
 *
 * A boost applies when the input mentions any of a topic's keywords AND the
 * field's display name contains one of the topic's field terms. Matching is
 * plain lowercase substring search on both sides.
 *
 * Carbon is handled separately because "carbon dioxide", "carbon monoxide"
 * and generic "carbon emissions" must not bleed into each other.
 */

export interface TopicBoost {
  readonly topic: string;
  /** Any of these in the input arms the boost */
  readonly inputKeywords: readonly string[];
  /** Any of these in the field name receives it */
  readonly fieldTerms: readonly string[];
  readonly boost: number;
}

export const TOPIC_BOOSTS: readonly TopicBoost[] = [
  {
    topic: "water",
    inputKeywords: ["water", "freshwater", "wastewater", "contamination", "pollution"],
    fieldTerms: ["water"],
    boost: 3,
  },
  {
    topic: "greenhouse_gas",
    inputKeywords: ["ghg", "greenhouse gas", "greenhouse"],
    fieldTerms: ["ghg", "greenhouse", "scope 1", "scope 2", "scope 3"],
    boost: 5,
  },
  {
    topic: "energy",
    inputKeywords: ["energy", "renewable", "electricity", "fuel"],
    fieldTerms: ["energy", "electricity"],
    boost: 3,
  },
  {
    topic: "waste",
    inputKeywords: ["waste", "recycling", "landfill", "hazardous"],
    fieldTerms: ["waste"],
    boost: 3,
  },
  {
    topic: "biodiversity",
    inputKeywords: ["biodiversity", "nature", "ecosystem", "habitat", "species"],
    fieldTerms: ["biodiversity", "natural capital"],
    boost: 3,
  },
];

export const CARBON_BOOSTS = {
  /** Explicit CO2 mention → CO2-named field */
  dioxide: 5,
  /** Explicit CO mention → CO-named field */
  monoxide: 5,
  /** Generic carbon emissions → GHG / scope-named field */
  genericGhg: 5,
  /** Generic carbon emissions → CO2-named field */
  genericDioxide: 4,
} as const;

const containsAny = (haystack: string, needles: readonly string[]): boolean =>
  needles.some((needle) => haystack.includes(needle));

/**
 * Tiered carbon boost. The first matching input tier decides; a CO2 mention
 * never boosts a CO field and vice versa.
 *
 * @param input - lowercased user text
 * @param inputTokens - whitespace tokens of `input`
 * @param fieldName - lowercased field display name
 */
export function carbonBoost(input: string, inputTokens: ReadonlySet<string>, fieldName: string): number {
  if (input.includes("carbon dioxide") || input.includes("co2")) {
    return containsAny(fieldName, ["carbon dioxide", "co2"]) ? CARBON_BOOSTS.dioxide : 0;
  }

  if (input.includes("carbon monoxide") || inputTokens.has("co")) {
    return fieldName.includes("carbon monoxide") ? CARBON_BOOSTS.monoxide : 0;
  }

  if (input.includes("carbon") && input.includes("emissions")) {
    if (containsAny(fieldName, ["greenhouse", "ghg", "scope"])) {
      return CARBON_BOOSTS.genericGhg;
    }
    if (fieldName.includes("carbon dioxide")) {
      return CARBON_BOOSTS.genericDioxide;
    }
  }

  return 0;
}

/**
 * Sum of every topic boost plus the carbon boost.
 */
export function keywordBoost(input: string, inputTokens: ReadonlySet<string>, fieldName: string): number {
  let boost = carbonBoost(input, inputTokens, fieldName);

  for (const rule of TOPIC_BOOSTS) {
    if (containsAny(input, rule.inputKeywords) && containsAny(fieldName, rule.fieldTerms)) {
      boost += rule.boost;
    }
  }

  return boost;
}
