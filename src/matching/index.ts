/**
 * Free-text to taxonomy field matching.
 */

export {
  Matcher,
  SCORE_WEIGHTS,
  type MatchResult,
  type ScoreBreakdown,
} from "./matcher.js";
export { TOPIC_BOOSTS, CARBON_BOOSTS, carbonBoost, keywordBoost, type TopicBoost } from "./keywords.js";
