/**
 * Conversation flow: session state, routing, classification and the
 * dialogue driver.
 */

export {
  ConversationSession,
  ConversationStateError,
  type ConversationSessionOptions,
  type Progress,
} from "./session.js";

export { detectMoveOn, findMoveOnPhrase } from "./move-on.js";

export {
  parseClassification,
  parseInterestLevel,
  parseSuggestedAction,
  parseMentionedIssues,
  type Classification,
} from "./classification.js";

export {
  ConversationRouter,
  type ConversationRouterOptions,
  type RouterSessionSource,
  type CreateRouterOptions,
  type RoutingDecision,
  type TurnResult,
} from "./router.js";

export {
  DialogueDriver,
  type DialogueDriverOptions,
  type DialogueTurn,
  type TextGenerator,
} from "./driver.js";
