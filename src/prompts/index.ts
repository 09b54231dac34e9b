/**
 * Prompt templates and rendering.
 */

export { defineTemplate, extractVariables, type PromptTemplate } from "./template.js";

export { renderPrompt, PromptRenderError, type PromptVariables } from "./renderer.js";

export {
  SYSTEM_PROMPT,
  WELCOME_MESSAGE,
  CLOSING_MESSAGE,
  PILLAR_INTRO_TEMPLATE,
  ISSUE_QUESTION_TEMPLATE,
  DEEP_DIVE_TEMPLATE,
  CLASSIFICATION_TEMPLATE,
} from "./library.js";

export {
  nodeQuestion,
  deepDiveQuestion,
  classificationPrompt,
  type ClassificationPromptInput,
} from "./questions.js";
