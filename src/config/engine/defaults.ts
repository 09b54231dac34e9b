/**
 * Default engine configuration.
 */

import type { EngineConfig } from "./schema.js";

export const DEFAULT_ENGINE_CONFIG: EngineConfig = {
  matcher: {
    defaultTopK: 5,
  },

  capture: {
    topK: 5,
    threshold: 3.0,
    highImportanceThreshold: 6.0,
    limit: 3,
  },

  routing: {
    loopTurnCap: 5,
    moveOnPhrases: [
      "let's move on",
      "lets move on",
      "let us move on",
      "moving on",
      "next topic",
      "next question",
      "that's all",
      "thats all",
      "that is all",
      "done with this",
      "skip this topic",
      "let's skip",
    ],
  },
};
