/**
 * Engine configuration schema definition.
 *
 * Matcher, capture and routing thresholds. The config is validated once
 * and then read-only; sessions sharing a taxonomy share one frozen
 * EngineConfig.
 */

import { z } from "zod";

/**
 * Matcher defaults.
 */
export const MatcherSettingsSchema = z
  .object({
    /** Result count for findMatches() when the caller passes none */
    defaultTopK: z
      .number()
      .int()
      .min(1)
      .describe("Default number of ranked matches returned per query"),
  })
  .strict();

export type MatcherSettings = z.infer<typeof MatcherSettingsSchema>;

/**
 * When and how a user turn is captured into the priority tracker.
 */
export const CaptureSettingsSchema = z
  .object({
    /** Matches requested from the matcher per turn */
    topK: z
      .number()
      .int()
      .min(1)
      .describe("Ranked matches examined on every turn"),

    /** Minimum score for a match to be tracked */
    threshold: z
      .number()
      .min(0)
      .describe("A turn captures nothing unless its top match reaches this score"),

    /** Scores strictly above this are tracked as "high", others as "medium" */
    highImportanceThreshold: z
      .number()
      .min(0)
      .describe("Score above which a captured field is tracked with high importance"),

    /** Maximum number of fields captured from one turn */
    limit: z
      .number()
      .int()
      .min(1)
      .describe("Maximum fields upserted into the tracker per turn"),
  })
  .strict()
  .refine((s) => s.highImportanceThreshold >= s.threshold, {
    message: "highImportanceThreshold must not be below threshold",
    path: ["highImportanceThreshold"],
  });

export type CaptureSettings = z.infer<typeof CaptureSettingsSchema>;

/**
 * Turn routing and loop prevention.
 */
export const RoutingSettingsSchema = z
  .object({
    /** Turn count on one node at which the router forces a move */
    loopTurnCap: z
      .number()
      .int()
      .min(1)
      .describe("Turns on a single agenda node before the router moves on regardless"),

    /** Phrases that count as an explicit request to move on */
    moveOnPhrases: z
      .array(z.string().trim().min(1))
      .min(1)
      .describe("Case-insensitive substrings that signal the user wants the next topic"),
  })
  .strict();

export type RoutingSettings = z.infer<typeof RoutingSettingsSchema>;

/**
 * Complete engine configuration.
 */
export const EngineConfigSchema = z
  .object({
    matcher: MatcherSettingsSchema,
    capture: CaptureSettingsSchema,
    routing: RoutingSettingsSchema,
  })
  .strict();

export type EngineConfig = z.infer<typeof EngineConfigSchema>;

/**
 * Partial overrides, merged section by section over a base config.
 */
export interface EngineConfigOverrides {
  matcher?: Partial<MatcherSettings>;
  capture?: Partial<CaptureSettings>;
  routing?: Partial<RoutingSettings>;
}
