/**
 * Domain enumerations for the preference engine.
 *
 * These are closed sets. Every consumer switches over them exhaustively,
 * so adding a member is a compile error until each site handles it.
 */

import { z } from "zod";

/**
 * Top-level taxonomy categories, in canonical conversation order.
 *
 * Pillar names found in a taxonomy but missing from this list are left out
 * of the conversation agenda. They stay queryable through TaxonomyStore.
 */
export const Pillar = z.enum(["Environmental", "Social", "Governance"]);
export type Pillar = z.infer<typeof Pillar>;

/** Canonical pillar order used by the hierarchy and agenda. */
export const CANONICAL_PILLARS: readonly Pillar[] = Pillar.options;

/**
 * Importance attached to a tracked field.
 * Listed from most to least important; reports follow this order.
 */
export const ImportanceTier = z.enum(["critical", "high", "medium", "low"]);
export type ImportanceTier = z.infer<typeof ImportanceTier>;

export const IMPORTANCE_TIERS: readonly ImportanceTier[] = ImportanceTier.options;

/**
 * Interest the user showed in the current topic, as judged by the
 * text generator's classification.
 */
export const InterestLevel = z.enum(["HIGH", "MEDIUM", "LOW", "UNCERTAIN"]);
export type InterestLevel = z.infer<typeof InterestLevel>;

/**
 * Navigation the text generator suggests after a user turn.
 *
 *   CONTINUE   : keep probing the current node
 *   NEXT_ISSUE : move on to the next issue
 *   SKIP_PILLAR: drop the remaining issues of this pillar
 */
export const SuggestedAction = z.enum(["CONTINUE", "NEXT_ISSUE", "SKIP_PILLAR"]);
export type SuggestedAction = z.infer<typeof SuggestedAction>;
