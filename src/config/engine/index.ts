/**
 * Engine configuration module.
 *
 * Provides schema-validated, immutable thresholds for matching, capture
 * and routing, plus the closed domain enums.
 *
 * Usage:
 *   import { loadEngineConfig, DEFAULT_ENGINE_CONFIG } from "./config/engine/index.js";
 *
 *   const config = loadEngineConfig(DEFAULT_ENGINE_CONFIG);
 *   const patient = mergeEngineConfig({ routing: { loopTurnCap: 8 } });
 */

// Domain enums
export {
  Pillar,
  CANONICAL_PILLARS,
  ImportanceTier,
  IMPORTANCE_TIERS,
  InterestLevel,
  SuggestedAction,
} from "./enums.js";

// Schema types
export type {
  EngineConfig,
  EngineConfigOverrides,
  MatcherSettings,
  CaptureSettings,
  RoutingSettings,
} from "./schema.js";

// Schema objects
export {
  EngineConfigSchema,
  MatcherSettingsSchema,
  CaptureSettingsSchema,
  RoutingSettingsSchema,
} from "./schema.js";

// Loader and validation
export {
  loadEngineConfig,
  loadEngineConfigFile,
  mergeEngineConfig,
  validateEngineConfig,
  EngineConfigError,
  type ConfigValidationIssue,
} from "./loader.js";

// Defaults
export { DEFAULT_ENGINE_CONFIG } from "./defaults.js";
