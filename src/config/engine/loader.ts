/**
 * Engine configuration loader and validator.
 *
 * Responsible for:
 * - Validating configuration against the schema with fail-fast behavior
 * - Merging partial overrides (from code or a JSON file) over defaults
 * - Freezing configuration to enforce immutability
 */

import { readFileSync } from "node:fs";
import type { ZodIssue } from "zod";
import { EngineConfigSchema, type EngineConfig, type EngineConfigOverrides } from "./schema.js";
import { DEFAULT_ENGINE_CONFIG } from "./defaults.js";

/**
 * Structured validation error for engine configuration.
 */
export class EngineConfigError extends Error {
  public readonly issues: ConfigValidationIssue[];

  constructor(message: string, issues: ConfigValidationIssue[]) {
    super(message);
    this.name = "EngineConfigError";
    this.issues = issues;
  }

  /**
   * Format errors for display.
   */
  format(): string {
    const lines = ["Engine configuration validation failed:"];
    for (const issue of this.issues) {
      const path = issue.path.length > 0 ? issue.path.join(".") : "(root)";
      lines.push(`  - ${path}: ${issue.message}`);
    }
    return lines.join("\n");
  }
}

/**
 * Individual validation issue.
 */
export interface ConfigValidationIssue {
  /** Path to the invalid field */
  path: (string | number)[];
  /** Human-readable error message */
  message: string;
  /** Zod error code, or "io" / "json" for file problems */
  code: string;
}

function formatZodIssues(zodIssues: ZodIssue[]): ConfigValidationIssue[] {
  return zodIssues.map((issue) => ({
    path: issue.path.filter(
      (p): p is string | number => typeof p === "string" || typeof p === "number"
    ),
    message: issue.message,
    code: issue.code,
  }));
}

/**
 * Deep freeze an object to enforce runtime immutability.
 */
function deepFreeze<T extends object>(obj: T): Readonly<T> {
  for (const name of Reflect.ownKeys(obj)) {
    const value: unknown = Reflect.get(obj, name);
    if (value && typeof value === "object" && !Object.isFrozen(value)) {
      deepFreeze(value);
    }
  }

  return Object.freeze(obj);
}

/**
 * Validate and load engine configuration.
 *
 * @param input - Raw configuration object to validate
 * @returns Validated and frozen EngineConfig
 * @throws EngineConfigError if validation fails
 */
export function loadEngineConfig(input: unknown): Readonly<EngineConfig> {
  const result = EngineConfigSchema.safeParse(input);

  if (!result.success) {
    const issues = formatZodIssues(result.error.issues);
    throw new EngineConfigError(
      `Invalid engine configuration: ${issues.length} validation error(s)`,
      issues
    );
  }

  return deepFreeze(result.data);
}

/**
 * Validate engine configuration without loading.
 */
export function validateEngineConfig(input: unknown): {
  success: boolean;
  config?: EngineConfig;
  errors?: ConfigValidationIssue[];
} {
  const result = EngineConfigSchema.safeParse(input);

  if (result.success) {
    return { success: true, config: result.data };
  }

  return {
    success: false,
    errors: formatZodIssues(result.error.issues),
  };
}

/**
 * Merge overrides section by section over a base config and validate.
 *
 * @example
 *   const config = mergeEngineConfig({ routing: { loopTurnCap: 3 } });
 */
export function mergeEngineConfig(
  overrides: EngineConfigOverrides,
  base: EngineConfig = DEFAULT_ENGINE_CONFIG
): Readonly<EngineConfig> {
  return loadEngineConfig({
    matcher: { ...base.matcher, ...overrides.matcher },
    capture: { ...base.capture, ...overrides.capture },
    routing: { ...base.routing, ...overrides.routing },
  });
}

/**
 * Load overrides from a JSON file and merge them over the defaults.
 *
 * @throws EngineConfigError if the file cannot be read, is not JSON, or
 *   produces an invalid config
 */
export function loadEngineConfigFile(filePath: string): Readonly<EngineConfig> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(filePath, "utf-8"));
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new EngineConfigError(`Cannot read engine config ${filePath}: ${message}`, [
      { path: [], message, code: err instanceof SyntaxError ? "json" : "io" },
    ]);
  }

  if (parsed === null || typeof parsed !== "object" || Array.isArray(parsed)) {
    throw new EngineConfigError(`Engine config ${filePath} must be a JSON object`, [
      { path: [], message: "Expected an object", code: "invalid_type" },
    ]);
  }

  const sections: Record<string, unknown> = { ...parsed };
  const { matcher, capture, routing, ...unknownKeys } = sections;

  return loadEngineConfig({
    matcher: { ...DEFAULT_ENGINE_CONFIG.matcher, ...readSection(filePath, "matcher", matcher) },
    capture: { ...DEFAULT_ENGINE_CONFIG.capture, ...readSection(filePath, "capture", capture) },
    routing: { ...DEFAULT_ENGINE_CONFIG.routing, ...readSection(filePath, "routing", routing) },
    // Unknown top-level keys are rejected by the strict schema.
    ...unknownKeys,
  });
}

function readSection(filePath: string, name: string, value: unknown): Record<string, unknown> {
  if (value === undefined) {
    return {};
  }
  if (value === null || typeof value !== "object" || Array.isArray(value)) {
    throw new EngineConfigError(`Engine config ${filePath}: "${name}" must be an object`, [
      { path: [name], message: "Expected an object", code: "invalid_type" },
    ]);
  }
  return { ...value };
}
