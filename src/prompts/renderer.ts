/**
 * Prompt renderer.
 *
 * Purely mechanical substitution: every placeholder in the template must
 * have a value, otherwise rendering fails before anything is sent to the
 * generator. Extra variables are ignored.
 */

import type { PromptTemplate } from "./template.js";
import { PLACEHOLDER_RE, extractVariables } from "./template.js";

// ---------------------------------------------------------------------------
// Errors
// ---------------------------------------------------------------------------

export class PromptRenderError extends Error {
  constructor(
    public readonly templateName: string,
    public readonly missingVariables: string[],
    message?: string
  ) {
    super(
      message ??
        `Cannot render template "${templateName}": missing ` +
          `value(s) for: ${missingVariables.join(", ")}`
    );
    this.name = "PromptRenderError";
  }
}

// ---------------------------------------------------------------------------
// Renderer
// ---------------------------------------------------------------------------

export type PromptVariables = Readonly<Record<string, string | number>>;

/**
 * Render a template. Accepts a raw source string for one-off templates.
 *
 * @throws PromptRenderError if any placeholder has no value
 */
export function renderPrompt(
  template: PromptTemplate | string,
  variables: PromptVariables
): string {
  const name = typeof template === "string" ? "(anonymous)" : template.name;
  const source = typeof template === "string" ? template : template.source;
  const names = typeof template === "string" ? extractVariables(source) : template.variables;

  const missing = names.filter((variable) => !Object.hasOwn(variables, variable));
  if (missing.length > 0) {
    throw new PromptRenderError(name, missing);
  }

  return source.replace(PLACEHOLDER_RE, (_match, variable: string) =>
    String(variables[variable] ?? "")
  );
}
