/**
 * Prompt templates and variable extraction.
 *
 * A template is plain text with `{{variable}}` placeholders:
 *
 *   Let's talk about **{{issue}}** ({{pillar}}).
 *
 * Rules:
 *   - Placeholders use double-brace syntax: {{ and }}
 *   - Names are alphanumeric (underscores and dots allowed), starting with a letter
 *   - Whitespace inside braces is trimmed: {{ issue }} is valid
 *   - Duplicate placeholders are fine (same value rendered)
 */

// ---------------------------------------------------------------------------
// Regex
// ---------------------------------------------------------------------------

/**
 * Matches `{{name}}` with optional inner whitespace.
 * Captures the trimmed name in group 1.
 */
export const PLACEHOLDER_RE = /\{\{\s*([a-zA-Z][a-zA-Z0-9_.]*)\s*\}\}/g;

// ---------------------------------------------------------------------------
// Template
// ---------------------------------------------------------------------------

export interface PromptTemplate {
  /** Used in error messages */
  readonly name: string;
  /** Raw text with placeholders intact */
  readonly source: string;
  /** Unique placeholder names, sorted */
  readonly variables: readonly string[];
}

/**
 * Extract all `{{…}}` placeholder names from a template string.
 * Returns deduplicated, sorted names.
 */
export function extractVariables(source: string): string[] {
  const found = new Set<string>();
  for (const match of source.matchAll(PLACEHOLDER_RE)) {
    if (match[1]) {
      found.add(match[1]);
    }
  }
  return [...found].sort();
}

export function defineTemplate(name: string, source: string): PromptTemplate {
  return Object.freeze({
    name,
    source,
    variables: Object.freeze(extractVariables(source)),
  });
}
