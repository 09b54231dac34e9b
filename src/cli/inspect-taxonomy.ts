#!/usr/bin/env node
/**
 * CLI command to inspect a taxonomy file.
 *
 * Loads the taxonomy and prints any of:
 * - Load report and hierarchy statistics (default)
 * - The conversation agenda
 * - Ranked matches for a piece of text
 * - The hierarchy context of one field
 * - A priorities export rendered as the Markdown profile
 *
 * Usage:
 *   npx tsx src/cli/inspect-taxonomy.ts [options]
 *   npm run inspect-taxonomy -- [options]
 *
 * Options:
 *   --taxonomy <path>    Taxonomy JSON (default: TAXONOMY_PATH or data/taxonomy.sample.json)
 *   --stats              Print load report and statistics
 *   --agenda             Print the conversation agenda
 *   --match <text>       Rank fields against the text
 *   --top <n>            Number of matches to show (default: matcher default)
 *   --context <fieldId>  Print a field's hierarchy path
 *   --priorities <path>  Render a priorities export as a Markdown profile
 *   --json               Output as JSON
 *   -h, --help           Show help
 *
 * Exit codes:
 *   0 - Success
 *   1 - Taxonomy, priorities or argument error
 */

import { existsSync, realpathSync } from "node:fs";
import { resolve } from "node:path";
import { pathToFileURL } from "node:url";
import { parseArgs } from "node:util";

import { config, DEFAULT_ENGINE_CONFIG } from "../config/index.js";
import { Matcher, type MatchResult } from "../matching/index.js";
import {
  buildPriorityReport,
  formatPriorityReport,
  loadPriorities,
} from "../priorities/index.js";
import {
  formatLoadReport,
  HierarchyIndex,
  loadTaxonomyFile,
  TaxonomyLoadError,
  TaxonomyStore,
  type AgendaNode,
  type HierarchySummary,
} from "../taxonomy/index.js";

// ============================================================
// CLI Parsing
// ============================================================

const HELP = `
Usage: inspect-taxonomy [options]

Options:
  --taxonomy <path>    Taxonomy JSON (default: TAXONOMY_PATH or data/taxonomy.sample.json)
  --stats              Print load report and statistics
  --agenda             Print the conversation agenda
  --match <text>       Rank fields against the text
  --top <n>            Number of matches to show
  --context <fieldId>  Print a field's hierarchy path
  --priorities <path>  Render a priorities export as a Markdown profile
  --json               Output as JSON
  -h, --help           Show this help message
`;

export interface InspectOptions {
  taxonomy: string;
  stats: boolean;
  agenda: boolean;
  match?: string;
  top: number;
  context?: string;
  priorities?: string;
  json: boolean;
  help: boolean;
}

export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CliUsageError";
  }
}

/**
 * Parse argv (without the node and script entries).
 * Falls back to --stats when no other view is requested.
 *
 * @throws CliUsageError on a non-numeric or negative --top
 */
export function parseCliArgs(
  args: string[],
  defaultTaxonomyPath: string = config.taxonomyPath
): InspectOptions {
  const { values } = parseArgs({
    args,
    options: {
      taxonomy: { type: "string", default: defaultTaxonomyPath },
      stats: { type: "boolean", default: false },
      agenda: { type: "boolean", default: false },
      match: { type: "string" },
      top: { type: "string" },
      context: { type: "string" },
      priorities: { type: "string" },
      json: { type: "boolean", default: false },
      help: { type: "boolean", short: "h", default: false },
    },
  });

  let top = DEFAULT_ENGINE_CONFIG.matcher.defaultTopK;
  if (values.top !== undefined) {
    top = Number.parseInt(values.top, 10);
    if (!Number.isInteger(top) || top < 0 || String(top) !== values.top.trim()) {
      throw new CliUsageError(`--top must be a non-negative integer, got "${values.top}"`);
    }
  }

  const anyView =
    values.agenda ||
    values.match !== undefined ||
    values.context !== undefined ||
    values.priorities !== undefined;

  return {
    taxonomy: values.taxonomy ?? defaultTaxonomyPath,
    stats: values.stats || !anyView,
    agenda: values.agenda,
    top,
    json: values.json,
    help: values.help,
    ...(values.match !== undefined ? { match: values.match } : {}),
    ...(values.context !== undefined ? { context: values.context } : {}),
    ...(values.priorities !== undefined ? { priorities: values.priorities } : {}),
  };
}

// ============================================================
// Formatting
// ============================================================

export function formatStats(store: TaxonomyStore, summary: HierarchySummary): string {
  const stats = store.stats();
  const lines = [
    `Fields:         ${stats.totalFields}`,
    `Pillars:        ${summary.pillarCount} (${stats.pillars.join(", ")})`,
    `Issues:         ${summary.issueCount}`,
    `Sub-issues:     ${summary.subIssueCount}`,
  ];
  return lines.join("\n");
}

export function formatAgenda(agenda: readonly AgendaNode[]): string {
  const lines: string[] = [];
  const width = String(agenda.length).length;

  agenda.forEach((node, i) => {
    const position = String(i + 1).padStart(width, " ");
    switch (node.kind) {
      case "pillar_intro":
        lines.push(`${position}. [${node.pillar}] ${node.id}`);
        break;
      case "issue":
        lines.push(`${position}.   ${node.issue} (${node.id})`);
        break;
    }
  });

  return lines.join("\n");
}

export function formatMatches(matches: readonly MatchResult[], matcher: Matcher): string {
  if (matches.length === 0) {
    return "No matching fields.";
  }

  return matches
    .map((match, i) => `${i + 1}. [${match.score}] ${matcher.fieldContext(match.field.id)}`)
    .join("\n");
}

// ============================================================
// Main
// ============================================================

const COLORS = {
  reset: "\x1b[0m",
  bold: "\x1b[1m",
  red: "\x1b[31m",
};

const useColors = process.stdout.isTTY && !process.env.NO_COLOR;

function c(color: keyof typeof COLORS, text: string): string {
  return useColors ? `${COLORS[color]}${text}${COLORS.reset}` : text;
}

function printSection(title: string, body: string): void {
  console.log("");
  console.log(c("bold", `── ${title} ──`));
  console.log(body);
}

function main(): void {
  const options = parseCliArgs(process.argv.slice(2));

  if (options.help) {
    console.log(HELP);
    return;
  }

  const loaded = loadTaxonomyFile(resolve(options.taxonomy));
  const store = TaxonomyStore.create(loaded.records);
  const hierarchy = HierarchyIndex.fromStore(store);
  const matcher = new Matcher(store);

  const agenda = hierarchy.buildAgenda();
  const matches = options.match !== undefined ? matcher.findMatches(options.match, options.top) : undefined;
  const report =
    options.priorities !== undefined
      ? buildPriorityReport(loadPriorities(resolve(options.priorities)), store)
      : undefined;

  if (options.json) {
    const output = {
      ...(options.stats ? { load: loaded.stats, stats: store.stats(), summary: hierarchy.summary() } : {}),
      ...(options.agenda ? { agenda } : {}),
      ...(matches
        ? { matches: matches.map((m) => ({ fieldId: m.field.id, score: m.score, context: matcher.fieldContext(m.field.id) })) }
        : {}),
      ...(options.context !== undefined ? { context: matcher.fieldContext(options.context) } : {}),
      ...(report ? { report } : {}),
    };
    console.log(JSON.stringify(output, null, 2));
    return;
  }

  if (options.stats) {
    console.log(formatLoadReport(loaded));
    printSection("Hierarchy", formatStats(store, hierarchy.summary()));
  }
  if (options.agenda) {
    printSection(`Agenda (${agenda.length} nodes)`, formatAgenda(agenda));
  }
  if (matches && options.match !== undefined) {
    printSection(`Matches for "${options.match}"`, formatMatches(matches, matcher));
  }
  if (options.context !== undefined) {
    printSection("Field context", matcher.fieldContext(options.context));
  }
  if (report) {
    console.log("");
    console.log(formatPriorityReport(report));
  }
}

/**
 * True when the script Node was started with is this module. An installed
 * `bin` is a symlink, so the path is resolved before comparing.
 */
export function isEntryPoint(scriptPath: string | undefined, moduleUrl: string): boolean {
  if (scriptPath === undefined || !existsSync(scriptPath)) {
    return false;
  }
  return pathToFileURL(realpathSync(scriptPath)).href === moduleUrl;
}

if (isEntryPoint(process.argv[1], import.meta.url)) {
  try {
    main();
  } catch (err) {
    if (err instanceof TaxonomyLoadError) {
      console.error(c("red", err.format()));
    } else {
      const message = err instanceof Error ? err.message : String(err);
      console.error(c("red", `Error: ${message}`));
    }
    process.exit(1);
  }
}
