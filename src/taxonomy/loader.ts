/**
 * Taxonomy loader.
 *
 * Responsible for:
 * - Reading the processed taxonomy JSON
 * - Rejecting documents that are structurally unusable (fatal)
 * - Validating each row and skipping malformed ones (non-fatal, counted)
 * - Producing records that satisfy the FieldRecord invariants
 *
 * Skipped rows are reported with their index and reason so the count can
 * be surfaced in diagnostics; they never abort the load.
 */

import { readFileSync } from "node:fs";
import {
  RawFieldRowSchema,
  TaxonomyDocumentSchema,
  createFieldRecord,
  type FieldRecord,
  type RawFieldRow,
} from "./schema.js";
import { silentLogger, type Logger } from "../logging/index.js";

/**
 * Fatal taxonomy load error.
 */
export class TaxonomyLoadError extends Error {
  public readonly issues: TaxonomyIssue[];

  constructor(message: string, issues: TaxonomyIssue[]) {
    super(message);
    this.name = "TaxonomyLoadError";
    this.issues = issues;
  }

  /**
   * Format errors for display.
   */
  format(): string {
    const lines = ["Taxonomy load failed:"];
    for (const issue of this.issues) {
      lines.push(`  - ${issue.field}: ${issue.message}`);
    }
    return lines.join("\n");
  }
}

/**
 * Document-level issue.
 */
export interface TaxonomyIssue {
  /** Path of the offending property, "(root)" for the document itself */
  field: string;
  message: string;
}

/**
 * Why a row was left out.
 */
export type SkipReason = "schema" | "missing_id" | "missing_name" | "duplicate";

export interface SkippedRow {
  /** Position of the row in the document's `fields` array */
  index: number;
  /** Field ID when the row had one */
  fieldId?: string;
  reason: SkipReason;
  message: string;
}

/**
 * Result of a successful load.
 */
export interface TaxonomyLoadResult {
  records: FieldRecord[];
  skipped: SkippedRow[];
  version?: string;
  source?: string;
  stats: {
    total: number;
    loaded: number;
    skipped: number;
  };
}

export interface LoadTaxonomyOptions {
  logger?: Logger;
}

function toRecord(row: RawFieldRow): FieldRecord {
  return createFieldRecord({
    id: row.field_id,
    name: row.field_name,
    type: row.field_type,
    pillar: row.pillar,
    issue: row.issue,
    subIssue: row.sub_issue,
    underlyingId: row.underlying_field_id,
    sourceFile: row.source_file,
    searchText: row.search_text,
  });
}

/**
 * Load and validate a taxonomy document.
 *
 * @param input - Parsed taxonomy JSON
 * @returns Loaded records plus skipped-row diagnostics
 * @throws TaxonomyLoadError if the document has no usable `fields` array
 */
export function loadTaxonomy(
  input: unknown,
  options: LoadTaxonomyOptions = {}
): TaxonomyLoadResult {
  const logger = options.logger ?? silentLogger;

  const documentResult = TaxonomyDocumentSchema.safeParse(input);
  if (!documentResult.success) {
    const issues: TaxonomyIssue[] = documentResult.error.issues.map((issue) => ({
      field: issue.path.join(".") || "(root)",
      message: issue.message,
    }));
    throw new TaxonomyLoadError(
      `Taxonomy document is not usable: ${issues.length} structural error(s)`,
      issues
    );
  }

  const document = documentResult.data;
  const records: FieldRecord[] = [];
  const skipped: SkippedRow[] = [];
  const seen = new Map<string, number>();

  document.fields.forEach((raw, index) => {
    const rowResult = RawFieldRowSchema.safeParse(raw);
    if (!rowResult.success) {
      skipped.push({
        index,
        reason: "schema",
        message: rowResult.error.issues
          .map((i) => `${i.path.join(".") || "(row)"}: ${i.message}`)
          .join("; "),
      });
      return;
    }

    const row = rowResult.data;
    if (!row.field_id) {
      skipped.push({ index, reason: "missing_id", message: "Row has no field_id" });
      return;
    }
    if (!row.field_name) {
      skipped.push({
        index,
        fieldId: row.field_id,
        reason: "missing_name",
        message: `Field "${row.field_id}" has no field_name`,
      });
      return;
    }

    const firstIndex = seen.get(row.field_id);
    if (firstIndex !== undefined) {
      skipped.push({
        index,
        fieldId: row.field_id,
        reason: "duplicate",
        message: `Duplicate field ID "${row.field_id}" (first seen at index ${firstIndex}, duplicate at index ${index})`,
      });
      return;
    }

    seen.set(row.field_id, index);
    records.push(toRecord(row));
  });

  if (skipped.length > 0) {
    logger.warn("Skipped malformed taxonomy rows", {
      skipped: skipped.length,
      reasons: countReasons(skipped),
    });
  }
  logger.debug("Taxonomy loaded", { loaded: records.length, total: document.fields.length });

  return {
    records,
    skipped,
    version: document.version,
    source: document.source ?? document.source_files?.join(", "),
    stats: {
      total: document.fields.length,
      loaded: records.length,
      skipped: skipped.length,
    },
  };
}

/**
 * Read and load a taxonomy JSON file.
 *
 * @throws TaxonomyLoadError if the file cannot be read or parsed, or the
 *   document is structurally unusable
 */
export function loadTaxonomyFile(
  filePath: string,
  options: LoadTaxonomyOptions = {}
): TaxonomyLoadResult {
  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(filePath, "utf-8"));
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new TaxonomyLoadError(`Cannot read taxonomy file ${filePath}`, [
      { field: "(file)", message },
    ]);
  }

  return loadTaxonomy(parsed, options);
}

function countReasons(skipped: SkippedRow[]): Record<SkipReason, number> {
  const counts: Record<SkipReason, number> = {
    schema: 0,
    missing_id: 0,
    missing_name: 0,
    duplicate: 0,
  };
  for (const row of skipped) {
    counts[row.reason]++;
  }
  return counts;
}

/**
 * Format a load report for the CLI.
 */
export function formatLoadReport(result: TaxonomyLoadResult): string {
  const lines: string[] = [];

  lines.push("═══════════════════════════════════════════════════════════════");
  lines.push(" Taxonomy Load Report");
  lines.push("═══════════════════════════════════════════════════════════════");
  lines.push("");
  if (result.version) {
    lines.push(`Version:        ${result.version}`);
  }
  if (result.source) {
    lines.push(`Source:         ${result.source}`);
  }
  lines.push(`Rows:           ${result.stats.total}`);
  lines.push(`Loaded:         ${result.stats.loaded}`);
  lines.push(`Skipped:        ${result.stats.skipped}`);

  if (result.skipped.length > 0) {
    lines.push("");
    lines.push("───────────────────────────────────────────────────────────────");
    lines.push(" SKIPPED ROWS");
    lines.push("───────────────────────────────────────────────────────────────");
    for (const row of result.skipped) {
      lines.push(`  [${row.index}] ${row.reason.toUpperCase()} ${row.message}`);
    }
  }

  return lines.join("\n");
}
