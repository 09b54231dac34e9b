/**
 * Taxonomy schema and type definitions.
 *
 * ═══════════════════════════════════════════════════════════════════════════
 * FIELD TAXONOMY
 * ═══════════════════════════════════════════════════════════════════════════
 *
 * A taxonomy is a flat list of reportable ESG metrics ("fields"). Each field
 * sits on a four-level path:
 *
 *   Pillar → Issue → Sub-Issue → Field
 *   Environmental → Water Management → Water Consumption → Water Withdrawal
 *
 * The upstream preprocessing step writes the taxonomy as JSON with
 * snake_case rows. RawFieldRowSchema validates one such row; the loader
 * turns valid rows into camelCase FieldRecords and skips the rest.
 *
 * ═══════════════════════════════════════════════════════════════════════════
 */

import { z } from "zod";

/** Trimmed string column; absent or null columns read as "". */
const column = z
  .string()
  .nullish()
  .transform((v) => (v ?? "").trim());

/**
 * One row of the processed taxonomy JSON, as written upstream.
 */
export const RawFieldRowSchema = z.object({
  field_id: column,
  field_name: column,
  field_type: column,
  pillar: column,
  issue: column,
  sub_issue: column,
  underlying_field_id: column,
  source_file: column,
  search_text: column,
});

export type RawFieldRow = z.infer<typeof RawFieldRowSchema>;

/**
 * Top-level taxonomy document.
 *
 * Only the presence of a `fields` array is structural; rows themselves are
 * validated one by one so a bad row never sinks the whole load.
 */
export const TaxonomyDocumentSchema = z
  .object({
    version: z.string().optional(),
    source: z.string().optional(),
    source_files: z.array(z.string()).optional(),
    total_fields: z.number().int().nonnegative().optional(),
    fields: z.array(z.unknown()),
  })
  .passthrough();

export type TaxonomyDocument = z.infer<typeof TaxonomyDocumentSchema>;

/**
 * A single taxonomy field.
 *
 * `id` and `name` are never empty, and `id` is unique within a store.
 * `searchText` is the lowercase `name issue subIssue pillar` blob used for
 * plain substring search.
 */
export interface FieldRecord {
  readonly id: string;
  readonly name: string;
  readonly type: string;
  readonly pillar: string;
  readonly issue: string;
  readonly subIssue: string;
  readonly underlyingId?: string;
  readonly sourceFile: string;
  readonly searchText: string;
}

/**
 * Build the search blob for a field.
 */
export function buildSearchText(
  field: Pick<FieldRecord, "name" | "issue" | "subIssue" | "pillar">
): string {
  return `${field.name} ${field.issue} ${field.subIssue} ${field.pillar}`.toLowerCase();
}

/**
 * Convenience constructor for in-code taxonomies (fixtures, tools).
 * Trims every column and fills the search blob.
 */
export function createFieldRecord(
  input: Pick<FieldRecord, "id" | "name"> & Partial<Omit<FieldRecord, "id" | "name">>
): FieldRecord {
  const base = {
    id: input.id.trim(),
    name: input.name.trim(),
    type: (input.type ?? "").trim(),
    pillar: (input.pillar ?? "").trim(),
    issue: (input.issue ?? "").trim(),
    subIssue: (input.subIssue ?? "").trim(),
    sourceFile: (input.sourceFile ?? "").trim(),
  };
  const underlyingId = input.underlyingId?.trim();

  return {
    ...base,
    ...(underlyingId ? { underlyingId } : {}),
    searchText: input.searchText?.trim().toLowerCase() || buildSearchText(base),
  };
}
