/**
 * Priority report export.
 *
 * Joins a session's tracked field IDs back against the taxonomy and renders
 * the preference profile handed to the user at the end of a conversation.
 * Tracked IDs the taxonomy does not know are kept and listed separately.
 */

import { IMPORTANCE_TIERS, type ImportanceTier } from "../config/engine/enums.js";
import type { FieldRecord } from "../taxonomy/schema.js";
import type { TaxonomyStore } from "../taxonomy/store.js";
import type { Progress } from "../conversation/session.js";
import type { PriorityTracker, PrioritySummary } from "./tracker.js";

export interface PriorityReportEntry {
  fieldId: string;
  importance: ImportanceTier;
  notes: string;
  source: string;
  /** Undefined when the ID is not in the taxonomy */
  field?: Readonly<FieldRecord>;
  /** "Pillar > Issue > Sub-Issue", empty for unknown fields */
  path: string;
}

export interface PriorityReport {
  fieldIds: string[];
  summary: PrioritySummary;
  /** Most important tier first; tracker order within a tier */
  entries: PriorityReportEntry[];
  progress?: Progress;
}

export interface PriorityReportOptions {
  progress?: Progress;
}

function fieldPath(field: Readonly<FieldRecord>): string {
  return [field.pillar, field.issue, field.subIssue].filter((level) => level !== "").join(" > ");
}

export function buildPriorityReport(
  tracker: PriorityTracker,
  store: TaxonomyStore,
  options: PriorityReportOptions = {}
): PriorityReport {
  const entries: PriorityReportEntry[] = [];

  for (const tier of IMPORTANCE_TIERS) {
    for (const fieldId of tracker.byImportance(tier)) {
      const entry = tracker.get(fieldId);
      if (!entry) {
        continue;
      }
      const field = store.get(fieldId);
      entries.push({
        fieldId,
        importance: entry.importance,
        notes: entry.notes,
        source: entry.source,
        ...(field ? { field } : {}),
        path: field ? fieldPath(field) : "",
      });
    }
  }

  return {
    fieldIds: tracker.allIds(),
    summary: tracker.summary(),
    entries,
    ...(options.progress ? { progress: options.progress } : {}),
  };
}

/**
 * Render a report as Markdown.
 */
export function formatPriorityReport(report: PriorityReport): string {
  const lines: string[] = ["# Your ESG Investment Preference Profile", ""];

  const known = report.entries.filter((e) => e.field !== undefined);
  const unknown = report.entries.filter((e) => e.field === undefined);
  const top = known.filter((e) => e.importance === "critical" || e.importance === "high");
  const medium = known.filter((e) => e.importance === "medium");
  const low = known.filter((e) => e.importance === "low");

  if (report.entries.length === 0) {
    lines.push("No priorities were captured in this conversation.", "");
  }

  if (top.length > 0) {
    lines.push("## Top Priorities", "");
    for (const entry of top) {
      lines.push(`### ${entry.field?.name ?? entry.fieldId}`);
      lines.push(`- Field ID: ${entry.fieldId}`);
      lines.push(`- Importance: ${entry.importance}`);
      if (entry.path) {
        lines.push(`- Path: ${entry.path}`);
      }
      if (entry.notes) {
        lines.push(`- Notes: ${entry.notes}`);
      }
      lines.push("");
    }
  }

  if (medium.length > 0) {
    lines.push("## Areas of Interest", "");
    for (const entry of medium) {
      const label = `- **${entry.field?.name ?? entry.fieldId}** (${entry.fieldId})`;
      lines.push(entry.notes ? `${label}: ${entry.notes}` : label);
    }
    lines.push("");
  }

  if (low.length > 0) {
    lines.push("## Low Priority Areas", "");
    lines.push(low.map((e) => e.field?.name ?? e.fieldId).join(", "), "");
  }

  if (unknown.length > 0) {
    lines.push("## Fields Not in the Taxonomy", "");
    for (const entry of unknown) {
      lines.push(`- ${entry.fieldId} (${entry.importance})`);
    }
    lines.push("");
  }

  const s = report.summary;
  lines.push("---", "");
  lines.push(
    `*${s.total} field(s) tracked: critical ${s.critical}, high ${s.high}, medium ${s.medium}, low ${s.low}*`
  );
  if (report.progress) {
    const p = report.progress;
    lines.push(`*Conversation progress: topic ${p.current} of ${p.total} (${p.percentage}%)*`);
  }

  return lines.join("\n") + "\n";
}
