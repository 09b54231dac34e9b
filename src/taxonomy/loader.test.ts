/**
 * Taxonomy loader tests.
 *
 * Run: node --import tsx --test src/taxonomy/loader.test.ts
 */

import { describe, it, after } from "node:test";
import { strict as assert } from "node:assert";
import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";

import type { LogContext, Logger } from "../logging/index.js";
import { fixtureDocument } from "../testing/fixtures.js";
import {
  formatLoadReport,
  loadTaxonomy,
  loadTaxonomyFile,
  TaxonomyLoadError,
} from "./loader.js";

// ═══════════════════════════════════════════════════════════════════════════
// TEST HELPERS
// ═══════════════════════════════════════════════════════════════════════════

interface LogEntry {
  level: string;
  message: string;
  context?: LogContext;
}

function recordingLogger(entries: LogEntry[]): Logger {
  const logger: Logger = {
    debug: (message, context) => entries.push({ level: "debug", message, context }),
    info: (message, context) => entries.push({ level: "info", message, context }),
    warn: (message, context) => entries.push({ level: "warn", message, context }),
    error: (message, context) => entries.push({ level: "error", message, context }),
    child: () => logger,
  };
  return logger;
}

function row(id: string, name: string, extra: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    field_id: id,
    field_name: name,
    pillar: "Environmental",
    issue: "Water Management",
    sub_issue: "Water Use",
    ...extra,
  };
}

// ═══════════════════════════════════════════════════════════════════════════
// VALID DOCUMENTS
// ═══════════════════════════════════════════════════════════════════════════

describe("loadTaxonomy", () => {
  it("loads every row of a clean document", () => {
    const result = loadTaxonomy(fixtureDocument());
    assert.equal(result.records.length, 7);
    assert.deepEqual(result.stats, { total: 7, loaded: 7, skipped: 0 });
    assert.equal(result.version, "1.0");
    assert.equal(result.source, "test fixture");
    assert.deepEqual(result.skipped, []);
  });

  it("maps snake_case columns to a trimmed record", () => {
    const result = loadTaxonomy({
      fields: [
        row("  ENV-W-009 ", " Water Recycled ", {
          field_type: "numeric",
          underlying_field_id: "RAW-1",
          source_file: "water.csv",
        }),
      ],
    });

    assert.deepEqual(result.records[0], {
      id: "ENV-W-009",
      name: "Water Recycled",
      type: "numeric",
      pillar: "Environmental",
      issue: "Water Management",
      subIssue: "Water Use",
      underlyingId: "RAW-1",
      sourceFile: "water.csv",
      searchText: "water recycled water management water use environmental",
    });
  });

  it("keeps a precomputed search blob, lowercased", () => {
    const result = loadTaxonomy({ fields: [row("ENV-W-010", "Water Reuse", { search_text: "Reuse Blob" })] });
    assert.equal(result.records[0]?.searchText, "reuse blob");
  });

  it("reads null columns as empty strings", () => {
    const result = loadTaxonomy({ fields: [row("ENV-W-011", "Water Stress", { sub_issue: null })] });
    assert.equal(result.records[0]?.subIssue, "");
    assert.equal(result.records[0]?.underlyingId, undefined);
  });

  it("falls back to the source file list when there is no source", () => {
    const result = loadTaxonomy({ source_files: ["a.csv", "b.csv"], fields: [] });
    assert.equal(result.source, "a.csv, b.csv");
  });
});

// ═══════════════════════════════════════════════════════════════════════════
// SKIPPED ROWS
// ═══════════════════════════════════════════════════════════════════════════

describe("loadTaxonomy skipped rows", () => {
  const input = {
    fields: [
      row("ENV-1", "First"),
      "not a row",
      row("", "No Identifier"),
      row("ENV-2", "   "),
      row("ENV-1", "Second Copy"),
      row("ENV-3", "Third"),
    ],
  };

  it("skips malformed rows and counts them", () => {
    const result = loadTaxonomy(input);
    assert.deepEqual(
      result.records.map((r) => r.id),
      ["ENV-1", "ENV-3"]
    );
    assert.deepEqual(result.stats, { total: 6, loaded: 2, skipped: 4 });
    assert.deepEqual(
      result.skipped.map((s) => [s.index, s.reason]),
      [
        [1, "schema"],
        [2, "missing_id"],
        [3, "missing_name"],
        [4, "duplicate"],
      ]
    );
  });

  it("keeps the first of duplicate IDs", () => {
    const result = loadTaxonomy(input);
    assert.equal(result.records[0]?.name, "First");
    assert.equal(
      result.skipped[3]?.message,
      'Duplicate field ID "ENV-1" (first seen at index 0, duplicate at index 4)'
    );
  });

  it("logs one warning with per-reason counts", () => {
    const entries: LogEntry[] = [];
    loadTaxonomy(input, { logger: recordingLogger(entries) });

    const warnings = entries.filter((e) => e.level === "warn");
    assert.equal(warnings.length, 1);
    assert.deepEqual(warnings[0]?.context, {
      skipped: 4,
      reasons: { schema: 1, missing_id: 1, missing_name: 1, duplicate: 1 },
    });
  });

  it("does not warn for a clean document", () => {
    const entries: LogEntry[] = [];
    loadTaxonomy(fixtureDocument(), { logger: recordingLogger(entries) });
    assert.equal(entries.filter((e) => e.level === "warn").length, 0);
  });
});

// ═══════════════════════════════════════════════════════════════════════════
// STRUCTURAL FAILURES
// ═══════════════════════════════════════════════════════════════════════════

describe("loadTaxonomy structural failures", () => {
  it("throws when the fields array is missing", () => {
    assert.throws(
      () => loadTaxonomy({ version: "1.0" }),
      (err: unknown) => {
        assert.ok(err instanceof TaxonomyLoadError);
        assert.equal(err.issues[0]?.field, "fields");
        return true;
      }
    );
  });

  it("throws for a non-object document", () => {
    assert.throws(
      () => loadTaxonomy([1, 2, 3]),
      (err: unknown) => {
        assert.ok(err instanceof TaxonomyLoadError);
        assert.equal(err.issues[0]?.field, "(root)");
        return true;
      }
    );
  });
});

// ═══════════════════════════════════════════════════════════════════════════
// FILES
// ═══════════════════════════════════════════════════════════════════════════

describe("loadTaxonomyFile", () => {
  const dir = mkdtempSync(join(tmpdir(), "taxonomy-"));
  after(() => rmSync(dir, { recursive: true, force: true }));

  it("loads a document from disk", () => {
    const path = join(dir, "taxonomy.json");
    writeFileSync(path, JSON.stringify(fixtureDocument()));
    assert.equal(loadTaxonomyFile(path).records.length, 7);
  });

  it("wraps unreadable files in a TaxonomyLoadError", () => {
    assert.throws(
      () => loadTaxonomyFile(join(dir, "missing.json")),
      (err: unknown) => {
        assert.ok(err instanceof TaxonomyLoadError);
        assert.equal(err.issues[0]?.field, "(file)");
        return true;
      }
    );
  });

  it("wraps invalid JSON in a TaxonomyLoadError", () => {
    const path = join(dir, "broken.json");
    writeFileSync(path, "{ fields: ");
    assert.throws(() => loadTaxonomyFile(path), TaxonomyLoadError);
  });
});

// ═══════════════════════════════════════════════════════════════════════════
// REPORT
// ═══════════════════════════════════════════════════════════════════════════

describe("formatLoadReport", () => {
  it("lists counts and skipped rows", () => {
    const report = formatLoadReport(loadTaxonomy({ version: "2", fields: [row("A", "Alpha"), row("A", "Again")] }));
    const lines = report.split("\n");
    assert.ok(lines.includes("Version:        2"));
    assert.ok(lines.includes("Rows:           2"));
    assert.ok(lines.includes("Loaded:         1"));
    assert.ok(lines.includes("Skipped:        1"));
    assert.ok(
      lines.includes('  [1] DUPLICATE Duplicate field ID "A" (first seen at index 0, duplicate at index 1)')
    );
  });
});
