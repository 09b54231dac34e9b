/**
 * Taxonomy store tests.
 *
 * Run: node --import tsx --test src/taxonomy/store.test.ts
 */

import { describe, it } from "node:test";
import { strict as assert } from "node:assert";

import { FIXTURE_FIELDS, fixtureStore } from "../testing/fixtures.js";
import { createFieldRecord } from "./schema.js";
import { TaxonomyStore } from "./store.js";

const ids = (records: ReadonlyArray<{ id: string }>): string[] => records.map((r) => r.id);

describe("TaxonomyStore lookups", () => {
  const store = fixtureStore();

  it("keeps records in load order", () => {
    assert.equal(store.size, 7);
    assert.deepEqual(ids(store.fields), FIXTURE_FIELDS.map((f) => f.id));
  });

  it("finds records by ID", () => {
    assert.equal(store.get("ENV-W-002")?.name, "Water Quality");
    assert.equal(store.has("SOC-D-001"), true);
  });

  it("returns undefined for unknown IDs", () => {
    assert.equal(store.get("NOPE"), undefined);
    assert.equal(store.has("NOPE"), false);
  });

  it("groups by pillar and issue in load order", () => {
    assert.deepEqual(ids(store.byIssue("Climate Exposure")), ["ENV-C-001", "ENV-C-002", "ENV-C-003"]);
    assert.deepEqual(ids(store.byPillar("Social")), ["SOC-D-001", "SOC-D-002"]);
    assert.equal(store.byPillar("Environmental").length, 5);
  });

  it("returns empty arrays for unknown groups", () => {
    assert.deepEqual(store.byPillar("Economic"), []);
    assert.deepEqual(store.byIssue("Tax Transparency"), []);
  });

  it("freezes its records", () => {
    assert.ok(Object.isFrozen(store.fields));
    assert.ok(Object.isFrozen(store.get("ENV-W-001")));
  });
});

describe("TaxonomyStore.search", () => {
  const store = fixtureStore();

  it("matches the search blob case-insensitively", () => {
    assert.deepEqual(ids(store.search("EMISSIONS")), ["ENV-C-001", "ENV-C-002", "ENV-C-003"]);
  });

  it("stops at the limit", () => {
    assert.deepEqual(ids(store.search("emissions", 2)), ["ENV-C-001", "ENV-C-002"]);
  });

  it("searches issue and sub-issue text too", () => {
    assert.deepEqual(ids(store.search("board diversity")), ["SOC-D-001"]);
  });
});

describe("TaxonomyStore.stats", () => {
  it("counts distinct pillars and issues in first-seen order", () => {
    assert.deepEqual(fixtureStore().stats(), {
      totalFields: 7,
      totalPillars: 2,
      totalIssues: 3,
      pillars: ["Environmental", "Social"],
      issues: ["Water Management", "Climate Exposure", "Diversity & Inclusion"],
    });
  });

  it("ignores empty grouping keys", () => {
    const store = TaxonomyStore.create([
      createFieldRecord({ id: "X-1", name: "Orphan Field" }),
      createFieldRecord({ id: "X-2", name: "Placed Field", pillar: "Governance", issue: "Board Structure" }),
    ]);
    assert.deepEqual(store.pillars(), ["Governance"]);
    assert.deepEqual(store.issues(), ["Board Structure"]);
    assert.equal(store.stats().totalFields, 2);
  });

  it("keeps the first record for a repeated ID", () => {
    const store = TaxonomyStore.create([
      createFieldRecord({ id: "DUP", name: "First" }),
      createFieldRecord({ id: "DUP", name: "Second" }),
    ]);
    assert.equal(store.get("DUP")?.name, "First");
  });
});
