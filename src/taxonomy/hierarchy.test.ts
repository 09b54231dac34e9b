/**
 * Hierarchy index and agenda tests.
 *
 * Run: node --import tsx --test src/taxonomy/hierarchy.test.ts
 */

import { describe, it } from "node:test";
import { strict as assert } from "node:assert";

import { FIXTURE_FIELDS, fixtureHierarchy } from "../testing/fixtures.js";
import { issueAgendaNode, pillarIntroNode } from "./agenda.js";
import { HierarchyIndex } from "./hierarchy.js";
import { createFieldRecord } from "./schema.js";

const ids = (records: ReadonlyArray<{ id: string }>): string[] => records.map((r) => r.id);

// ═══════════════════════════════════════════════════════════════════════════
// TREE
// ═══════════════════════════════════════════════════════════════════════════

describe("HierarchyIndex tree", () => {
  const hierarchy = fixtureHierarchy();

  it("lists pillars in canonical order", () => {
    assert.deepEqual(hierarchy.pillars(), ["Environmental", "Social"]);
  });

  it("sorts issues alphabetically", () => {
    assert.deepEqual(hierarchy.issues("Environmental"), ["Climate Exposure", "Water Management"]);
    assert.deepEqual(hierarchy.issues("Governance"), []);
  });

  it("sorts sub-issues and leaves out the empty bucket", () => {
    assert.deepEqual(hierarchy.subIssues("Environmental", "Climate Exposure"), [
      "Air Quality",
      "Carbon Emissions",
    ]);
    assert.deepEqual(hierarchy.subIssues("Social", "Diversity & Inclusion"), ["Board Diversity"]);
    assert.deepEqual(hierarchy.subIssues("Social", "Unknown"), []);
  });

  it("returns an issue's fields bucket by bucket", () => {
    assert.deepEqual(ids(hierarchy.fields("Environmental", "Climate Exposure")), [
      "ENV-C-001",
      "ENV-C-002",
      "ENV-C-003",
    ]);
    assert.deepEqual(ids(hierarchy.fields("Social", "Diversity & Inclusion")), ["SOC-D-001", "SOC-D-002"]);
  });

  it("narrows to one sub-issue", () => {
    assert.deepEqual(ids(hierarchy.fields("Environmental", "Climate Exposure", "Air Quality")), ["ENV-C-003"]);
    assert.deepEqual(hierarchy.fields("Environmental", "Climate Exposure", "Missing"), []);
    assert.deepEqual(hierarchy.fields("Environmental", "Missing"), []);
  });

  it("summarises the tree", () => {
    assert.deepEqual(hierarchy.summary(), {
      pillarCount: 2,
      issueCount: 3,
      subIssueCount: 5,
      fieldCount: 7,
    });
  });
});

describe("HierarchyIndex pillar filtering", () => {
  const hierarchy = HierarchyIndex.fromRecords([
    createFieldRecord({ id: "G-1", name: "Board Independence", pillar: "Governance", issue: "Board Structure" }),
    createFieldRecord({ id: "X-1", name: "Tax Paid", pillar: "Economic", issue: "Tax" }),
    createFieldRecord({ id: "E-1", name: "Energy Use", pillar: "Environmental", issue: "Energy" }),
    createFieldRecord({ id: "N-1", name: "No Issue", pillar: "Social" }),
  ]);

  it("drops pillars outside the canonical set", () => {
    assert.deepEqual(hierarchy.pillars(), ["Environmental", "Governance"]);
  });

  it("still reports every pillar that has issues", () => {
    assert.deepEqual(hierarchy.allPillarNames(), ["Governance", "Economic", "Environmental"]);
  });
});

// ═══════════════════════════════════════════════════════════════════════════
// AGENDA
// ═══════════════════════════════════════════════════════════════════════════

describe("buildAgenda", () => {
  it("emits a pillar intro followed by that pillar's issues", () => {
    const agenda = fixtureHierarchy().buildAgenda();
    assert.deepEqual(
      agenda.map((node) => node.id),
      [
        "environmental_intro",
        "environmental_climate_exposure",
        "environmental_water_management",
        "social_intro",
        "social_diversity_and_inclusion",
      ]
    );
    assert.deepEqual(
      agenda.map((node) => node.kind),
      ["pillar_intro", "issue", "issue", "pillar_intro", "issue"]
    );
  });

  it("builds an empty agenda for an empty taxonomy", () => {
    assert.deepEqual(HierarchyIndex.fromRecords([]).buildAgenda(), []);
  });

  it("describes nodes", () => {
    assert.deepEqual(pillarIntroNode("Social"), {
      kind: "pillar_intro",
      id: "social_intro",
      name: "Social",
      pillar: "Social",
      description: "Social topics in general",
    });
    assert.deepEqual(issueAgendaNode("Social", "Diversity & Inclusion"), {
      kind: "issue",
      id: "social_diversity_and_inclusion",
      name: "Diversity & Inclusion",
      pillar: "Social",
      issue: "Diversity & Inclusion",
      description: "Diversity & Inclusion within Social",
    });
  });

  it("does not depend on record order", () => {
    const reversed = HierarchyIndex.fromRecords([...FIXTURE_FIELDS].reverse()).buildAgenda();
    assert.deepEqual(
      reversed.map((node) => node.id),
      fixtureHierarchy().buildAgenda().map((node) => node.id)
    );
  });
});
