/**
 * Shared in-process test taxonomy.
 *
 * Two pillars, three issues:
 *
 *   Environmental
 *     Climate Exposure      ENV-C-001..003
 *     Water Management      ENV-W-001..002
 *   Social
 *     Diversity & Inclusion SOC-D-001..002
 */

import { createFieldRecord, type FieldRecord } from "../taxonomy/schema.js";
import { TaxonomyStore } from "../taxonomy/store.js";
import { HierarchyIndex } from "../taxonomy/hierarchy.js";

export const FIXTURE_FIELDS: readonly FieldRecord[] = [
  createFieldRecord({
    id: "ENV-W-001",
    name: "Water Withdrawal",
    type: "numeric",
    pillar: "Environmental",
    issue: "Water Management",
    subIssue: "Water Use",
  }),
  createFieldRecord({
    id: "ENV-W-002",
    name: "Water Quality",
    type: "score",
    pillar: "Environmental",
    issue: "Water Management",
    subIssue: "Freshwater Contamination",
  }),
  createFieldRecord({
    id: "ENV-C-001",
    name: "Scope 1 GHG Emissions",
    type: "numeric",
    pillar: "Environmental",
    issue: "Climate Exposure",
    subIssue: "Carbon Emissions",
  }),
  createFieldRecord({
    id: "ENV-C-002",
    name: "Carbon Dioxide Emissions",
    type: "numeric",
    pillar: "Environmental",
    issue: "Climate Exposure",
    subIssue: "Carbon Emissions",
  }),
  createFieldRecord({
    id: "ENV-C-003",
    name: "Carbon Monoxide Emissions",
    type: "numeric",
    pillar: "Environmental",
    issue: "Climate Exposure",
    subIssue: "Air Quality",
  }),
  createFieldRecord({
    id: "SOC-D-001",
    name: "Women on Board",
    type: "percentage",
    pillar: "Social",
    issue: "Diversity & Inclusion",
    subIssue: "Board Diversity",
  }),
  createFieldRecord({
    id: "SOC-D-002",
    name: "Gender Pay Gap",
    type: "percentage",
    pillar: "Social",
    issue: "Diversity & Inclusion",
  }),
];

export function fixtureStore(): TaxonomyStore {
  return TaxonomyStore.create(FIXTURE_FIELDS);
}

export function fixtureHierarchy(store: TaxonomyStore = fixtureStore()): HierarchyIndex {
  return HierarchyIndex.fromStore(store);
}

/**
 * Snake_case rows as the upstream preprocessing step writes them.
 */
export function fixtureDocument(): { version: string; source: string; fields: Record<string, string>[] } {
  return {
    version: "1.0",
    source: "test fixture",
    fields: FIXTURE_FIELDS.map((field) => ({
      field_id: field.id,
      field_name: field.name,
      field_type: field.type,
      pillar: field.pillar,
      issue: field.issue,
      sub_issue: field.subIssue,
      source_file: "fixture.csv",
    })),
  };
}
