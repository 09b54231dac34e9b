/**
 * Taxonomy module.
 *
 * ═══════════════════════════════════════════════════════════════════════════
 * DATA FLOW
 * ═══════════════════════════════════════════════════════════════════════════
 *
 * 1. LOADING: loadTaxonomyFile() / loadTaxonomy() validate the processed
 *    taxonomy JSON. Malformed rows are skipped and counted; a document
 *    without a `fields` array is fatal.
 *
 * 2. STORE: TaxonomyStore.create() indexes records by ID, pillar and issue.
 *
 * 3. HIERARCHY: HierarchyIndex.fromStore() builds the typed tree and the
 *    conversation agenda.
 *
 *   const { records } = loadTaxonomyFile(config.taxonomyPath);
 *   const store = TaxonomyStore.create(records);
 *   const agenda = HierarchyIndex.fromStore(store).buildAgenda();
 */

export {
  RawFieldRowSchema,
  TaxonomyDocumentSchema,
  buildSearchText,
  createFieldRecord,
  type FieldRecord,
  type RawFieldRow,
  type TaxonomyDocument,
} from "./schema.js";

export {
  loadTaxonomy,
  loadTaxonomyFile,
  formatLoadReport,
  TaxonomyLoadError,
  type TaxonomyIssue,
  type SkippedRow,
  type SkipReason,
  type TaxonomyLoadResult,
  type LoadTaxonomyOptions,
} from "./loader.js";

export { TaxonomyStore, type TaxonomyStats } from "./store.js";

export {
  HierarchyIndex,
  type PillarNode,
  type IssueNode,
  type SubIssueNode,
  type HierarchySummary,
} from "./hierarchy.js";

export {
  pillarIntroNode,
  issueAgendaNode,
  type AgendaNode,
  type PillarIntroNode,
  type IssueAgendaNode,
} from "./agenda.js";
