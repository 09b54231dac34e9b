/**
 * Tracked user priorities: accumulation, persistence and reporting.
 */

export {
  PriorityTracker,
  type PriorityEntry,
  type PrioritiesRecord,
  type PrioritySummary,
} from "./tracker.js";
export {
  serializePriorities,
  deserializePriorities,
  parsePrioritiesRecord,
  savePriorities,
  loadPriorities,
  PrioritiesFormatError,
  PriorityEntrySchema,
  PrioritiesRecordSchema,
} from "./serialization.js";
export {
  buildPriorityReport,
  formatPriorityReport,
  type PriorityReport,
  type PriorityReportEntry,
  type PriorityReportOptions,
} from "./report.js";
