/**
 * Identifiers for log correlation.
 *
 * The process gets one run ID at startup and every log line carries it.
 * Conversation sessions draw their IDs from the same generator, so a session
 * ID sorts next to the run that created it.
 */

import { randomBytes } from "node:crypto";

/**
 * UTC timestamp to the second plus 6 hex characters, e.g. "20261018-093015-a1b2c3".
 */
export function generateRunId(now: Date = new Date()): string {
  const stamp = now.toISOString().replace(/[-:]/g, "").slice(0, 15).replace("T", "-");
  return `${stamp}-${randomBytes(3).toString("hex")}`;
}

let processRunId: string | null = null;

/**
 * Assign this process its run ID. Called once by the entry point.
 */
export function initRunId(): string {
  processRunId = generateRunId();
  return processRunId;
}

/** The process run ID, or null until `initRunId()` has run */
export function getRunId(): string | null {
  return processRunId;
}
