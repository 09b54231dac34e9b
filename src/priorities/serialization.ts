/**
 * Priorities export serialization.
 *
 * A finished session's priorities are written as a JSON object mapping
 * field ID → { importance, notes, source }. Loading validates the shape;
 * an unknown tier or extra key is a PrioritiesFormatError.
 */

import { writeFileSync, readFileSync, mkdirSync, existsSync } from "node:fs";
import { dirname } from "node:path";
import { z } from "zod";
import { ImportanceTier } from "../config/engine/enums.js";
import { PriorityTracker, type PrioritiesRecord } from "./tracker.js";

export const PriorityEntrySchema = z
  .object({
    importance: ImportanceTier,
    notes: z.string(),
    source: z.string(),
  })
  .strict();

export const PrioritiesRecordSchema = z.record(z.string().min(1), PriorityEntrySchema);

export class PrioritiesFormatError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "PrioritiesFormatError";
  }
}

/**
 * Serialize a tracker to a JSON string.
 *
 * @param pretty - Whether to format with indentation (default: true)
 */
export function serializePriorities(tracker: PriorityTracker, pretty = true): string {
  return JSON.stringify(tracker.toRecord(), null, pretty ? 2 : undefined);
}

/**
 * Validate a plain object as a priorities record.
 *
 * @throws PrioritiesFormatError if the shape is wrong
 */
export function parsePrioritiesRecord(input: unknown): PrioritiesRecord {
  const result = PrioritiesRecordSchema.safeParse(input);
  if (!result.success) {
    const errors = result.error.issues
      .map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`)
      .join("; ");
    throw new PrioritiesFormatError(`Invalid priorities format: ${errors}`);
  }
  return result.data;
}

/**
 * Deserialize a tracker from a JSON string.
 *
 * @throws PrioritiesFormatError if parsing or validation fails
 */
export function deserializePriorities(json: string): PriorityTracker {
  let parsed: unknown;
  try {
    parsed = JSON.parse(json);
  } catch (err) {
    throw new PrioritiesFormatError(
      `Failed to parse priorities JSON: ${err instanceof Error ? err.message : String(err)}`
    );
  }

  return PriorityTracker.fromRecord(parsePrioritiesRecord(parsed));
}

/**
 * Save a tracker to a file, creating the directory if needed.
 *
 * @returns the path written
 */
export function savePriorities(tracker: PriorityTracker, filePath: string): string {
  const directory = dirname(filePath);
  if (!existsSync(directory)) {
    mkdirSync(directory, { recursive: true });
  }

  writeFileSync(filePath, serializePriorities(tracker), "utf-8");
  return filePath;
}

/**
 * Load a tracker from a file.
 *
 * @throws PrioritiesFormatError if the file cannot be read or is invalid
 */
export function loadPriorities(filePath: string): PriorityTracker {
  let json: string;
  try {
    json = readFileSync(filePath, "utf-8");
  } catch (err) {
    throw new PrioritiesFormatError(
      `Failed to read priorities file: ${err instanceof Error ? err.message : String(err)}`
    );
  }

  return deserializePriorities(json);
}
