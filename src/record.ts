/**
 * event record validation. a record is well-formed when both dates are real
 * calendar days and expires is not before target.
 */

import { ok, err, type Result } from "neverthrow";
import { isIsoDate } from "./dates.js";
import type { EventRecord, MalformedDocument } from "./schema.js";

/** trims a free-form field; blank and missing both come back undefined. */
export function cleanField(value: string | number | null | undefined): string | undefined {
  if (value === null || value === undefined) return undefined;
  const text = String(value).trim();
  return text.length > 0 ? text : undefined;
}

export function validateRecord(record: EventRecord): Result<EventRecord, MalformedDocument> {
  const malformed = (reason: string) =>
    err<EventRecord, MalformedDocument>({ _tag: "record.malformed", identity: record.identity, reason });

  if (!isIsoDate(record.target)) {
    return malformed(`target is not a valid date: ${record.target || "(empty)"}`);
  }
  if (!isIsoDate(record.expires)) {
    return malformed(`expires is not a valid date: ${record.expires || "(empty)"}`);
  }
  if (record.expires < record.target) {
    return malformed(`expires ${record.expires} is before target ${record.target}`);
  }

  return ok(record);
}

export function isExpired(record: EventRecord, today: string): boolean {
  return record.expires < today;
}
