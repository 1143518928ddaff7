/**
 * reconciliation: decides whether a draft updates an existing record or
 * creates a new one, and produces the record to persist.
 *
 * matching rule: same target date AND either
 *   (a) both titles non-empty and equal after normalization, or
 *   (b) one title empty and places equal after normalization (placeFallback).
 * exactly one match updates it; zero or several create. ambiguity never
 * picks a record to overwrite.
 */

import { ok, err, type Result } from "neverthrow";
import { isIsoDate, shiftDate, type IsoDate } from "./dates.js";
import { deriveIdentity } from "./identity.js";
import { cleanField } from "./record.js";
import type { EventDraft, EventRecord, StoreSnapshot, ValidationError } from "./schema.js";

export interface MatchOptions {
  placeFallback: boolean;
}

export interface ReconcileOptions {
  defaultExpiryDays: number;
  matching: MatchOptions;
}

export type MatchCandidate = Pick<EventRecord, "target" | "title" | "place">;

export type ReconcileDecision =
  | { action: "create"; record: EventRecord; matchCount: number }
  | { action: "update"; record: EventRecord; previous: EventRecord; changed: boolean };

export const DEFAULT_MATCH_OPTIONS: MatchOptions = { placeFallback: true };

/** case-folded, trimmed, inner whitespace collapsed to single spaces. */
export function normalizeText(value: string | undefined): string {
  return (value ?? "").trim().replace(/\s+/g, " ").toLowerCase();
}

export function matchesRecord(
  candidate: MatchCandidate,
  record: EventRecord,
  options: MatchOptions = DEFAULT_MATCH_OPTIONS,
): boolean {
  if (candidate.target !== record.target) return false;

  const candidateTitle = normalizeText(candidate.title);
  const recordTitle = normalizeText(record.title);
  if (candidateTitle && recordTitle) {
    return candidateTitle === recordTitle;
  }

  if (!options.placeFallback) return false;

  const candidatePlace = normalizeText(candidate.place);
  return candidatePlace.length > 0 && candidatePlace === normalizeText(record.place);
}

export function findMatches(
  candidate: MatchCandidate,
  records: readonly EventRecord[],
  options: MatchOptions = DEFAULT_MATCH_OPTIONS,
): EventRecord[] {
  return records.filter((record) => matchesRecord(candidate, record, options));
}

function splitParagraphs(text: string): string[] {
  return text
    .split(/\n\s*\n/)
    .map((p) => p.trim())
    .filter((p) => p.length > 0);
}

function containsParagraphRun(body: readonly string[], run: readonly string[]): boolean {
  for (let start = 0; start + run.length <= body.length; start++) {
    if (run.every((p, i) => body[start + i] === p)) return true;
  }
  return false;
}

/**
 * appends after a blank line. an addition whose paragraphs already appear,
 * whole and in order, in the body is not appended twice, so re-running the
 * same draft leaves the body alone. a fragment of a longer paragraph is new text.
 */
export function appendBody(existing: string, addition: string | undefined): string {
  const text = addition?.trim();
  if (!text) return existing;
  if (containsParagraphRun(splitParagraphs(existing), splitParagraphs(text))) return existing;

  const base = existing.trimEnd();
  return base ? `${base}\n\n${text}` : text;
}

function validationError(field: ValidationError["field"], message: string): ValidationError {
  return { _tag: "record.validation", field, message };
}

function sameRecord(a: EventRecord, b: EventRecord): boolean {
  return (
    a.expires === b.expires &&
    a.title === b.title &&
    a.time === b.time &&
    a.place === b.place &&
    a.body === b.body
  );
}

function mergeIntoRecord(
  previous: EventRecord,
  draft: EventDraft,
  expires: IsoDate | undefined,
): Result<ReconcileDecision, ValidationError> {
  const record: EventRecord = {
    identity: previous.identity,
    target: previous.target,
    expires: expires ?? previous.expires,
    title: cleanField(draft.title) ?? previous.title,
    time: cleanField(draft.time) ?? previous.time,
    place: cleanField(draft.place) ?? previous.place,
    body: appendBody(previous.body, draft.body),
  };

  if (record.expires < record.target) {
    return err(validationError("expires", `expires ${record.expires} is before target ${record.target}`));
  }

  const decision: ReconcileDecision = {
    action: "update",
    record,
    previous,
    changed: !sameRecord(record, previous),
  };
  return ok(decision);
}

function createRecord(
  target: IsoDate,
  draft: EventDraft,
  expires: IsoDate | undefined,
  snapshot: StoreSnapshot,
  options: ReconcileOptions,
  matchCount: number,
): Result<ReconcileDecision, ValidationError> {
  const resolvedExpires = expires ?? shiftDate(target, options.defaultExpiryDays);
  if (resolvedExpires < target) {
    return err(validationError("expires", `expires ${resolvedExpires} is before target ${target}`));
  }

  const taken = new Set([
    ...snapshot.records.map((r) => r.identity),
    ...snapshot.malformed.map((m) => m.identity),
  ]);
  const title = cleanField(draft.title);

  const record: EventRecord = {
    identity: deriveIdentity(target, { slug: cleanField(draft.slug), title }, taken),
    target,
    expires: resolvedExpires,
    title,
    time: cleanField(draft.time),
    place: cleanField(draft.place),
    body: draft.body?.trim() ?? "",
  };

  const decision: ReconcileDecision = { action: "create", record, matchCount };
  return ok(decision);
}

export function reconcile(
  draft: EventDraft,
  snapshot: StoreSnapshot,
  options: ReconcileOptions,
): Result<ReconcileDecision, ValidationError> {
  const target = cleanField(draft.target);
  if (!target || !isIsoDate(target)) {
    return err(validationError("target", `draft has no valid target date: ${target ?? "(missing)"}`));
  }

  const expires = cleanField(draft.expires);
  if (expires !== undefined && !isIsoDate(expires)) {
    return err(validationError("expires", `draft expires is not a valid date: ${expires}`));
  }

  const matches = findMatches(
    { target, title: cleanField(draft.title), place: cleanField(draft.place) },
    snapshot.records,
    options.matching,
  );

  const [only] = matches;
  if (matches.length === 1 && only) {
    return mergeIntoRecord(only, draft, expires);
  }

  return createRecord(target, draft, expires, snapshot, options, matches.length);
}
