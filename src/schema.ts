/**
 * schemas for event documents and extraction drafts.
 * event document: YAML metadata block + markdown body, one file per event.
 * draft: structured output of the extraction step, not yet persisted.
 *
 * WHY optional fields accept null: hand-edited YAML writes `place:` for an
 * empty value and LLMs answer `"time": null`; both mean "absent".
 */

import { type } from "arktype";
import type { IsoDate } from "./dates.js";

export const EventMetaSchema = type({
  target: "string",
  expires: "string",
  "title?": "string | number | null",
  "time?": "string | number | null",
  "place?": "string | number | null",
});

export type EventMeta = typeof EventMetaSchema.infer;

export const DraftFieldsSchema = type({
  "target?": "string | null",
  "expires?": "string | null",
  "title?": "string | null",
  "slug?": "string | null",
  "time?": "string | null",
  "place?": "string | null",
  "body?": "string | null",
});

export type DraftFields = typeof DraftFieldsSchema.infer;

/**
 * identity: filename inside the store directory, never recomputed.
 * body: operator-authored text, opaque to reconciliation and planning.
 */
export interface EventRecord {
  identity: string;
  target: IsoDate;
  expires: IsoDate;
  title?: string;
  time?: string;
  place?: string;
  body: string;
}

/**
 * target is optional here so a draft without one reaches the reconciler
 * and is rejected there. message is the raw text, kept for traceability.
 */
export interface EventDraft {
  target?: string;
  expires?: string;
  title?: string;
  slug?: string;
  time?: string;
  place?: string;
  body?: string;
  message: string;
}

export type MalformedDocument = {
  _tag: "record.malformed";
  identity: string;
  reason: string;
};

export type ValidationError = {
  _tag: "record.validation";
  field: "target" | "expires";
  message: string;
};

export interface StoreSnapshot {
  records: EventRecord[];
  malformed: MalformedDocument[];
}
