/**
 * prompt builder + output parser for message → event draft extraction.
 * pure functions: the LLM call itself lives in adapters/.
 */

import { ok, err, type Result } from "neverthrow";
import { type } from "arktype";
import { cleanField } from "../record.js";
import { DraftFieldsSchema, type EventDraft, type EventRecord } from "../schema.js";
import type { IsoDate } from "../dates.js";

export type ExtractionParseError = { _tag: "extract.parse"; message: string };

function describeRecord(record: EventRecord): string {
  const parts = [`target=${record.target}`];
  if (record.title) parts.push(`title=${record.title}`);
  if (record.time) parts.push(`time=${record.time}`);
  if (record.place) parts.push(`place=${record.place}`);
  parts.push(`expires=${record.expires}`);
  return parts.join(", ");
}

export function buildExtractionPrompt(
  message: string,
  records: readonly EventRecord[],
  today: IsoDate,
): string {
  const existingSection =
    records.length > 0 ? records.map((r) => `- ${describeRecord(r)}`).join("\n") : "(none)";

  return `Today's date: ${today}

Existing events:
${existingSection}

User message: ${message}

Extract the single event the user message describes. If it refers to one of the existing events, reuse that event's exact target date and title so it can be matched.

Respond in the same language as the user's message.

CRITICAL: Your entire response must be ONLY one raw JSON object. No prose, no markdown fencing.

{
  "target": "ISO 8601 date (YYYY-MM-DD) the event happens on",
  "expires": "ISO 8601 date after which the event can be forgotten, or null for the default",
  "title": "short event name; use [title](url) when a URL is relevant, or null",
  "slug": "ASCII-only short identifier for the filename, e.g. work-lunch",
  "time": "time of day such as 10:00, or null",
  "place": "location, or null",
  "body": "event description in markdown, or null"
}`;
}

/**
 * extracts a JSON object from LLM output that may be wrapped in prose or
 * code fences. strategy: raw parse → fenced block → outermost { }.
 */
function extractJsonObject(raw: string): unknown {
  const trimmed = raw.trim();

  try {
    return JSON.parse(trimmed);
  } catch {
    // fall through to the fenced and bracketed forms
  }

  const fenceMatch = trimmed.match(/```(?:json)?\s*\n?([\s\S]*?)\n?\s*```/);
  if (fenceMatch?.[1]) {
    try {
      return JSON.parse(fenceMatch[1]);
    } catch {
      // fall through to bracket extraction
    }
  }

  const start = trimmed.indexOf("{");
  const end = trimmed.lastIndexOf("}");
  if (start !== -1 && end > start) {
    try {
      return JSON.parse(trimmed.slice(start, end + 1));
    } catch {
      // reported below
    }
  }

  throw new Error(`agent output is not valid JSON: ${trimmed.slice(0, 200)}`);
}

export function parseExtractionOutput(
  raw: string,
  message: string,
): Result<EventDraft, ExtractionParseError> {
  let parsed: unknown;
  try {
    parsed = extractJsonObject(raw);
  } catch (e) {
    return err({ _tag: "extract.parse", message: e instanceof Error ? e.message : String(e) });
  }

  const validated = DraftFieldsSchema(parsed);
  if (validated instanceof type.errors) {
    return err({ _tag: "extract.parse", message: `draft validation failed: ${validated.summary}` });
  }

  const draft: EventDraft = { message };
  const target = cleanField(validated.target);
  if (target) draft.target = target;
  const expires = cleanField(validated.expires);
  if (expires) draft.expires = expires;
  const title = cleanField(validated.title);
  if (title) draft.title = title;
  const slug = cleanField(validated.slug);
  if (slug) draft.slug = slug;
  const time = cleanField(validated.time);
  if (time) draft.time = time;
  const place = cleanField(validated.place);
  if (place) draft.place = place;
  const body = cleanField(validated.body);
  if (body) draft.body = body;

  return ok(draft);
}
