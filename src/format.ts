/**
 * event document serialization.
 * markdown files with a YAML metadata block between `---` fences.
 */

import { err, type Result } from "neverthrow";
import { type } from "arktype";
import { parse as parseYaml, stringify as stringifyYaml } from "yaml";
import { cleanField, validateRecord } from "./record.js";
import { EventMetaSchema, type EventRecord, type MalformedDocument } from "./schema.js";

const FRONTMATTER_PATTERN = /^---\r?\n([\s\S]*?)\r?\n---(?:\r?\n|$)([\s\S]*)$/;

export function serializeEventMarkdown(record: EventRecord): string {
  const meta: Record<string, string> = {
    target: record.target,
    expires: record.expires,
  };
  if (record.title !== undefined) meta.title = record.title;
  if (record.time !== undefined) meta.time = record.time;
  if (record.place !== undefined) meta.place = record.place;

  const header = `---\n${stringifyYaml(meta)}---\n`;
  return record.body.length > 0 ? `${header}\n${record.body}\n` : header;
}

export function parseEventMarkdown(
  text: string,
  identity: string,
): Result<EventRecord, MalformedDocument> {
  const malformed = (reason: string) =>
    err<EventRecord, MalformedDocument>({ _tag: "record.malformed", identity, reason });

  // hand-edited files may start with a byte order mark
  const match = text.replace(/^\uFEFF/, "").match(FRONTMATTER_PATTERN);
  if (!match) {
    return malformed("missing metadata block");
  }

  let parsed: unknown;
  try {
    parsed = parseYaml(match[1] ?? "");
  } catch (e) {
    return malformed(`invalid YAML in metadata block: ${e instanceof Error ? e.message : String(e)}`);
  }

  const validated = EventMetaSchema(parsed);
  if (validated instanceof type.errors) {
    return malformed(`metadata validation failed: ${validated.summary}`);
  }

  const body = (match[2] ?? "").replace(/^(?:\r?\n)+/, "").trimEnd();

  return validateRecord({
    identity,
    target: validated.target.trim(),
    expires: validated.expires.trim(),
    title: cleanField(validated.title),
    time: cleanField(validated.time),
    place: cleanField(validated.place),
    body,
  });
}
