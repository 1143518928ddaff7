/**
 * events list: list stored events with metadata.
 */

import { loadConfig, expandPath } from "../config.js";
import { createFileEventStore } from "../persist/filesystem.js";
import { createEventService } from "../service.js";
import type { EventRecord } from "../schema.js";

export function formatRecordLines(record: EventRecord): string[] {
  const details = [`target: ${record.target}`, `expires: ${record.expires}`];
  if (record.time) details.push(`time: ${record.time}`);
  if (record.place) details.push(`place: ${record.place}`);
  return [`${record.identity}: "${record.title ?? "(untitled)"}"`, `  ${details.join(" | ")}`];
}

export async function run(_args: string[]) {
  const config = loadConfig();
  const rootDir = expandPath(config.storage.root);

  const service = createEventService(createFileEventStore({ rootDir }), {
    weekStart: config.publish.weekStart,
  });

  const result = await service.load();
  if (result.isErr()) {
    console.error(`error: ${result.error.message}`);
    process.exit(1);
  }

  const { records, malformed } = result.value;
  for (const doc of malformed) {
    console.warn(`skipped malformed ${doc.identity}: ${doc.reason}`);
  }

  if (records.length === 0) {
    console.log("no events found");
    return;
  }

  console.log(`found ${records.length} events:\n`);

  for (const record of records) {
    for (const line of formatRecordLines(record)) {
      console.log(line);
    }
  }
}
