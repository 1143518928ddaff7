/**
 * events cleanup: delete documents whose expires date has passed and
 * commit the removal. never runs as part of commit or publish.
 */

import { parseArgs } from "util";
import { basename } from "path";
import { loadConfig, expandPath } from "../config.js";
import { createFileEventStore } from "../persist/filesystem.js";
import { createEventService } from "../service.js";
import { commitFiles } from "../vcs.js";
import { resolveToday } from "./options.js";

export async function run(args: string[]) {
  const { values } = parseArgs({
    args,
    options: {
      today: { type: "string" },
      "dry-run": { type: "boolean", default: false },
      "no-push": { type: "boolean", default: false },
      "no-commit": { type: "boolean", default: false },
    },
    strict: true,
  });

  const today = resolveToday(values.today);
  const config = loadConfig();
  const rootDir = expandPath(config.storage.root);
  const service = createEventService(createFileEventStore({ rootDir }), {
    weekStart: config.publish.weekStart,
  });

  if (values["dry-run"]) {
    const expired = await service.findExpired(today);
    if (expired.isErr()) {
      console.error(`error: ${expired.error.message}`);
      process.exit(1);
    }
    if (expired.value.length === 0) {
      console.log("no expired events");
      return;
    }
    for (const record of expired.value) {
      console.log(`would delete: ${record.identity} (expired ${record.expires})`);
    }
    return;
  }

  const removed = await service.removeExpired(today);
  if (removed.isErr()) {
    console.error(`error: ${removed.error.message}`);
    process.exit(1);
  }

  if (removed.value.length === 0) {
    console.log("no expired events");
    return;
  }

  for (const { record } of removed.value) {
    console.log(`deleted: ${record.identity}`);
  }

  if (!config.storage.autoCommit || values["no-commit"]) return;

  const paths = removed.value.map((r) => r.path);
  const names = paths.map((p) => basename(p)).join(", ");
  const committed = await commitFiles(rootDir, paths, `Cleanup expired events: ${names}`, {
    push: config.storage.push && !values["no-push"],
  });
  if (committed.isErr()) {
    console.error(`error: ${committed.error.message}`);
    process.exit(1);
  }
}
