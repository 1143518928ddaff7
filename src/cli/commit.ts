/**
 * events commit: extract an event from free text, create or update its
 * document, commit the change.
 */

import { parseArgs } from "util";
import { fromPromise } from "xstate";
import { loadConfig, expandPath } from "../config.js";
import { createFileEventStore } from "../persist/filesystem.js";
import { createEventService } from "../service.js";
import { createShellExtractor } from "../adapters/extractor.js";
import { commitFiles } from "../vcs.js";
import {
  commitMachine,
  runCommitMachine,
  type CommitContext,
  type ExtractDraftInput,
} from "../machines/commit.js";
import { resolveToday } from "./options.js";
import type { EventDraft, EventRecord, StoreSnapshot } from "../schema.js";

/** the line reporting what the commit did. */
export function describeOutcome(context: CommitContext): string {
  const decision = context.decision;
  if (!decision) return "nothing to do";
  if (decision.action === "create") return `created: ${decision.record.identity}`;
  return decision.changed
    ? `updated: ${decision.record.identity}`
    : `unchanged: ${decision.record.identity}`;
}

export async function run(args: string[]) {
  const { values } = parseArgs({
    args,
    options: {
      message: { type: "string", short: "m" },
      today: { type: "string" },
      "no-push": { type: "boolean", default: false },
      "no-commit": { type: "boolean", default: false },
    },
    strict: true,
  });

  if (!values.message) {
    console.error("usage: events commit --message <text> [--today YYYY-MM-DD] [--no-push] [--no-commit]");
    process.exit(1);
  }

  const today = resolveToday(values.today);
  const config = loadConfig();
  const rootDir = expandPath(config.storage.root);

  const store = createFileEventStore({ rootDir });
  const service = createEventService(store, { weekStart: config.publish.weekStart });
  const extractor = createShellExtractor({ command: config.llm.command, timeout: config.llm.timeoutMs });
  const push = config.storage.push && !values["no-push"];

  const machine = commitMachine.provide({
    actors: {
      loadStore: fromPromise<StoreSnapshot, void>(async () => {
        const result = await service.load();
        if (result.isErr()) throw result.error;
        return result.value;
      }),

      extractDraft: fromPromise<EventDraft, ExtractDraftInput>(async ({ input }) => {
        const result = await extractor.extract(input.message, {
          today: input.today,
          records: input.records,
        });
        if (result.isErr()) throw result.error;
        return result.value;
      }),

      saveRecord: fromPromise<string, { record: EventRecord | undefined }>(async ({ input }) => {
        if (!input.record) throw new Error("no record to save");
        const result = await service.save(input.record);
        if (result.isErr()) throw result.error;
        return result.value;
      }),

      commitChanges: fromPromise<void, { paths: string[]; message: string }>(async ({ input }) => {
        const result = await commitFiles(rootDir, input.paths, input.message, { push });
        if (result.isErr()) throw result.error;
      }),
    },
  });

  const final = await runCommitMachine(machine, {
    message: values.message,
    today,
    autoCommit: config.storage.autoCommit && !values["no-commit"],
    reconcileOptions: {
      defaultExpiryDays: config.records.defaultExpiryDays,
      matching: config.matching,
    },
  });

  for (const doc of final.context.snapshot.malformed) {
    console.warn(`skipped malformed ${doc.identity}: ${doc.reason}`);
  }

  if (final.value === "failed") {
    console.error(`error: ${final.context.error?.message ?? "commit failed"}`);
    process.exit(1);
  }

  const decision = final.context.decision;
  if (decision?.action === "create" && decision.matchCount > 1) {
    console.warn(`ambiguous: ${decision.matchCount} events match, created a new one`);
  }

  console.log(describeOutcome(final.context));
}
