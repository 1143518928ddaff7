/**
 * file-based event store.
 * directory layout: flat, one `<identity>` markdown file per event.
 * writes go through a temp file + rename so a reader never sees a partial
 * document.
 */

import { existsSync, mkdirSync, readdirSync, readFileSync, writeFileSync, renameSync, rmSync, unlinkSync } from "fs";
import { join } from "path";
import { ResultAsync, errAsync } from "neverthrow";
import { nanoid } from "nanoid";
import { isValidIdentity } from "../identity.js";
import { serializeEventMarkdown, parseEventMarkdown } from "../format.js";
import { validateRecord } from "../record.js";
import type { EventRecord, MalformedDocument, StoreSnapshot } from "../schema.js";
import type { EventStore, StoreError, WriteError } from "./index.js";

interface FileStoreOptions {
  rootDir: string;
}

function readDocument(filePath: string, identity: string): EventRecord | MalformedDocument {
  let text: string;
  try {
    text = readFileSync(filePath, "utf-8");
  } catch (e) {
    return {
      _tag: "record.malformed",
      identity,
      reason: `unreadable: ${e instanceof Error ? e.message : String(e)}`,
    };
  }

  const result = parseEventMarkdown(text, identity);
  return result.isOk() ? result.value : result.error;
}

export function createFileEventStore(options: FileStoreOptions): EventStore {
  const rootDir = options.rootDir;

  function pathFor(identity: string): string {
    return join(rootDir, identity);
  }

  return {
    pathFor,

    loadAll(): ResultAsync<StoreSnapshot, StoreError> {
      return ResultAsync.fromPromise(
        (async () => {
          const snapshot: StoreSnapshot = { records: [], malformed: [] };
          if (!existsSync(rootDir)) return snapshot;

          const files = readdirSync(rootDir, { withFileTypes: true })
            .filter((entry) => entry.isFile() && entry.name.endsWith(".md") && !entry.name.startsWith("."))
            .map((entry) => entry.name)
            .sort();

          for (const file of files) {
            const loaded = readDocument(join(rootDir, file), file);
            if ("_tag" in loaded) {
              snapshot.malformed.push(loaded);
            } else {
              snapshot.records.push(loaded);
            }
          }

          return snapshot;
        })(),
        (e: unknown): StoreError => ({
          _tag: "store.read",
          path: rootDir,
          message: e instanceof Error ? e.message : String(e),
        }),
      );
    },

    save(record: EventRecord): ResultAsync<string, WriteError> {
      if (!isValidIdentity(record.identity)) {
        return errAsync({
          _tag: "store.write",
          path: record.identity,
          message: `invalid identity: ${record.identity}`,
        });
      }

      const validated = validateRecord(record);
      if (validated.isErr()) {
        return errAsync({
          _tag: "store.write",
          path: record.identity,
          message: `refusing to write malformed record: ${validated.error.reason}`,
        });
      }

      const filePath = pathFor(record.identity);

      return ResultAsync.fromPromise(
        (async () => {
          if (!existsSync(rootDir)) {
            mkdirSync(rootDir, { recursive: true });
          }

          const tempPath = join(rootDir, `.${record.identity}.tmp.${nanoid(8)}`);

          try {
            writeFileSync(tempPath, serializeEventMarkdown(record), "utf-8");
            renameSync(tempPath, filePath);
          } catch (e) {
            rmSync(tempPath, { force: true });
            throw e;
          }

          return filePath;
        })(),
        (e: unknown): WriteError => ({
          _tag: "store.write",
          path: filePath,
          message: e instanceof Error ? e.message : String(e),
        }),
      );
    },

    remove(identity: string): ResultAsync<string, StoreError> {
      if (!isValidIdentity(identity)) {
        return errAsync({
          _tag: "store.delete",
          path: identity,
          message: `invalid identity: ${identity}`,
        });
      }

      const filePath = pathFor(identity);

      return ResultAsync.fromPromise(
        (async () => {
          unlinkSync(filePath);
          return filePath;
        })(),
        (e: unknown): StoreError => ({
          _tag: "store.delete",
          path: filePath,
          message: e instanceof Error ? e.message : String(e),
        }),
      );
    },
  };
}
