import type { ResultAsync } from "neverthrow";
import type { EventRecord, StoreSnapshot } from "../schema.js";

export type StoreError =
  | { _tag: "store.read"; path: string; message: string }
  | { _tag: "store.write"; path: string; message: string }
  | { _tag: "store.delete"; path: string; message: string };

export type WriteError = Extract<StoreError, { _tag: "store.write" }>;

export interface EventStore {
  /** every document in the directory; bad documents land in `malformed`. */
  loadAll(): ResultAsync<StoreSnapshot, StoreError>;
  /** resolves with the written path. */
  save(record: EventRecord): ResultAsync<string, WriteError>;
  remove(identity: string): ResultAsync<string, StoreError>;
  pathFor(identity: string): string;
}
