/**
 * event service: high-level API over the event store.
 * loading, saving, page planning and expiry cleanup.
 *
 * WHY cleanup is explicit: commit and publish never delete. removing expired
 * documents is an operator action with its own command and commit.
 */

import { ResultAsync } from "neverthrow";
import { planPublication, type PlanOptions, type PublicationPlan } from "./planner.js";
import { isExpired } from "./record.js";
import type { IsoDate } from "./dates.js";
import type { EventRecord, StoreSnapshot } from "./schema.js";
import type { EventStore, StoreError, WriteError } from "./persist/index.js";

export interface RemovedRecord {
  record: EventRecord;
  path: string;
}

export interface EventService {
  load(): ResultAsync<StoreSnapshot, StoreError>;
  save(record: EventRecord): ResultAsync<string, WriteError>;
  plan(today: IsoDate): ResultAsync<PublicationPlan, StoreError>;
  findExpired(today: IsoDate): ResultAsync<EventRecord[], StoreError>;
  removeExpired(today: IsoDate): ResultAsync<RemovedRecord[], StoreError>;
}

export function createEventService(store: EventStore, options: PlanOptions): EventService {
  function findExpired(today: IsoDate): ResultAsync<EventRecord[], StoreError> {
    return store.loadAll().map((snapshot) => snapshot.records.filter((r) => isExpired(r, today)));
  }

  return {
    load() {
      return store.loadAll();
    },

    save(record) {
      return store.save(record);
    },

    plan(today) {
      return store.loadAll().map((snapshot) => planPublication(today, snapshot, options));
    },

    findExpired,

    removeExpired(today) {
      return findExpired(today).andThen((expired) =>
        ResultAsync.fromPromise(
          (async () => {
            const removed: RemovedRecord[] = [];
            for (const record of expired) {
              const result = await store.remove(record.identity);
              if (result.isErr()) throw result.error;
              removed.push({ record, path: result.value });
            }
            return removed;
          })(),
          (e): StoreError => {
            if (isStoreError(e)) return e;
            return {
              _tag: "store.delete",
              path: "",
              message: e instanceof Error ? e.message : String(e),
            };
          },
        ),
      );
    },
  };
}

function isStoreError(e: unknown): e is StoreError {
  return (
    typeof e === "object" &&
    e !== null &&
    "_tag" in e &&
    typeof e._tag === "string" &&
    e._tag.startsWith("store.")
  );
}
