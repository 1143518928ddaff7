/**
 * commit machine: turns one free-text message into a created or updated
 * event document, then commits it.
 *
 * per WORKFLOW = DATA: the machine is a record with state, not a running process.
 * per INJECT AT THE BOUNDARY: store, extractor and git injected via machine.provide().
 *
 * states: loadStore → extractDraft → reconcile → saveRecord → commitChanges → completed | failed
 */

import { setup, assign, fromPromise, createActor, type SnapshotFrom } from "xstate";
import { errorMessage } from "../errors.js";
import { reconcile, type ReconcileDecision, type ReconcileOptions } from "../reconcile.js";
import type { IsoDate } from "../dates.js";
import type { EventDraft, EventRecord, StoreSnapshot, ValidationError } from "../schema.js";

export interface CommitError {
  _tag: string;
  message: string;
}

export interface CommitContext {
  message: string;
  today: IsoDate;
  autoCommit: boolean;
  reconcileOptions: ReconcileOptions;
  snapshot: StoreSnapshot;
  draft?: EventDraft;
  decision?: ReconcileDecision;
  reconcileError?: ValidationError;
  savedPath?: string;
  error?: CommitError;
}

export interface CommitInput {
  message: string;
  today: IsoDate;
  autoCommit: boolean;
  reconcileOptions: ReconcileOptions;
}

export interface ExtractDraftInput {
  message: string;
  today: IsoDate;
  records: EventRecord[];
}

const loadStoreActor = fromPromise<StoreSnapshot, void>(async () => {
  throw new Error("loadStore: not provided via machine.provide()");
});

const extractDraftActor = fromPromise<EventDraft, ExtractDraftInput>(async () => {
  throw new Error("extractDraft: not provided via machine.provide()");
});

const saveRecordActor = fromPromise<string, { record: EventRecord | undefined }>(async () => {
  throw new Error("saveRecord: not provided via machine.provide()");
});

const commitChangesActor = fromPromise<void, { paths: string[]; message: string }>(async () => {
  throw new Error("commitChanges: not provided via machine.provide()");
});

export function commitMessage(decision: ReconcileDecision | undefined): string {
  if (!decision) return "Update events";
  const verb = decision.action === "create" ? "Add" : "Update";
  return `${verb} event: ${decision.record.identity}`;
}

const MISSING_DRAFT: ValidationError = {
  _tag: "record.validation",
  field: "target",
  message: "no draft to reconcile",
};

export const commitMachine = setup({
  types: {
    context: {} as CommitContext,
    input: {} as CommitInput,
  },
  actors: {
    loadStore: loadStoreActor,
    extractDraft: extractDraftActor,
    saveRecord: saveRecordActor,
    commitChanges: commitChangesActor,
  },
  actions: {
    assignSnapshot: assign({
      snapshot: (_, params: { snapshot: StoreSnapshot }) => params.snapshot,
    }),
    assignDraft: assign({
      draft: (_, params: { draft: EventDraft }) => params.draft,
    }),
    assignSavedPath: assign({
      savedPath: (_, params: { path: string }) => params.path,
    }),
    assignError: assign({
      error: (_, params: { _tag: string; message: string }) => ({
        _tag: params._tag,
        message: params.message,
      }),
    }),
  },
  guards: {
    hasReconcileError: ({ context }) => context.reconcileError !== undefined,
    isUnchanged: ({ context }) =>
      context.decision?.action === "update" && !context.decision.changed,
    shouldCommit: ({ context }) => context.autoCommit,
  },
}).createMachine({
  id: "commit",
  initial: "loadStore",
  context: ({ input }) => ({
    message: input.message,
    today: input.today,
    autoCommit: input.autoCommit,
    reconcileOptions: input.reconcileOptions,
    snapshot: { records: [], malformed: [] },
  }),

  states: {
    loadStore: {
      invoke: {
        id: "loadStore",
        src: "loadStore",
        onDone: {
          target: "extractDraft",
          actions: {
            type: "assignSnapshot",
            params: ({ event }) => ({ snapshot: event.output }),
          },
        },
        onError: {
          target: "failed",
          actions: {
            type: "assignError",
            params: ({ event }) => ({
              _tag: "commit.loadStore",
              message: errorMessage(event.error),
            }),
          },
        },
      },
    },

    extractDraft: {
      invoke: {
        id: "extractDraft",
        src: "extractDraft",
        input: ({ context }) => ({
          message: context.message,
          today: context.today,
          records: context.snapshot.records,
        }),
        onDone: {
          target: "reconcile",
          actions: {
            type: "assignDraft",
            params: ({ event }) => ({ draft: event.output }),
          },
        },
        onError: {
          target: "failed",
          actions: {
            type: "assignError",
            params: ({ event }) => ({
              _tag: "commit.extract",
              message: errorMessage(event.error),
            }),
          },
        },
      },
    },

    reconcile: {
      entry: assign(({ context }) => {
        if (!context.draft) {
          return { decision: undefined, reconcileError: MISSING_DRAFT };
        }
        const result = reconcile(context.draft, context.snapshot, context.reconcileOptions);
        return result.isOk()
          ? { decision: result.value, reconcileError: undefined }
          : { decision: undefined, reconcileError: result.error };
      }),
      always: [
        {
          guard: "hasReconcileError",
          target: "failed",
          actions: {
            type: "assignError",
            params: ({ context }) => ({
              _tag: "record.validation",
              message: context.reconcileError?.message ?? "unknown validation error",
            }),
          },
        },
        {
          guard: "isUnchanged",
          target: "completed",
        },
        {
          target: "saveRecord",
        },
      ],
    },

    saveRecord: {
      invoke: {
        id: "saveRecord",
        src: "saveRecord",
        input: ({ context }) => ({ record: context.decision?.record }),
        onDone: [
          {
            guard: "shouldCommit",
            target: "commitChanges",
            actions: {
              type: "assignSavedPath",
              params: ({ event }) => ({ path: event.output }),
            },
          },
          {
            target: "completed",
            actions: {
              type: "assignSavedPath",
              params: ({ event }) => ({ path: event.output }),
            },
          },
        ],
        onError: {
          target: "failed",
          actions: {
            type: "assignError",
            params: ({ event }) => ({
              _tag: "commit.save",
              message: errorMessage(event.error),
            }),
          },
        },
      },
    },

    commitChanges: {
      invoke: {
        id: "commitChanges",
        src: "commitChanges",
        input: ({ context }) => ({
          paths: context.savedPath ? [context.savedPath] : [],
          message: commitMessage(context.decision),
        }),
        onDone: "completed",
        onError: {
          target: "failed",
          actions: {
            type: "assignError",
            params: ({ event }) => ({
              _tag: "commit.vcs",
              message: errorMessage(event.error),
            }),
          },
        },
      },
    },

    completed: {
      type: "final",
    },

    failed: {
      type: "final",
    },
  },
});

export type CommitMachine = typeof commitMachine;

/** runs the machine to its final state and resolves with that snapshot. */
export function runCommitMachine(
  machine: CommitMachine,
  input: CommitInput,
): Promise<SnapshotFrom<CommitMachine>> {
  return new Promise((resolve, reject) => {
    const actor = createActor(machine, { input });
    actor.subscribe({
      next: (snapshot) => {
        if (snapshot.status === "done") resolve(snapshot);
      },
      error: reject,
    });
    actor.start();
  });
}
