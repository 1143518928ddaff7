import { describe, test, expect } from "vitest";
import { fromPromise } from "xstate";
import {
  commitMachine,
  commitMessage,
  runCommitMachine,
  type CommitInput,
  type ExtractDraftInput,
} from "../src/machines/commit.js";
import type { EventDraft, EventRecord, StoreSnapshot } from "../src/schema.js";

const teamMeeting: EventRecord = {
  identity: "2026-03-01-team-meeting.md",
  target: "2026-03-01",
  expires: "2026-04-01",
  title: "Team Meeting",
  time: "14:00",
  place: "Room A",
  body: "",
};

const INPUT: CommitInput = {
  message: "team meeting on march 1st",
  today: "2026-02-18",
  autoCommit: true,
  reconcileOptions: { defaultExpiryDays: 30, matching: { placeFallback: true } },
};

interface Fakes {
  snapshot?: StoreSnapshot;
  draft?: Omit<EventDraft, "message">;
  extractError?: Error;
  commitError?: Error;
}

function createTestMachine(fakes: Fakes) {
  const saved: EventRecord[] = [];
  const commits: { paths: string[]; message: string }[] = [];
  const extractInputs: ExtractDraftInput[] = [];

  const machine = commitMachine.provide({
    actors: {
      loadStore: fromPromise<StoreSnapshot, void>(async () => fakes.snapshot ?? { records: [], malformed: [] }),
      extractDraft: fromPromise<EventDraft, ExtractDraftInput>(async ({ input }) => {
        extractInputs.push(input);
        if (fakes.extractError) throw fakes.extractError;
        return { message: input.message, ...fakes.draft };
      }),
      saveRecord: fromPromise<string, { record: EventRecord | undefined }>(async ({ input }) => {
        if (!input.record) throw new Error("no record to save");
        saved.push(input.record);
        return `/events/${input.record.identity}`;
      }),
      commitChanges: fromPromise<void, { paths: string[]; message: string }>(async ({ input }) => {
        if (fakes.commitError) throw fakes.commitError;
        commits.push(input);
      }),
    },
  });

  return { machine, saved, commits, extractInputs };
}

describe("commit machine", () => {
  test("creates, saves and commits a new event", async () => {
    const { machine, saved, commits } = createTestMachine({
      draft: { target: "2026-03-05", title: "Potluck" },
    });

    const final = await runCommitMachine(machine, INPUT);

    expect(final.value).toBe("completed");
    expect(saved.map((r) => r.identity)).toEqual(["2026-03-05-potluck.md"]);
    expect(commits).toEqual([
      { paths: ["/events/2026-03-05-potluck.md"], message: "Add event: 2026-03-05-potluck.md" },
    ]);
    expect(final.context.savedPath).toBe("/events/2026-03-05-potluck.md");
  });

  test("passes existing records to the extractor", async () => {
    const { machine, extractInputs } = createTestMachine({
      snapshot: { records: [teamMeeting], malformed: [] },
      draft: { target: "2026-03-05", title: "Potluck" },
    });

    await runCommitMachine(machine, INPUT);

    expect(extractInputs).toEqual([
      { message: "team meeting on march 1st", today: "2026-02-18", records: [teamMeeting] },
    ]);
  });

  test("updates a matching event", async () => {
    const { machine, saved, commits } = createTestMachine({
      snapshot: { records: [teamMeeting], malformed: [] },
      draft: { target: "2026-03-01", title: "Team Meeting", time: "15:00" },
    });

    const final = await runCommitMachine(machine, INPUT);

    expect(final.value).toBe("completed");
    expect(saved).toEqual([{ ...teamMeeting, time: "15:00" }]);
    expect(commits[0]?.message).toBe("Update event: 2026-03-01-team-meeting.md");
  });

  test("an unchanged update saves and commits nothing", async () => {
    const { machine, saved, commits } = createTestMachine({
      snapshot: { records: [teamMeeting], malformed: [] },
      draft: { target: "2026-03-01", title: "Team Meeting", time: "14:00" },
    });

    const final = await runCommitMachine(machine, INPUT);

    expect(final.value).toBe("completed");
    expect(final.context.decision?.action).toBe("update");
    expect(saved).toEqual([]);
    expect(commits).toEqual([]);
  });

  test("skips the commit when autoCommit is off", async () => {
    const { machine, saved, commits } = createTestMachine({
      draft: { target: "2026-03-05", title: "Potluck" },
    });

    const final = await runCommitMachine(machine, { ...INPUT, autoCommit: false });

    expect(final.value).toBe("completed");
    expect(saved).toHaveLength(1);
    expect(commits).toEqual([]);
  });

  test("fails on a draft without a target", async () => {
    const { machine, saved } = createTestMachine({ draft: { title: "Someday" } });

    const final = await runCommitMachine(machine, INPUT);

    expect(final.value).toBe("failed");
    expect(final.context.error).toEqual({
      _tag: "record.validation",
      message: "draft has no valid target date: (missing)",
    });
    expect(saved).toEqual([]);
  });

  test("fails when extraction fails", async () => {
    const { machine } = createTestMachine({ extractError: new Error("LLM command timed out after 10ms") });

    const final = await runCommitMachine(machine, INPUT);

    expect(final.value).toBe("failed");
    expect(final.context.error).toEqual({
      _tag: "commit.extract",
      message: "LLM command timed out after 10ms",
    });
  });

  test("fails when git fails, after the document is saved", async () => {
    const { machine, saved } = createTestMachine({
      draft: { target: "2026-03-05", title: "Potluck" },
      commitError: new Error("nothing to commit"),
    });

    const final = await runCommitMachine(machine, INPUT);

    expect(final.value).toBe("failed");
    expect(final.context.error).toEqual({ _tag: "commit.vcs", message: "nothing to commit" });
    expect(saved).toHaveLength(1);
  });

  test("unprovided actors fail the run", async () => {
    const final = await runCommitMachine(commitMachine, INPUT);

    expect(final.value).toBe("failed");
    expect(final.context.error?._tag).toBe("commit.loadStore");
  });

  describe("commitMessage", () => {
    test("falls back when there is no decision", () => {
      expect(commitMessage(undefined)).toBe("Update events");
    });
  });
});
