import { describe, test, expect } from "vitest";
import { buildExtractionPrompt, parseExtractionOutput } from "../src/prompts/extract.js";
import type { EventRecord } from "../src/schema.js";

const teamMeeting: EventRecord = {
  identity: "2026-03-01-team-meeting.md",
  target: "2026-03-01",
  expires: "2026-04-01",
  title: "Team Meeting",
  place: "Room A",
  body: "Long agenda that the prompt leaves out.",
};

describe("extraction prompt", () => {
  describe("buildExtractionPrompt", () => {
    test("includes today, existing events and the message", () => {
      const prompt = buildExtractionPrompt("team meeting moved to 14:00", [teamMeeting], "2026-02-18");

      expect(prompt.startsWith("Today's date: 2026-02-18\n")).toBe(true);
      expect(prompt).toContain(
        "Existing events:\n- target=2026-03-01, title=Team Meeting, place=Room A, expires=2026-04-01\n",
      );
      expect(prompt).toContain("User message: team meeting moved to 14:00\n");
      expect(prompt).not.toContain("Long agenda");
    });

    test("marks an empty store", () => {
      const prompt = buildExtractionPrompt("hello", [], "2026-02-18");
      expect(prompt).toContain("Existing events:\n(none)\n");
    });
  });

  describe("parseExtractionOutput", () => {
    test("parses a raw JSON object", () => {
      const result = parseExtractionOutput(
        '{"target": "2026-03-01", "title": "Team Meeting", "time": "14:00", "place": null, "body": null}',
        "msg",
      );

      expect(result.isOk()).toBe(true);
      if (result.isOk()) {
        expect(result.value).toEqual({
          message: "msg",
          target: "2026-03-01",
          title: "Team Meeting",
          time: "14:00",
        });
      }
    });

    test("parses a fenced block", () => {
      const result = parseExtractionOutput('```json\n{"target": "2026-03-05", "slug": "potluck"}\n```', "msg");

      expect(result.isOk()).toBe(true);
      if (result.isOk()) {
        expect(result.value).toEqual({ message: "msg", target: "2026-03-05", slug: "potluck" });
      }
    });

    test("parses an object wrapped in prose", () => {
      const result = parseExtractionOutput('Here you go: {"target": "2026-03-05"} Enjoy!', "msg");

      expect(result.isOk()).toBe(true);
      if (result.isOk()) {
        expect(result.value.target).toBe("2026-03-05");
      }
    });

    test("drops blank fields", () => {
      const result = parseExtractionOutput('{"target": "2026-03-05", "title": "   ", "place": ""}', "msg");

      expect(result.isOk()).toBe(true);
      if (result.isOk()) {
        expect(result.value).toEqual({ message: "msg", target: "2026-03-05" });
      }
    });

    test("keeps a draft without target for the reconciler to reject", () => {
      const result = parseExtractionOutput('{"title": "Someday"}', "msg");

      expect(result.isOk()).toBe(true);
      if (result.isOk()) {
        expect(result.value.target).toBeUndefined();
      }
    });

    test("rejects output without JSON", () => {
      const result = parseExtractionOutput("I could not find an event.", "msg");

      expect(result.isErr()).toBe(true);
      if (result.isErr()) {
        expect(result.error).toEqual({
          _tag: "extract.parse",
          message: "agent output is not valid JSON: I could not find an event.",
        });
      }
    });

    test("rejects fields of the wrong type", () => {
      const result = parseExtractionOutput('{"target": 20260305}', "msg");

      expect(result.isErr()).toBe(true);
      if (result.isErr()) {
        expect(result.error.message).toContain("draft validation failed");
      }
    });
  });
});
