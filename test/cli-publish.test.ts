import { describe, test, expect, beforeEach, afterEach, vi } from "vitest";
import { mkdtempSync, rmSync, readFileSync, writeFileSync, mkdirSync } from "fs";
import { join } from "path";
import { tmpdir } from "os";
import { run } from "../src/cli/publish.js";
import { createFileEventStore } from "../src/persist/filesystem.js";

const testState = vi.hoisted(() => ({ rootDir: "", outputDir: "", template: "" }));

vi.mock("../src/config.js", async (importOriginal) => {
  const actual = await importOriginal<typeof import("../src/config.js")>();
  return {
    ...actual,
    loadConfig: () => ({
      ...actual.DEFAULT_CONFIG,
      storage: { root: testState.rootDir, autoCommit: false, push: false },
      publish: {
        ...actual.DEFAULT_CONFIG.publish,
        outputDir: testState.outputDir,
        ...(testState.template ? { template: testState.template } : {}),
      },
    }),
  };
});

describe("cli publish", () => {
  let testDir: string;

  beforeEach(async () => {
    testDir = mkdtempSync(join(tmpdir(), "event-cli-publish-test-"));
    testState.rootDir = join(testDir, "memories");
    testState.outputDir = join(testDir, "site");
    testState.template = "";

    const store = createFileEventStore({ rootDir: testState.rootDir });
    await store.save({
      identity: "2026-02-20-friday-lunch.md",
      target: "2026-02-20",
      expires: "2026-03-22",
      title: "Friday Lunch",
      body: "",
    });
    await store.save({
      identity: "2026-03-01-team-meeting.md",
      target: "2026-03-01",
      expires: "2026-04-01",
      title: "Team Meeting",
      body: "",
    });
    await store.save({
      identity: "2026-01-10-old.md",
      target: "2026-01-10",
      expires: "2026-02-09",
      title: "Old",
      body: "",
    });
    writeFileSync(join(testState.rootDir, "2026-03-02-broken.md"), "no metadata");

    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "warn").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
    rmSync(testDir, { recursive: true, force: true });
  });

  test("writes index.html and reports the counts", async () => {
    await run(["--today", "2026-02-18"]);

    const outputPath = join(testState.outputDir, "index.html");
    const html = readFileSync(outputPath, "utf-8");
    expect(html).toContain("<li><strong>Friday Lunch</strong>");
    expect(html).toContain("<li><strong>Team Meeting</strong>");
    expect(html).not.toContain("Old");

    expect(console.log).toHaveBeenCalledWith(`published: ${outputPath}`);
    expect(console.log).toHaveBeenCalledWith("this week: 1 | upcoming: 1 | excluded: 2");
    expect(console.warn).toHaveBeenCalledWith("skipped malformed 2026-03-02-broken.md: missing metadata block");
  });

  test("takes the output directory and title from flags", async () => {
    const outputDir = join(testDir, "public");
    await run(["--today", "2026-02-18", "-o", outputDir, "--title", "Club Calendar"]);

    expect(readFileSync(join(outputDir, "index.html"), "utf-8")).toContain("<h1>Club Calendar</h1>");
  });

  test("renders with the configured template", async () => {
    mkdirSync(testState.outputDir, { recursive: true });
    testState.template = join(testDir, "custom.hbs");
    writeFileSync(testState.template, "{{siteTitle}}:{{#each sections}}{{#each events}} {{{titleHtml}}}{{/each}}{{/each}}");

    await run(["--today", "2026-02-18"]);

    expect(readFileSync(join(testState.outputDir, "index.html"), "utf-8")).toBe(
      "Upcoming Events: Friday Lunch Team Meeting",
    );
  });

  test("publishing twice gives the same page", async () => {
    await run(["--today", "2026-02-18"]);
    const first = readFileSync(join(testState.outputDir, "index.html"), "utf-8");
    await run(["--today", "2026-02-18"]);

    expect(readFileSync(join(testState.outputDir, "index.html"), "utf-8")).toBe(first);
  });
});
