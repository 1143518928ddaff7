import { describe, test, expect, beforeEach, afterEach, vi } from "vitest";
import { mkdtempSync, rmSync, writeFileSync } from "fs";
import { tmpdir, homedir } from "os";
import { join, resolve } from "path";
import { CONFIG_FILENAME, DEFAULT_CONFIG, expandPath, loadConfig } from "../src/config.js";

describe("config", () => {
  let testDir: string;
  let originalCwd: string;

  beforeEach(() => {
    originalCwd = process.cwd();
    testDir = mkdtempSync(join(tmpdir(), "event-config-test-"));
    process.chdir(testDir);
  });

  afterEach(() => {
    process.chdir(originalCwd);
    rmSync(testDir, { recursive: true, force: true });
    vi.restoreAllMocks();
  });

  test("merges a partial file over the defaults", () => {
    writeFileSync(
      join(testDir, CONFIG_FILENAME),
      JSON.stringify({
        storage: { root: "events", autoCommit: false },
        records: { defaultExpiryDays: 7 },
        publish: { weekStart: "sunday", template: "page.hbs" },
      }),
    );

    expect(loadConfig()).toEqual({
      storage: { root: "events", autoCommit: false, push: true },
      llm: DEFAULT_CONFIG.llm,
      records: { defaultExpiryDays: 7 },
      matching: { placeFallback: true },
      publish: { weekStart: "sunday", siteTitle: "Upcoming Events", outputDir: "site", template: "page.hbs" },
    });
  });

  test("an empty file gives the defaults", () => {
    writeFileSync(join(testDir, CONFIG_FILENAME), "{}");
    expect(loadConfig()).toEqual(DEFAULT_CONFIG);
  });

  test("invalid values fall back to the defaults with a warning", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    writeFileSync(join(testDir, CONFIG_FILENAME), JSON.stringify({ publish: { weekStart: "funday" } }));

    expect(loadConfig()).toEqual(DEFAULT_CONFIG);
    expect(warn).toHaveBeenCalledTimes(1);
    expect(String(warn.mock.calls[0]?.[0])).toContain("config validation failed");
  });

  test("unparseable JSON falls back to the defaults with a warning", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    writeFileSync(join(testDir, CONFIG_FILENAME), "{ not json");

    expect(loadConfig()).toEqual(DEFAULT_CONFIG);
    expect(String(warn.mock.calls[0]?.[0])).toContain("failed to load config");
  });

  test("rejects a negative expiry", () => {
    vi.spyOn(console, "warn").mockImplementation(() => {});
    writeFileSync(join(testDir, CONFIG_FILENAME), JSON.stringify({ records: { defaultExpiryDays: -1 } }));

    expect(loadConfig().records.defaultExpiryDays).toBe(30);
  });

  describe("expandPath", () => {
    test("expands the home directory", () => {
      expect(expandPath("~/events")).toBe(join(homedir(), "events"));
    });

    test("resolves relative paths against the working directory", () => {
      expect(expandPath("memories")).toBe(resolve(process.cwd(), "memories"));
    });
  });
});
