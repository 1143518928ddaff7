/**
 * configuration system: zero-config with sensible defaults.
 * searches: ./events.config.json, ~/.config/event-memory/config.json
 */

import { existsSync, readFileSync } from "fs";
import { join, resolve } from "path";
import { homedir } from "os";
import { type } from "arktype";
import type { Weekday } from "./dates.js";

const StorageSchema = type({
  "root?": "string",
  "autoCommit?": "boolean",
  "push?": "boolean",
});

const LlmSchema = type({
  "command?": "string",
  "timeoutMs?": "number >= 1",
});

const RecordsSchema = type({
  "defaultExpiryDays?": "number >= 0",
});

const MatchingSchema = type({
  "placeFallback?": "boolean",
});

const PublishSchema = type({
  "weekStart?": "'sunday' | 'monday' | 'tuesday' | 'wednesday' | 'thursday' | 'friday' | 'saturday'",
  "siteTitle?": "string",
  "outputDir?": "string",
  "template?": "string",
});

const ConfigSchema = type({
  "storage?": StorageSchema,
  "llm?": LlmSchema,
  "records?": RecordsSchema,
  "matching?": MatchingSchema,
  "publish?": PublishSchema,
});

export type Config = typeof ConfigSchema.infer;

export interface ResolvedStorage {
  root: string;
  autoCommit: boolean;
  push: boolean;
}

export interface ResolvedLlm {
  command: string;
  timeoutMs: number;
}

export interface ResolvedRecords {
  defaultExpiryDays: number;
}

export interface ResolvedMatching {
  placeFallback: boolean;
}

export interface ResolvedPublish {
  weekStart: Weekday;
  siteTitle: string;
  outputDir: string;
  template?: string;
}

export interface ResolvedConfig {
  storage: ResolvedStorage;
  llm: ResolvedLlm;
  records: ResolvedRecords;
  matching: ResolvedMatching;
  publish: ResolvedPublish;
}

export const CONFIG_FILENAME = "events.config.json";

export const DEFAULT_CONFIG: ResolvedConfig = {
  storage: {
    root: "memories",
    autoCommit: true,
    push: true,
  },
  llm: {
    command: "llm -m gemini-2.5-flash",
    timeoutMs: 300000,
  },
  records: {
    defaultExpiryDays: 30,
  },
  matching: {
    placeFallback: true,
  },
  publish: {
    weekStart: "monday",
    siteTitle: "Upcoming Events",
    outputDir: "site",
  },
};

function findConfigFile(): string | null {
  const cwdConfig = join(process.cwd(), CONFIG_FILENAME);
  if (existsSync(cwdConfig)) return cwdConfig;

  const homeConfig = join(homedir(), ".config", "event-memory", "config.json");
  if (existsSync(homeConfig)) return homeConfig;

  return null;
}

export function loadConfig(): ResolvedConfig {
  const configPath = findConfigFile();
  if (!configPath) {
    return DEFAULT_CONFIG;
  }

  try {
    const text = readFileSync(configPath, "utf-8");
    const parsed: unknown = JSON.parse(text);
    const validated = ConfigSchema(parsed);

    if (validated instanceof type.errors) {
      console.warn(`config validation failed: ${validated.summary}, using defaults`);
      return DEFAULT_CONFIG;
    }

    const template = validated.publish?.template ?? DEFAULT_CONFIG.publish.template;

    return {
      storage: {
        root: validated.storage?.root ?? DEFAULT_CONFIG.storage.root,
        autoCommit: validated.storage?.autoCommit ?? DEFAULT_CONFIG.storage.autoCommit,
        push: validated.storage?.push ?? DEFAULT_CONFIG.storage.push,
      },
      llm: {
        command: validated.llm?.command ?? DEFAULT_CONFIG.llm.command,
        timeoutMs: validated.llm?.timeoutMs ?? DEFAULT_CONFIG.llm.timeoutMs,
      },
      records: {
        defaultExpiryDays: Math.floor(
          validated.records?.defaultExpiryDays ?? DEFAULT_CONFIG.records.defaultExpiryDays,
        ),
      },
      matching: {
        placeFallback: validated.matching?.placeFallback ?? DEFAULT_CONFIG.matching.placeFallback,
      },
      publish: {
        weekStart: validated.publish?.weekStart ?? DEFAULT_CONFIG.publish.weekStart,
        siteTitle: validated.publish?.siteTitle ?? DEFAULT_CONFIG.publish.siteTitle,
        outputDir: validated.publish?.outputDir ?? DEFAULT_CONFIG.publish.outputDir,
        ...(template ? { template } : {}),
      },
    };
  } catch (e) {
    console.warn(`failed to load config: ${e instanceof Error ? e.message : String(e)}, using defaults`);
    return DEFAULT_CONFIG;
  }
}

/** expands `~` and resolves relative paths against the working directory. */
export function expandPath(path: string): string {
  if (path.startsWith("~")) {
    return join(homedir(), path.slice(1));
  }
  return resolve(path);
}
