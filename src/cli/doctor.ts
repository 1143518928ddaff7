/**
 * events doctor: health check for the event store directory.
 */

import { parseArgs } from "util";
import { join } from "path";
import { existsSync, readdirSync } from "fs";
import { loadConfig, expandPath } from "../config.js";
import { createFileEventStore } from "../persist/filesystem.js";
import { isExpired } from "../record.js";
import { resolveToday } from "./options.js";
import type { IsoDate } from "../dates.js";

export interface HealthIssue {
  severity: "error" | "warning";
  message: string;
  location?: string;
}

export interface HealthCheckResult {
  entries: number;
  expired: number;
  errors: HealthIssue[];
  warnings: HealthIssue[];
}

const TEMP_FILE_PATTERN = /^\..+\.tmp\.[A-Za-z0-9_-]+$/;

export async function checkHealth(rootDir: string, today: IsoDate): Promise<HealthCheckResult> {
  if (!existsSync(rootDir)) {
    return { entries: 0, expired: 0, errors: [], warnings: [] };
  }

  const issues: HealthIssue[] = [];

  for (const file of readdirSync(rootDir)) {
    if (TEMP_FILE_PATTERN.test(file)) {
      issues.push({
        severity: "warning",
        message: `leftover temp file from an interrupted write: ${file}`,
        location: join(rootDir, file),
      });
    }
  }

  const store = createFileEventStore({ rootDir });
  const loaded = await store.loadAll();

  if (loaded.isErr()) {
    issues.push({
      severity: "error",
      message: `failed to list events: ${loaded.error.message}`,
    });
    return {
      entries: 0,
      expired: 0,
      errors: issues.filter((i) => i.severity === "error"),
      warnings: issues.filter((i) => i.severity === "warning"),
    };
  }

  const { records, malformed } = loaded.value;

  for (const doc of malformed) {
    issues.push({
      severity: "error",
      message: `malformed ${doc.identity}: ${doc.reason}`,
      location: store.pathFor(doc.identity),
    });
  }

  const expired = records.filter((r) => isExpired(r, today));
  for (const record of expired) {
    issues.push({
      severity: "warning",
      message: `expired ${record.expires}, awaiting cleanup: ${record.identity}`,
      location: store.pathFor(record.identity),
    });
  }

  return {
    entries: records.length,
    expired: expired.length,
    errors: issues.filter((i) => i.severity === "error"),
    warnings: issues.filter((i) => i.severity === "warning"),
  };
}

export function formatHealthReport(result: HealthCheckResult, rootDir: string): string {
  const lines: string[] = [`checking: ${rootDir}\n`];

  lines.push(`events: ${result.entries}`);
  lines.push(`expired: ${result.expired}`);
  lines.push(`errors: ${result.errors.length}`);
  lines.push(`warnings: ${result.warnings.length}`);

  const allIssues = [...result.errors, ...result.warnings];
  if (allIssues.length > 0) {
    lines.push("\nissues:");
    for (const issue of allIssues) {
      const icon = issue.severity === "error" ? "❌" : "⚠️";
      lines.push(`  ${icon} ${issue.message}`);
      if (issue.location) {
        lines.push(`     ${issue.location}`);
      }
    }
  } else {
    lines.push("\n✅ all checks passed");
  }

  return lines.join("\n");
}

export async function run(args: string[]) {
  const { values } = parseArgs({
    args,
    options: {
      today: { type: "string" },
    },
    strict: true,
  });

  const today = resolveToday(values.today);
  const config = loadConfig();
  const rootDir = expandPath(config.storage.root);

  if (!existsSync(rootDir)) {
    console.log(`checking: ${rootDir}\n`);
    console.log("❌ event directory does not exist");
    console.log("   run `events commit` to create the first event");
    return;
  }

  const result = await checkHealth(rootDir, today);
  console.log(formatHealthReport(result, rootDir));

  if (result.errors.length > 0) {
    process.exit(1);
  }
}
