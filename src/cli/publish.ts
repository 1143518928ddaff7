/**
 * events publish: render the this-week / upcoming page to <output-dir>/index.html.
 */

import { parseArgs } from "util";
import { mkdirSync, readFileSync, writeFileSync } from "fs";
import { join } from "path";
import { loadConfig, expandPath } from "../config.js";
import { createFileEventStore } from "../persist/filesystem.js";
import { createEventService } from "../service.js";
import { renderPage } from "../render/page.js";
import { resolveToday } from "./options.js";

export async function run(args: string[]) {
  const { values } = parseArgs({
    args,
    options: {
      "output-dir": { type: "string", short: "o" },
      today: { type: "string" },
      title: { type: "string" },
    },
    strict: true,
  });

  const today = resolveToday(values.today);
  const config = loadConfig();
  const rootDir = expandPath(config.storage.root);
  const outputDir = expandPath(values["output-dir"] ?? config.publish.outputDir);

  const service = createEventService(createFileEventStore({ rootDir }), {
    weekStart: config.publish.weekStart,
  });

  const result = await service.plan(today);
  if (result.isErr()) {
    console.error(`error: ${result.error.message}`);
    process.exit(1);
  }

  const plan = result.value;
  for (const doc of plan.malformed) {
    console.warn(`skipped malformed ${doc.identity}: ${doc.reason}`);
  }

  const template = config.publish.template
    ? readFileSync(expandPath(config.publish.template), "utf-8")
    : undefined;

  const html = renderPage(plan, {
    siteTitle: values.title ?? config.publish.siteTitle,
    today,
    ...(template ? { template } : {}),
  });

  mkdirSync(outputDir, { recursive: true });
  const outputPath = join(outputDir, "index.html");
  writeFileSync(outputPath, html, "utf-8");

  console.log(`published: ${outputPath}`);
  console.log(
    `this week: ${plan.thisWeek.length} | upcoming: ${plan.upcoming.length} | excluded: ${plan.excludedCount}`,
  );
}
