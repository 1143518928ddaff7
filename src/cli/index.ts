#!/usr/bin/env node
/**
 * CLI entrypoint: routes commands to handlers.
 */

import { errorMessage } from "../errors.js";

const COMMANDS = ["commit", "publish", "cleanup", "list", "doctor"] as const;

type Command = (typeof COMMANDS)[number];

function isCommand(value: string | undefined): value is Command {
  return COMMANDS.some((command) => command === value);
}

async function main() {
  // handlers parse their own flags from everything after the command name
  const [command, ...args] = process.argv.slice(2);

  if (!isCommand(command)) {
    console.error(`usage: events <command> [options]`);
    console.error(`commands: ${COMMANDS.join(", ")}`);
    process.exit(1);
  }

  switch (command) {
    case "commit":
      await (await import("./commit.js")).run(args);
      break;
    case "publish":
      await (await import("./publish.js")).run(args);
      break;
    case "cleanup":
      await (await import("./cleanup.js")).run(args);
      break;
    case "list":
      await (await import("./list.js")).run(args);
      break;
    case "doctor":
      await (await import("./doctor.js")).run(args);
      break;
  }
}

main().catch((e: unknown) => {
  console.error(errorMessage(e));
  process.exit(1);
});
