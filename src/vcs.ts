/**
 * git plumbing for the store directory: stage, commit and push the
 * documents a command touched. removed documents are staged as deletions.
 */

import { execFile } from "child_process";
import { promisify } from "util";
import { ResultAsync } from "neverthrow";

const execFileAsync = promisify(execFile);

export type VcsError = { _tag: "vcs.git"; message: string };

export interface CommitOptions {
  push: boolean;
}

async function git(cwd: string, args: string[]): Promise<string> {
  try {
    const { stdout } = await execFileAsync("git", args, { cwd });
    return stdout.trim();
  } catch (e) {
    const stderr =
      typeof e === "object" && e !== null && "stderr" in e && typeof e.stderr === "string"
        ? e.stderr.trim()
        : "";
    const detail = stderr || (e instanceof Error ? e.message : String(e));
    throw new Error(`git ${args[0] ?? ""} failed: ${detail}`);
  }
}

export function commitFiles(
  cwd: string,
  paths: readonly string[],
  message: string,
  options: CommitOptions,
): ResultAsync<void, VcsError> {
  return ResultAsync.fromPromise(
    (async () => {
      if (paths.length === 0) return;

      await git(cwd, ["add", "-A", "--", ...paths]);
      await git(cwd, ["commit", "-m", message, "--", ...paths]);
      if (options.push) {
        await git(cwd, ["push"]);
      }
    })(),
    (e: unknown): VcsError => ({
      _tag: "vcs.git",
      message: e instanceof Error ? e.message : String(e),
    }),
  );
}
