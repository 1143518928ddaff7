/**
 * shell-command LLM adapter: pipes prompt to configured shell command.
 * the command reads from stdin and writes to stdout.
 */

import { spawn } from "child_process";

export interface ShellAdapterOptions {
  command: string;
  timeout?: number;
}

export function executeShellLLM(prompt: string, options: ShellAdapterOptions): Promise<string> {
  const timeout = options.timeout ?? 300000;

  return new Promise((resolve, reject) => {
    const proc = spawn("sh", ["-c", options.command], { stdio: ["pipe", "pipe", "pipe"] });

    let stdout = "";
    let stderr = "";
    let settled = false;

    const settle = (outcome: () => void) => {
      if (settled) return;
      settled = true;
      clearTimeout(timeoutId);
      outcome();
    };

    const timeoutId = setTimeout(() => {
      proc.kill();
      settle(() => reject(new Error(`LLM command timed out after ${timeout}ms`)));
    }, timeout);

    proc.stdout.setEncoding("utf-8");
    proc.stderr.setEncoding("utf-8");
    proc.stdout.on("data", (chunk: string) => {
      stdout += chunk;
    });
    proc.stderr.on("data", (chunk: string) => {
      stderr += chunk;
    });

    // a command may exit without reading its input
    proc.stdin.on("error", (e: NodeJS.ErrnoException) => {
      if (e.code !== "EPIPE") settle(() => reject(e));
    });

    proc.on("error", (e) => settle(() => reject(e)));

    proc.on("close", (code, signal) => {
      if (code !== 0) {
        settle(() =>
          reject(new Error(`LLM command failed with exit code ${code ?? signal}: ${stderr.trim()}`)),
        );
        return;
      }
      settle(() => resolve(stdout.trim()));
    });

    proc.stdin.end(prompt);
  });
}
