// ── Command Execution ──

import { spawn } from "node:child_process";
import { ExecError } from "./errors.js";

export interface CommandRunner {
  execute(program: string, args: readonly string[]): Promise<string>;
}

export interface ParsedCommand {
  program: string;
  args: string[];
}

// Whitespace split only: no quoting, globbing or variable expansion
export function splitCommandLine(line: string): ParsedCommand | null {
  const parts = line.trim().split(/\s+/).filter(Boolean);
  if (parts.length === 0) return null;
  const [program, ...args] = parts;
  return { program, args };
}

// No shell, no timeout: resolves with stdout, rejects with ExecError
export class CommandExecutor implements CommandRunner {
  private cwd: string | undefined;

  constructor(options: { cwd?: string } = {}) {
    this.cwd = options.cwd;
  }

  execute(program: string, args: readonly string[]): Promise<string> {
    return new Promise((resolveCmd, rejectCmd) => {
      let stdout = "";
      let stderr = "";
      let settled = false;

      const child = spawn(program, args, {
        cwd: this.cwd,
        env: process.env,
        stdio: ["ignore", "pipe", "pipe"],
      });

      child.stdout.setEncoding("utf-8");
      child.stderr.setEncoding("utf-8");
      child.stdout.on("data", (chunk: string) => {
        stdout += chunk;
      });
      child.stderr.on("data", (chunk: string) => {
        stderr += chunk;
      });

      child.on("error", (err) => {
        if (settled) return;
        settled = true;
        rejectCmd(
          new ExecError({
            kind: "spawn",
            program,
            message: `Failed to execute ${program}: ${err.message}`,
            cause: err,
          })
        );
      });

      child.on("close", (code, signal) => {
        if (settled) return;
        settled = true;
        if (code === 0) {
          resolveCmd(stdout);
          return;
        }
        const status = code !== null ? `exit code ${code}` : `signal ${signal ?? "unknown"}`;
        const detail = stderr.trim();
        rejectCmd(
          new ExecError({
            kind: "exit",
            program,
            message: detail
              ? `Command failed (${status}): ${detail}`
              : `Command failed (${status})`,
            stderr,
            exitCode: code,
          })
        );
      });
    });
  }
}
