import { readFileSync, appendFileSync } from "node:fs";
import { HistoryIOError, errorMessage, isNotFound } from "./errors.js";

export type HistoryWriteResult =
  | { ok: true }
  | { ok: false; error: HistoryIOError };

// Append-only, one command per line; an entry with a newline reloads as several
export class CommandHistory {
  private path: string;
  private commands: string[] = [];

  constructor(path: string) {
    this.path = path;
  }

  // Missing file = empty history
  load(): void {
    let raw: string;
    try {
      raw = readFileSync(this.path, "utf-8");
    } catch (err) {
      if (isNotFound(err)) return;
      throw new HistoryIOError(this.path, errorMessage(err), { cause: err });
    }

    const lines = raw.split(/\r?\n/);
    if (lines[lines.length - 1] === "") lines.pop();
    this.commands.push(...lines);
  }

  // Best-effort: the in-memory entry is kept even when the file write fails
  add(command: string): HistoryWriteResult {
    this.commands.push(command);
    try {
      appendFileSync(this.path, command + "\n", "utf-8");
      return { ok: true };
    } catch (err) {
      return { ok: false, error: new HistoryIOError(this.path, errorMessage(err), { cause: err }) };
    }
  }

  recent(count: number): string[] {
    const n = Math.floor(count);
    if (!(n > 0)) return [];
    return this.commands.slice(Math.max(0, this.commands.length - n));
  }

  entries(): readonly string[] {
    return [...this.commands];
  }

  size(): number {
    return this.commands.length;
  }

  getPath(): string {
    return this.path;
  }
}
