import { type CompleterResult } from "node:readline";

export class CommandCompletion {
  // No suggestions yet
  complete(_input: string): string[] {
    return [];
  }

  // readline completer signature
  completer = (line: string): CompleterResult => [this.complete(line), line];
}
