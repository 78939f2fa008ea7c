// ── Natural-language Interpretation ──

import { type AIConfig, NATURAL_LANGUAGE_TRIGGERS } from "./types.js";

// Rejects with InterpretError when no command can be produced
export interface CommandInterpreter {
  interpret(input: string): Promise<string>;
  initialize?(): Promise<void>;
}

interface InterpretationRule {
  matches: (lower: string) => boolean;
  command: string;
}

// Order matters: the first matching rule wins
const RULES: readonly InterpretationRule[] = [
  { matches: (s) => s.includes("find") && s.includes("file"), command: "find . -type f" },
  { matches: (s) => s.includes("process"), command: "ps aux" },
  { matches: (s) => s.includes("install"), command: "apt install" },
];

export function looksLikeNaturalLanguage(input: string): boolean {
  const lower = input.toLowerCase();
  return NATURAL_LANGUAGE_TRIGGERS.some((trigger) => lower.includes(trigger));
}

// Stand-in for a model backend: a fixed decision table, no I/O
export class RuleBasedInterpreter implements CommandInterpreter {
  readonly config: Readonly<AIConfig>;

  constructor(config: Readonly<AIConfig>) {
    this.config = config;
  }

  async initialize(): Promise<void> {}

  async interpret(input: string): Promise<string> {
    const lower = input.toLowerCase();
    const rule = RULES.find((r) => r.matches(lower));
    return rule ? rule.command : input;
  }

  async updateModels(): Promise<void> {}
}
