// ── Shared Types ──

import { homedir } from "node:os";
import { type Lang } from "./locales/index.js";

export interface AIConfig {
  modelPath: string;
  apiEndpoint: string;
  maxTokens: number;
  temperature: number;
}

export interface ShellConfig {
  aiEnabled: boolean;
  guiEnabled: boolean;
  historyPath: string;
  lang: Lang;
  aiConfig: AIConfig;
}

export type ShellState =
  | "prompting"
  | "reading"
  | "dispatching"
  | "builtin"
  | "interpreting"
  | "executing"
  | "exited";

export type DispatchOutcome = "continue" | "exit";

export const VERSION = "0.1.0";

export const CONFIG_DIR =
  process.env.OBSIDIAN_SHELL_CONFIG_DIR ||
  `${homedir()}/.config/obsidian-shell`;

export const DEFAULT_CONFIG_PATH = `${CONFIG_DIR}/config.toml`;
export const DEFAULT_HISTORY_PATH = "~/.obsidian-shell-history";

export const HISTORY_DISPLAY_COUNT = 10;

// Substrings that mark input as a natural-language request
export const NATURAL_LANGUAGE_TRIGGERS = [
  "find", "search", "show", "list", "get", "create", "delete",
  "move", "copy", "open", "start", "stop", "install", "update",
] as const;
