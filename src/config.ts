// ── Session Configuration ──

import { readFileSync } from "node:fs";
import { homedir } from "node:os";
import { join } from "node:path";
import { parse as parseToml } from "smol-toml";
import { z } from "zod";
import { ConfigError, errorMessage, isNotFound } from "./errors.js";
import { SUPPORTED_LANGS } from "./locales/index.js";
import { type ShellConfig, DEFAULT_HISTORY_PATH } from "./types.js";

const DEFAULT_AI_CONFIG = {
  model_path: "/usr/share/obsidian/models/llm.onnx",
  api_endpoint: "http://localhost:8000/ai",
  max_tokens: 512,
  temperature: 0.7,
};

// On-disk shape (snake_case); every field falls back to its own default
const aiConfigSchema = z.object({
  model_path: z.string().default(DEFAULT_AI_CONFIG.model_path),
  api_endpoint: z.string().default(DEFAULT_AI_CONFIG.api_endpoint),
  max_tokens: z.number().int().positive().default(DEFAULT_AI_CONFIG.max_tokens),
  temperature: z.number().min(0).default(DEFAULT_AI_CONFIG.temperature),
});

const configFileSchema = z.object({
  ai_enabled: z.boolean().default(true),
  gui_enabled: z.boolean().default(false),
  history_path: z.string().min(1).default(DEFAULT_HISTORY_PATH),
  lang: z.enum(SUPPORTED_LANGS).default("en"),
  ai_config: aiConfigSchema.default(DEFAULT_AI_CONFIG),
});

type ConfigFile = z.infer<typeof configFileSchema>;

export interface ConfigOverrides {
  ai?: boolean;
  gui?: boolean;
}

export function expandHome(path: string): string {
  if (path === "~") return homedir();
  if (path.startsWith("~/")) return join(homedir(), path.slice(2));
  return path;
}

function toShellConfig(file: ConfigFile): ShellConfig {
  return {
    aiEnabled: file.ai_enabled,
    guiEnabled: file.gui_enabled,
    historyPath: expandHome(file.history_path),
    lang: file.lang,
    aiConfig: {
      modelPath: file.ai_config.model_path,
      apiEndpoint: file.ai_config.api_endpoint,
      maxTokens: file.ai_config.max_tokens,
      temperature: file.ai_config.temperature,
    },
  };
}

function readConfigFile(path: string): unknown {
  let contents: string;
  try {
    contents = readFileSync(path, "utf-8");
  } catch (err) {
    if (isNotFound(err)) return {};
    throw new ConfigError(path, `cannot read file: ${errorMessage(err)}`, { cause: err });
  }

  try {
    return parseToml(contents);
  } catch (err) {
    throw new ConfigError(path, `invalid TOML: ${errorMessage(err)}`, { cause: err });
  }
}

// Missing file = defaults; the result is frozen for the session
export function loadConfig(path: string, overrides: ConfigOverrides = {}): Readonly<ShellConfig> {
  const parsed = configFileSchema.safeParse(readConfigFile(path));
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const field = issue.path.length > 0 ? issue.path.join(".") : "(root)";
    throw new ConfigError(path, `${field}: ${issue.message}`);
  }

  const config = toShellConfig(parsed.data);
  if (overrides.ai) config.aiEnabled = true;
  if (overrides.gui) config.guiEnabled = true;

  Object.freeze(config.aiConfig);
  return Object.freeze(config);
}
