import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { homedir, tmpdir } from "node:os";
import { join } from "node:path";
import { expandHome, loadConfig } from "./config.js";
import { ConfigError } from "./errors.js";
import { DEFAULT_CONFIG_PATH } from "./types.js";

describe("loadConfig", () => {
  let dir: string;
  let file: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "obsidian-config-"));
    file = join(dir, "config.toml");
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("falls back to defaults when the file is missing", () => {
    expect(loadConfig(file)).toEqual({
      aiEnabled: true,
      guiEnabled: false,
      historyPath: join(homedir(), ".obsidian-shell-history"),
      lang: "en",
      aiConfig: {
        modelPath: "/usr/share/obsidian/models/llm.onnx",
        apiEndpoint: "http://localhost:8000/ai",
        maxTokens: 512,
        temperature: 0.7,
      },
    });
  });

  it("fills missing fields from the defaults", () => {
    writeFileSync(
      file,
      ['ai_enabled = false', 'history_path = "/var/tmp/hist"', "", "[ai_config]", "max_tokens = 64", ""].join("\n")
    );
    const config = loadConfig(file);
    expect(config.aiEnabled).toBe(false);
    expect(config.guiEnabled).toBe(false);
    expect(config.historyPath).toBe("/var/tmp/hist");
    expect(config.aiConfig.maxTokens).toBe(64);
    expect(config.aiConfig.apiEndpoint).toBe("http://localhost:8000/ai");
  });

  it("applies command-line overrides", () => {
    writeFileSync(file, "ai_enabled = false\n");
    const config = loadConfig(file, { ai: true, gui: true });
    expect(config.aiEnabled).toBe(true);
    expect(config.guiEnabled).toBe(true);
  });

  it("returns a frozen configuration", () => {
    const config = loadConfig(file);
    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.aiConfig)).toBe(true);
  });

  it("reads every field of a complete file", () => {
    writeFileSync(
      file,
      [
        "ai_enabled = true",
        "gui_enabled = true",
        'history_path = "~/.shell-history"',
        'lang = "ko"',
        "",
        "[ai_config]",
        'model_path = "/opt/models/small.onnx"',
        'api_endpoint = "http://127.0.0.1:9000/ai"',
        "max_tokens = 128",
        "temperature = 0.2",
        "",
      ].join("\n")
    );
    expect(loadConfig(file)).toEqual({
      aiEnabled: true,
      guiEnabled: true,
      historyPath: join(homedir(), ".shell-history"),
      lang: "ko",
      aiConfig: {
        modelPath: "/opt/models/small.onnx",
        apiEndpoint: "http://127.0.0.1:9000/ai",
        maxTokens: 128,
        temperature: 0.2,
      },
    });
  });

  it("rejects malformed TOML", () => {
    writeFileSync(file, "ai_enabled = \n[ai_config\n");
    expect(() => loadConfig(file)).toThrow(ConfigError);
    expect(() => loadConfig(file)).toThrow(`${file}: invalid TOML: `);
  });

  it("rejects a JSON document", () => {
    writeFileSync(file, JSON.stringify({ ai_enabled: false }));
    expect(() => loadConfig(file)).toThrow(ConfigError);
  });

  it("names the field that has the wrong type", () => {
    writeFileSync(file, '[ai_config]\ntemperature = "hot"\n');
    expect(() => loadConfig(file)).toThrow(
      `${file}: ai_config.temperature: Expected number, received string`
    );
  });

  it("rejects unsupported languages", () => {
    writeFileSync(file, 'lang = "fr"\n');
    expect(() => loadConfig(file)).toThrow(ConfigError);
  });
});

describe("DEFAULT_CONFIG_PATH", () => {
  it("points at config.toml in the config directory", () => {
    expect(DEFAULT_CONFIG_PATH.endsWith("/config.toml")).toBe(true);
  });
});

describe("expandHome", () => {
  it("expands a leading tilde", () => {
    expect(expandHome("~/.obsidian-shell-history")).toBe(join(homedir(), ".obsidian-shell-history"));
    expect(expandHome("~")).toBe(homedir());
  });

  it("leaves other paths untouched", () => {
    expect(expandHome("/tmp/~history")).toBe("/tmp/~history");
  });
});
