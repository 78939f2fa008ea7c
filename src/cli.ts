#!/usr/bin/env node

import { Command } from "commander";
import { bold, cyan, dim, green, red } from "./colors.js";
import { loadConfig, type ConfigOverrides } from "./config.js";
import { ConfigError, errorMessage } from "./errors.js";
import { setLang, t } from "./i18n.js";
import { RuleBasedInterpreter } from "./interpreter.js";
import { createShell, type OutputSink } from "./shell.js";
import { type ShellConfig, DEFAULT_CONFIG_PATH, VERSION } from "./types.js";

type GlobalOptions = {
  ai?: boolean;
  gui?: boolean;
  config: string;
};

export interface ProgramIO {
  stdout?: OutputSink;
  stderr?: OutputSink;
}

// ── Config display ──
function formatConfig(config: Readonly<ShellConfig>): string[] {
  const row = (label: string, value: string | number | boolean) =>
    `${label.padEnd(14)} ${cyan(String(value))}`;
  return [
    bold(t("config_header")),
    row(t("config_ai_enabled"), config.aiEnabled),
    row(t("config_gui_enabled"), config.guiEnabled),
    row(t("config_history_path"), config.historyPath),
    row(t("config_model_path"), config.aiConfig.modelPath),
    row(t("config_api_endpoint"), config.aiConfig.apiEndpoint),
    row(t("config_max_tokens"), config.aiConfig.maxTokens),
    row(t("config_temperature"), config.aiConfig.temperature),
    row(t("config_lang"), config.lang),
  ];
}

export function createProgram(io: ProgramIO = {}): Command {
  const out: OutputSink = io.stdout ?? { write: (s) => process.stdout.write(s) };
  const err: OutputSink = io.stderr ?? { write: (s) => process.stderr.write(s) };
  const program = new Command();

  const session = (): Readonly<ShellConfig> => {
    const opts = program.opts<GlobalOptions>();
    const overrides: ConfigOverrides = { ai: opts.ai, gui: opts.gui };
    const config = loadConfig(opts.config, overrides);
    setLang(config.lang);
    return config;
  };

  program
    .name("obsidian-shell")
    .description("AI-powered shell: natural-language requests become commands")
    .version(VERSION)
    .option("-a, --ai", "enable AI assistance")
    .option("-g, --gui", "enable GUI mode")
    .option("-c, --config <path>", "configuration file path", DEFAULT_CONFIG_PATH);

  program
    .command("exec")
    .description("execute a single command")
    .argument("<command>", "command line to execute")
    .option("-i, --interpret", "interpret the command as natural language first")
    .action(async (command: string, opts: { interpret?: boolean }) => {
      const shell = createShell(session(), io);
      await shell.initialize();
      const ok = await shell.execOnce(command, { interpret: opts.interpret });
      if (!ok) process.exitCode = 1;
    });

  program
    .command("interactive", { isDefault: true })
    .description("start the interactive shell")
    .action(async () => {
      const shell = createShell(session(), io);
      await shell.initialize();
      await shell.run();
    });

  program
    .command("config")
    .description("show the effective configuration")
    .action(() => {
      out.write(formatConfig(session()).join("\n") + "\n");
    });

  program
    .command("update-models")
    .description("update AI models")
    .action(async () => {
      const config = session();
      out.write(dim(t("models_updating")) + "\n");
      const engine = new RuleBasedInterpreter(config.aiConfig);
      out.write(dim(t("models_downloading")) + "\n");
      await engine.updateModels();
      out.write(green("✓ ") + t("models_updated") + "\n");
    });

  program.configureOutput({
    writeOut: (s) => out.write(s),
    writeErr: (s) => err.write(s),
  });

  return program;
}

// ── Main ──
export async function main(argv: string[] = process.argv): Promise<void> {
  try {
    await createProgram().parseAsync(argv);
  } catch (err) {
    if (err instanceof ConfigError) {
      console.error(red("✗"), t("config_load_failed"), err.message);
    } else {
      console.error(red("✗ Fatal:"), errorMessage(err));
    }
    process.exit(1);
  }
}

// ── Direct execution (bin entry point) ──
if (process.argv[1] &&
    (process.argv[1].endsWith("/cli.js") || process.argv[1].endsWith("/cli.ts") ||
     process.argv[1].endsWith("/obsidian-shell"))) {
  void main();
}
