// ── Interactive Shell: built-ins, natural-language interpretation, execution ──

import * as readline from "node:readline";
import { basename } from "node:path";
import { bold, cyan, dim, green, magenta, red, yellow, CLEAR_SCREEN } from "./colors.js";
import { CommandCompletion } from "./completion.js";
import { errorMessage } from "./errors.js";
import { CommandExecutor, splitCommandLine, type CommandRunner } from "./executor.js";
import { CommandHistory } from "./history.js";
import { t } from "./i18n.js";
import {
  RuleBasedInterpreter,
  looksLikeNaturalLanguage,
  type CommandInterpreter,
} from "./interpreter.js";
import {
  type DispatchOutcome,
  type ShellConfig,
  type ShellState,
  HISTORY_DISPLAY_COUNT,
  VERSION,
} from "./types.js";

export interface OutputSink {
  write(text: string): unknown;
}

export interface ShellIO {
  input: NodeJS.ReadableStream;
  output?: NodeJS.WritableStream;
  terminal?: boolean;
}

export interface ShellOptions {
  config: Readonly<ShellConfig>;
  history: CommandHistory;
  interpreter: CommandInterpreter;
  executor: CommandRunner;
  completion?: CommandCompletion;
  stdout?: OutputSink;
  stderr?: OutputSink;
  cwd?: () => string;
}

const HELP_EXAMPLES: ReadonlyArray<[string, string]> = [
  ["find all text files", "find . -type f"],
  ["show running processes", "ps aux"],
  ["install python package requests", "apt install"],
];

const processStdout: OutputSink = { write: (s) => process.stdout.write(s) };
const processStderr: OutputSink = { write: (s) => process.stderr.write(s) };

// ── ObsidianShell Class ──
export class ObsidianShell {
  private config: Readonly<ShellConfig>;
  private history: CommandHistory;
  private interpreter: CommandInterpreter;
  private executor: CommandRunner;
  private completion: CommandCompletion;
  private out: OutputSink;
  private err: OutputSink;
  private cwd: () => string;

  private state: ShellState = "prompting";
  private rl: readline.Interface | null = null;
  private cmdQueue: string[] = [];
  private isProcessing = false;
  private isClosing = false;
  private inputClosed = false;
  private finished = false;
  private onFinished: (() => void) | null = null;

  constructor(options: ShellOptions) {
    this.config = options.config;
    this.history = options.history;
    this.interpreter = options.interpreter;
    this.executor = options.executor;
    this.completion = options.completion ?? new CommandCompletion();
    this.out = options.stdout ?? processStdout;
    this.err = options.stderr ?? processStderr;
    this.cwd = options.cwd ?? (() => process.cwd());
  }

  getState(): ShellState {
    return this.state;
  }

  async initialize(): Promise<void> {
    try {
      this.history.load();
    } catch (err) {
      this.err.write(`${yellow("⚠")}  ${t("history_load_failed")} ${errorMessage(err)}\n`);
    }

    if (!this.config.aiEnabled || !this.interpreter.initialize) return;

    this.out.write(dim(t("ai_initializing")) + "\n");
    this.out.write(dim(`${t("ai_loading_model")} ${this.config.aiConfig.modelPath}`) + "\n");
    try {
      await this.interpreter.initialize();
      this.out.write(green("✓ ") + t("ai_ready") + "\n");
    } catch (err) {
      // Not fatal: failed interpretations fall back to the raw input
      this.err.write(`${red("✗")} ${errorMessage(err)}\n`);
    }
  }

  // ── REPL ──
  run(io: ShellIO = { input: process.stdin, output: process.stdout, terminal: process.stdout.isTTY }): Promise<void> {
    this.printWelcome();

    return new Promise((resolveRun) => {
      this.onFinished = resolveRun;

      const rl = readline.createInterface({
        input: io.input,
        output: io.output,
        prompt: this.buildPrompt(),
        terminal: io.terminal ?? false,
        completer: this.completion.completer,
      });
      this.rl = rl;

      // Ctrl+C clears the current line; running commands are not interrupted
      rl.on("SIGINT", () => {
        this.out.write("\n");
        if (!this.isProcessing) this.prompt();
      });

      rl.on("line", (line) => {
        if (this.state === "exited") return;
        if (!line.trim()) {
          if (!this.isProcessing) this.prompt();
          return;
        }
        this.enqueue(line);
      });

      rl.on("close", () => {
        this.inputClosed = true;
        this.isClosing = true;
        // Queue still running: processQueue finishes once it drains
        if (!this.isProcessing) this.finish();
      });

      this.prompt();
    });
  }

  // ── Command Queue (ensures sequential execution) ──
  private enqueue(line: string): void {
    this.cmdQueue.push(line);
    if (!this.isProcessing) void this.processQueue();
  }

  private async processQueue(): Promise<void> {
    this.isProcessing = true;
    let line: string | undefined;
    while ((line = this.cmdQueue.shift()) !== undefined) {
      const outcome = await this.safeDispatch(line);
      if (outcome === "exit") {
        this.cmdQueue = [];
        this.isClosing = true;
        if (!this.inputClosed) this.rl?.close();
        break;
      }
      if (!this.isClosing) this.prompt();
    }
    this.isProcessing = false;
    if (this.isClosing) this.finish();
  }

  private async safeDispatch(line: string): Promise<DispatchOutcome> {
    try {
      return await this.dispatch(line);
    } catch (err) {
      this.err.write(`${red("✗")} ${errorMessage(err)}\n`);
      this.state = "prompting";
      return "continue";
    }
  }

  private prompt(): void {
    if (!this.rl || this.inputClosed) return;
    this.state = "prompting";
    this.rl.setPrompt(this.buildPrompt());
    this.rl.prompt();
    this.state = "reading";
  }

  private finish(): void {
    if (this.finished) return;
    this.finished = true;
    this.out.write(dim(`\n${t("bye")}\n`));
    this.onFinished?.();
  }

  // ── Command Dispatch ──
  async dispatch(line: string): Promise<DispatchOutcome> {
    if (this.state === "exited") return "exit";

    const input = line.trim();
    if (!input) {
      this.state = "prompting";
      return "continue";
    }

    this.state = "dispatching";
    switch (input) {
      case "exit":
      case "quit":
        this.state = "exited";
        return "exit";
      case "help":
        this.state = "builtin";
        this.printHelp();
        break;
      case "clear":
        this.state = "builtin";
        this.out.write(CLEAR_SCREEN);
        break;
      case "history":
        this.state = "builtin";
        this.printHistory();
        break;
      default:
        await this.processCommand(input);
    }

    this.state = "prompting";
    return "continue";
  }

  private async processCommand(input: string): Promise<void> {
    // Raw input is recorded before anything runs; a failed append only loses the disk copy
    this.history.add(input);

    if (!this.config.aiEnabled || !looksLikeNaturalLanguage(input)) {
      await this.executeCommand(input);
      return;
    }

    this.state = "interpreting";
    let command: string;
    try {
      command = await this.interpreter.interpret(input);
      this.out.write(`${magenta("🤖")} ${t("ai_interpretation")} ${bold(command)}\n`);
    } catch (err) {
      this.err.write(`${yellow("⚠")}  ${t("ai_interpretation_failed")} ${errorMessage(err)}\n`);
      this.err.write(dim(t("ai_executing_original")) + "\n");
      command = input;
    }
    await this.executeCommand(command);
  }

  // Resolves false on failure, after reporting it
  async executeCommand(line: string): Promise<boolean> {
    const parsed = splitCommandLine(line);
    if (!parsed) return true;

    this.state = "executing";
    try {
      const output = await this.executor.execute(parsed.program, parsed.args);
      if (output) this.out.write(output.endsWith("\n") ? output : output + "\n");
      return true;
    } catch (err) {
      this.err.write(`${red("✗")} ${t("exec_failed")} ${errorMessage(err)}\n`);
      return false;
    }
  }

  // One-shot execution for `exec`; history is not recorded
  async execOnce(command: string, options: { interpret?: boolean } = {}): Promise<boolean> {
    let line = command;
    if (options.interpret) {
      try {
        line = await this.interpreter.interpret(command);
      } catch (err) {
        this.err.write(`${red("✗")} ${t("ai_interpretation_failed")} ${errorMessage(err)}\n`);
        return false;
      }
      this.out.write(`${magenta("🤖")} ${t("ai_interpretation")} ${bold(line)}\n`);
    }
    return this.executeCommand(line);
  }

  // ── Prompt ──
  buildPrompt(): string {
    const dirName = basename(this.cwd()) || "~";
    return `💠 ${cyan(dirName)} ${dim("$")} `;
  }

  // ── Welcome ──
  private printWelcome(): void {
    this.out.write(bold("💠 Obsidian Shell") + dim(` v${VERSION}`) + dim(t("welcome_subtitle")) + "\n");
    this.out.write(dim(t("welcome_hint")) + "\n\n");
  }

  // ── Help ──
  private printHelp(): void {
    const lines = [
      "",
      bold(t("help_header")),
      "",
      t("help_builtins_section"),
      `  ${cyan("help")}       ${t("help_help")}`,
      `  ${cyan("clear")}      ${t("help_clear")}`,
      `  ${cyan("history")}    ${t("help_history")}`,
      `  ${cyan("exit")}       ${t("help_exit")}`,
      `  ${cyan("quit")}       ${t("help_exit")}`,
      "",
      t("help_ai_section"),
      `  ${this.config.aiEnabled ? t("help_ai_enabled") : t("help_ai_disabled")}`,
      `  ${t("help_examples")}`,
      ...HELP_EXAMPLES.map(([from, to]) => `    ${dim(`'${from}'`)} → ${cyan(to)}`),
      "",
    ];
    this.out.write(lines.join("\n") + "\n");
  }

  // ── History ──
  private printHistory(): void {
    const recent = this.history.recent(HISTORY_DISPLAY_COUNT);
    this.out.write(`\n${bold(t("history_header"))}\n`);
    if (recent.length === 0) {
      this.out.write(dim(t("history_empty")) + "\n");
    }
    recent.forEach((command, i) => {
      this.out.write(`${String(i + 1).padStart(3)}: ${command}\n`);
    });
    this.out.write("\n");
  }
}

export function createShell(
  config: Readonly<ShellConfig>,
  io: { stdout?: OutputSink; stderr?: OutputSink } = {}
): ObsidianShell {
  return new ObsidianShell({
    config,
    history: new CommandHistory(config.historyPath),
    interpreter: new RuleBasedInterpreter(config.aiConfig),
    executor: new CommandExecutor(),
    completion: new CommandCompletion(),
    stdout: io.stdout,
    stderr: io.stderr,
  });
}
