// ── Error Taxonomy ──

export class ConfigError extends Error {
  readonly path: string;

  constructor(path: string, message: string, options?: { cause?: unknown }) {
    super(`${path}: ${message}`, options);
    this.name = "ConfigError";
    this.path = path;
  }
}

export class InterpretError extends Error {
  readonly input: string;

  constructor(input: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "InterpretError";
    this.input = input;
  }
}

export type ExecFailureKind = "spawn" | "exit";

export class ExecError extends Error {
  readonly kind: ExecFailureKind;
  readonly program: string;
  readonly stderr: string;
  readonly exitCode: number | null;

  constructor(init: {
    kind: ExecFailureKind;
    program: string;
    message: string;
    stderr?: string;
    exitCode?: number | null;
    cause?: unknown;
  }) {
    super(init.message, { cause: init.cause });
    this.name = "ExecError";
    this.kind = init.kind;
    this.program = init.program;
    this.stderr = init.stderr ?? "";
    this.exitCode = init.exitCode ?? null;
  }
}

export class HistoryIOError extends Error {
  readonly path: string;

  constructor(path: string, message: string, options?: { cause?: unknown }) {
    super(`${path}: ${message}`, options);
    this.name = "HistoryIOError";
    this.path = path;
  }
}

export function isNotFound(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
