/**
 * A command ready for execution: executable name first, then its arguments.
 * Tokens keep the order they were appended in and are never joined into a shell string.
 */
export type Command = readonly string[];

/** Captured outcome of one external process. */
export interface ExecutionResult {
  readonly stdout: string;
  readonly stderr: string;
  readonly exitCode: number;
  readonly durationMs: number;
}

/** Bytes (or text) written to the process's standard input, which is then closed. */
export type StdinPayload = string | Uint8Array;

export interface RunOptions {
  stdin?: StdinPayload;
  /** `null` disables the timeout; `undefined` falls back to the configured one. */
  timeoutMs?: number | null;
  /** Throw CommandFailedError on a non-zero exit. Falls back to the configured value. */
  whiny?: boolean;
  /** Log non-empty stderr at warn level. Defaults to true. */
  stderr?: boolean;
}

export interface BackendRunOptions {
  stdin?: StdinPayload;
  timeoutMs: number | null;
}

/**
 * Runs one process and reports how it ended. A non-zero exit code is a normal
 * result here; backends reject only when the process could not be started
 * (ToolNotFoundError, ExecutionError) or was killed on timeout (TimeoutError).
 */
export interface ShellBackend {
  readonly name: string;
  spawn(command: Command, options: BackendRunOptions): Promise<ExecutionResult>;
}
