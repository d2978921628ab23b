export enum GdcmErrorCode {
  TOOL_NOT_FOUND = 'TOOL_NOT_FOUND',
  TIMEOUT = 'TIMEOUT',
  COMMAND_FAILED = 'COMMAND_FAILED',
  SPAWN_FAILED = 'SPAWN_FAILED',
  INVALID_PACKAGE = 'INVALID_PACKAGE',
  INVALID_STATE = 'INVALID_STATE',
  INVALID_CONFIG = 'INVALID_CONFIG',
}

export class GdcmError extends Error {
  readonly code: GdcmErrorCode;
  readonly context?: Record<string, unknown>;

  constructor(code: GdcmErrorCode, message: string, context?: Record<string, unknown>, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = 'GdcmError';
    this.code = code;
    this.context = context;
  }
}

// Anything that went wrong while running an external tool.
export class ExecutionError extends GdcmError {
  readonly command: readonly string[];

  constructor(
    code: GdcmErrorCode,
    message: string,
    command: readonly string[],
    context?: Record<string, unknown>,
    cause?: unknown
  ) {
    super(code, message, { command: command.join(' '), ...context }, cause);
    this.name = 'ExecutionError';
    this.command = command;
  }
}

export class ToolNotFoundError extends ExecutionError {
  constructor(command: readonly string[], cause?: unknown) {
    super(
      GdcmErrorCode.TOOL_NOT_FOUND,
      `Executable not found: ${command[0] ?? '(none)'}. Is GDCM installed and on the PATH?`,
      command,
      undefined,
      cause
    );
    this.name = 'ToolNotFoundError';
  }
}

export class TimeoutError extends ExecutionError {
  readonly timeoutMs: number;

  constructor(command: readonly string[], timeoutMs: number) {
    super(GdcmErrorCode.TIMEOUT, `Command timed out after ${timeoutMs}ms: ${command.join(' ')}`, command, {
      timeoutMs,
    });
    this.name = 'TimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

export class CommandFailedError extends ExecutionError {
  readonly exitCode: number;
  readonly stdout: string;
  readonly stderr: string;

  constructor(command: readonly string[], exitCode: number, stdout: string, stderr: string) {
    const detail = stderr.trim();
    super(
      GdcmErrorCode.COMMAND_FAILED,
      `Command exited with ${exitCode}: ${command.join(' ')}${detail ? `\n${detail}` : ''}`,
      command,
      { exitCode, stderr }
    );
    this.name = 'CommandFailedError';
    this.exitCode = exitCode;
    this.stdout = stdout;
    this.stderr = stderr;
  }
}

export class InvalidPackageError extends GdcmError {
  readonly path: string;

  constructor(path: string, cause: ExecutionError) {
    super(GdcmErrorCode.INVALID_PACKAGE, cause.message, { path }, cause);
    this.name = 'InvalidPackageError';
    this.path = path;
  }
}

export class StateError extends GdcmError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(GdcmErrorCode.INVALID_STATE, message, context);
    this.name = 'StateError';
  }
}
