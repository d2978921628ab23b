// Process backends selected by the `shellApi` setting.
// Both pass argv straight to the OS (no shell), so arguments are never re-parsed or interpolated.
// Both keep stdout untouched: stripping the final newline is the Tool's job.
import { spawn, type ChildProcess } from 'node:child_process';
import execa from 'execa';
import type { BackendRunOptions, Command, ExecutionResult, ShellBackend } from '../types/command.js';
import type { ShellApi, ShellApiName } from '../types/config.js';
import { ExecutionError, GdcmErrorCode, TimeoutError, ToolNotFoundError } from '../shared/errors.js';

// Reported when the process was killed by a signal other than our own timeout.
export const SIGNAL_EXIT_CODE = 128;

function errnoCode(value: unknown): string | undefined {
  if (value instanceof Error && 'code' in value && typeof value.code === 'string') return value.code;
  return undefined;
}

function spawnFailure(command: Command, err: unknown): ExecutionError {
  if (errnoCode(err) === 'ENOENT') return new ToolNotFoundError(command, err);
  return new ExecutionError(
    GdcmErrorCode.SPAWN_FAILED,
    `Command failed to spawn: ${command[0] ?? '(none)'}`,
    command,
    { cause: err instanceof Error ? err.message : String(err) },
    err
  );
}

// Exit status straight from the child, for results where execa lost it.
function exitStatus(child: ChildProcess): Promise<number> {
  if (child.exitCode !== null) return Promise.resolve(child.exitCode);
  if (child.signalCode !== null) return Promise.resolve(SIGNAL_EXIT_CODE);
  return new Promise((resolve) => {
    child.once('exit', (code: number | null) => resolve(code ?? SIGNAL_EXIT_CODE));
  });
}

export const execaBackend: ShellBackend = {
  name: 'execa',

  async spawn(command: Command, options: BackendRunOptions): Promise<ExecutionResult> {
    const [file, ...args] = command;
    const start = performance.now();

    const subprocess = execa(file, args, {
      input: typeof options.stdin === 'string' || options.stdin === undefined ? options.stdin : Buffer.from(options.stdin),
      timeout: options.timeoutMs ?? 0,
      reject: false,
      stripFinalNewline: false,
    });

    let result: execa.ExecaReturnValue;
    try {
      result = await subprocess;
    } catch (err) {
      // execa rejects even with reject: false when spawn() throws synchronously
      throw spawnFailure(command, err);
    }

    if (result.timedOut) {
      throw new TimeoutError(command, options.timeoutMs ?? 0);
    }

    let exitCode = Number.isInteger(result.exitCode) ? result.exitCode : SIGNAL_EXIT_CODE;
    const code = errnoCode(result);
    if (code === 'EPIPE') {
      // The tool exited without reading all of its input; execa reports the stdin error instead of the exit code
      exitCode = await exitStatus(subprocess);
    } else if (code !== undefined) {
      // With reject: false a spawn error (ENOENT, EACCES) comes back as the resolved value
      throw spawnFailure(command, result);
    }

    return {
      stdout: result.stdout ?? '',
      stderr: result.stderr ?? '',
      exitCode,
      durationMs: Math.round(performance.now() - start),
    };
  },
};

export const childProcessBackend: ShellBackend = {
  name: 'child-process',

  spawn(command: Command, options: BackendRunOptions): Promise<ExecutionResult> {
    const [file, ...args] = command;
    const start = performance.now();

    return new Promise<ExecutionResult>((resolve, reject) => {
      const child = spawn(file, args, { stdio: ['pipe', 'pipe', 'pipe'] });
      const stdout: Buffer[] = [];
      const stderr: Buffer[] = [];
      let timedOut = false;
      let settled = false;

      const timer =
        options.timeoutMs != null
          ? setTimeout(() => {
              timedOut = true;
              child.kill('SIGTERM');
            }, options.timeoutMs)
          : undefined;

      const fail = (err: Error): void => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        reject(err);
      };

      child.stdout.on('data', (chunk: Buffer) => stdout.push(chunk));
      child.stderr.on('data', (chunk: Buffer) => stderr.push(chunk));
      child.on('error', (err) => fail(spawnFailure(command, err)));
      // The exit status decides the outcome; a stdin failure only matters if the process still claims success.
      let stdinError: NodeJS.ErrnoException | null = null;
      child.stdin.on('error', (err: NodeJS.ErrnoException) => {
        stdinError = err;
      });

      child.on('close', (code, signal) => {
        if (timedOut) {
          fail(new TimeoutError(command, options.timeoutMs ?? 0));
          return;
        }
        // EPIPE: the tool exited without reading all of its input
        if (code === 0 && stdinError && stdinError.code !== 'EPIPE') {
          fail(spawnFailure(command, stdinError));
          return;
        }
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        resolve({
          stdout: Buffer.concat(stdout).toString('utf-8'),
          stderr: Buffer.concat(stderr).toString('utf-8'),
          exitCode: code ?? (signal ? SIGNAL_EXIT_CODE : 0),
          durationMs: Math.round(performance.now() - start),
        });
      });

      if (options.stdin !== undefined) {
        child.stdin.end(options.stdin);
      } else {
        child.stdin.end();
      }
    });
  },
};

const BACKENDS: Record<ShellApiName, ShellBackend> = {
  execa: execaBackend,
  'child-process': childProcessBackend,
};

export function resolveBackend(api: ShellApi): ShellBackend {
  return typeof api === 'string' ? BACKENDS[api] : api;
}
