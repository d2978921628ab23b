// Command execution layer: every tool invocation passes through Shell.run().
// It picks the backend from config.shellApi, applies the timeout and whiny settings,
// and logs each command with its duration. No retries: a failed command is reported once.
import type { Command, ExecutionResult, RunOptions } from '../types/command.js';
import type { ToolkitConfig } from '../types/config.js';
import { resolveConfig } from '../config/index.js';
import { resolveBackend } from './backends.js';
import { CommandFailedError, StateError } from '../shared/errors.js';

export class Shell {
  readonly config: ToolkitConfig;

  constructor(config?: ToolkitConfig) {
    this.config = resolveConfig(config);
  }

  async run(command: Command, options: RunOptions = {}): Promise<ExecutionResult> {
    if (command.length === 0) {
      throw new StateError('Cannot run an empty command');
    }

    const { logger } = this.config;
    const backend = resolveBackend(this.config.shellApi);
    const timeoutMs = options.timeoutMs === undefined ? this.config.timeoutMs : options.timeoutMs;
    const whiny = options.whiny ?? this.config.whiny;

    const start = performance.now();
    let result: ExecutionResult;
    try {
      result = await backend.spawn(command, { stdin: options.stdin, timeoutMs });
    } catch (err) {
      const durationMs = Math.round(performance.now() - start);
      logger.warn(
        { command: command.join(' '), backend: backend.name, durationMs, err },
        `[${(durationMs / 1000).toFixed(2)}s] ${command.join(' ')} failed`
      );
      throw err;
    }

    logger.debug(
      { command: command.join(' '), backend: backend.name, durationMs: result.durationMs, exitCode: result.exitCode },
      `[${(result.durationMs / 1000).toFixed(2)}s] ${command.join(' ')}`
    );

    if (whiny && result.exitCode !== 0) {
      throw new CommandFailedError(command, result.exitCode, result.stdout, result.stderr);
    }

    if ((options.stderr ?? true) && result.stderr.trim()) {
      logger.warn({ command: command[0], stderr: result.stderr.trim() }, 'Tool wrote to stderr');
    }

    return result;
  }
}
