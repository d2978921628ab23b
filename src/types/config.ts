import type { Logger } from 'pino';
import type { ShellBackend } from './command.js';

export type ShellApiName = 'execa' | 'child-process';

/** A built-in backend by name, or any object implementing ShellBackend. */
export type ShellApi = ShellApiName | ShellBackend;

/** Settings shared by Shell, Tool and Package. */
export interface ToolkitConfig {
  /** Per-command timeout; null means commands may run forever. */
  timeoutMs: number | null;
  /** Identify every package created by open/read/create and reject invalid ones. */
  validateOnCreate: boolean;
  /** Treat a non-zero exit code as an error. */
  whiny: boolean;
  /** Receives each command with its duration at debug level. */
  logger: Logger;
  shellApi: ShellApi;
}
