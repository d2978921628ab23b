export { Package, withPackage } from './package/package.js';
export type { PackageOptions, OpenOptions, ConvertOptions, ConvertOptionValue } from './package/package.js';
export { PackageInfo } from './package/info.js';
export type { PackageRef } from './package/info.js';
export { parseMetadata, parseDumpTags } from './package/metadata-parser.js';
export type { MetadataMap, DumpTag } from './package/metadata-parser.js';

export { Tool, Convert, Identify, Dump, toFlag, chompNewline } from './tool/index.js';
export type { OptionValue, StackChild, ToolOptions, ExecuteOptions } from './tool/index.js';

export { Shell } from './execution/shell.js';
export { execaBackend, childProcessBackend, resolveBackend } from './execution/backends.js';

export { defineConfig, configure, getConfig, resetConfig } from './config/index.js';
export { loadConfig, DEFAULT_CONFIG_PATH } from './config/loader.js';
export type { ConfigResult } from './config/loader.js';

export {
  GdcmError,
  GdcmErrorCode,
  ExecutionError,
  ToolNotFoundError,
  TimeoutError,
  CommandFailedError,
  InvalidPackageError,
  StateError,
} from './shared/errors.js';

export type { Command, ExecutionResult, RunOptions, StdinPayload, ShellBackend, BackendRunOptions } from './types/command.js';
export type { ToolkitConfig, ShellApi, ShellApiName } from './types/config.js';

export { logger, logLevelFromEnv } from './logger.js';
export { VERSION, cliVersion } from './version.js';
