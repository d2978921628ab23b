// Config loader: reads ~/.config/gdcm-kit/config.yaml (or an explicit path) and merges it over
// the defaults, then applies environment overrides. Unset keys keep their defaults.
// File keys are snake_case and `timeout` is in seconds; see FileConfigSchema.
import { readFileSync } from 'node:fs';
import { join } from 'node:path';
import { homedir } from 'node:os';
import { parse as parseYaml } from 'yaml';
import type { ToolkitConfig } from '../types/config.js';
import { EnvConfigSchema, FileConfigSchema, type FileConfig } from './schema.js';
import { defineConfig } from './index.js';
import { GdcmError, GdcmErrorCode } from '../shared/errors.js';
import { logger } from '../logger.js';

export const DEFAULT_CONFIG_PATH = join(homedir(), '.config', 'gdcm-kit', 'config.yaml');

export interface ConfigResult {
  config: ToolkitConfig;
  configPath: string;
  fromFile: boolean;
}

export function loadConfig(explicitPath?: string, env: NodeJS.ProcessEnv = process.env): ConfigResult {
  const configPath = explicitPath ?? env['GDCM_KIT_CONFIG'] ?? DEFAULT_CONFIG_PATH;

  const fileConfig = readConfigFile(configPath);
  const envResult = EnvConfigSchema.safeParse(env);
  if (!envResult.success) {
    throw new GdcmError(GdcmErrorCode.INVALID_CONFIG, `Invalid environment configuration: ${envResult.error.message}`, {
      issues: envResult.error.issues,
    });
  }
  const fromEnv = envResult.data;

  const merged: FileConfig = { ...(fileConfig ?? {}) };
  if (fromEnv.GDCM_TIMEOUT !== undefined) merged.timeout = fromEnv.GDCM_TIMEOUT;
  if (fromEnv.GDCM_WHINY !== undefined) merged.whiny = fromEnv.GDCM_WHINY === 'true';
  if (fromEnv.GDCM_SHELL_API !== undefined) merged.shell_api = fromEnv.GDCM_SHELL_API;
  if (fromEnv.LOG_LEVEL !== undefined) merged.log_level = fromEnv.LOG_LEVEL;
  if (fromEnv.GDCM_DEBUG === 'true' || fromEnv.GDCM_DEBUG === '1') merged.log_level = 'debug';

  return { config: toToolkitConfig(merged), configPath, fromFile: fileConfig !== null };
}

function readConfigFile(configPath: string): FileConfig | null {
  let raw: string;
  try {
    raw = readFileSync(configPath, 'utf-8');
  } catch (err) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
      logger.debug({ configPath }, 'No config file found, using defaults');
      return null;
    }
    throw err;
  }

  let parsed: unknown;
  try {
    parsed = parseYaml(raw);
  } catch (err) {
    throw new GdcmError(
      GdcmErrorCode.INVALID_CONFIG,
      `Invalid YAML in ${configPath}: ${err instanceof Error ? err.message : String(err)}`,
      { configPath },
      err
    );
  }

  // An empty file parses to null
  const result = FileConfigSchema.safeParse(parsed ?? {});
  if (!result.success) {
    throw new GdcmError(GdcmErrorCode.INVALID_CONFIG, `Invalid config in ${configPath}: ${result.error.message}`, {
      configPath,
      issues: result.error.issues,
    });
  }
  return result.data;
}

function toToolkitConfig(file: FileConfig): ToolkitConfig {
  const defaults = defineConfig();
  return defineConfig({
    timeoutMs: file.timeout == null ? null : Math.round(file.timeout * 1000),
    validateOnCreate: file.validate_on_create,
    whiny: file.whiny,
    shellApi: file.shell_api,
    logger: file.log_level ? defaults.logger.child({}, { level: file.log_level }) : defaults.logger,
  });
}
