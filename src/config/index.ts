// Process-wide default configuration and its lifecycle.
// Shell, Tool and Package take an explicit ToolkitConfig; getConfig() is only the fallback
// for callers that pass none. configure() initialises or updates it, resetConfig() tears it down.
import type { ToolkitConfig } from '../types/config.js';
import { logger } from '../logger.js';

export function defineConfig(overrides: Partial<ToolkitConfig> = {}): ToolkitConfig {
  return {
    timeoutMs: overrides.timeoutMs ?? null,
    validateOnCreate: overrides.validateOnCreate ?? true,
    whiny: overrides.whiny ?? true,
    logger: overrides.logger ?? logger,
    shellApi: overrides.shellApi ?? 'execa',
  };
}

let active: ToolkitConfig | null = null;

export function getConfig(): ToolkitConfig {
  if (!active) active = defineConfig();
  return active;
}

/**
 * @example
 *   configure((config) => {
 *     config.timeoutMs = 5_000;
 *   });
 */
export function configure(update: Partial<ToolkitConfig> | ((config: ToolkitConfig) => void)): ToolkitConfig {
  const config = getConfig();
  if (typeof update === 'function') {
    update(config);
  } else {
    active = defineConfig({ ...config, ...update });
  }
  return getConfig();
}

export function resetConfig(): void {
  active = null;
}

/** Resolve per-call settings: an explicit config wins over the process default. */
export function resolveConfig(config?: ToolkitConfig): ToolkitConfig {
  return config ?? getConfig();
}
