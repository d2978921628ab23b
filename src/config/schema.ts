import { z } from 'zod';

export const SHELL_API_NAMES = ['execa', 'child-process'] as const;
export const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

/** Shape of config.yaml. Keys are snake_case; `timeout` is in seconds. */
export const FileConfigSchema = z
  .object({
    timeout: z.number().positive().nullable().optional(),
    validate_on_create: z.boolean().optional(),
    whiny: z.boolean().optional(),
    shell_api: z.enum(SHELL_API_NAMES).optional(),
    log_level: z.enum(LOG_LEVELS).optional(),
  })
  .strict();

export type FileConfig = z.infer<typeof FileConfigSchema>;

const emptyToUndefined = (value: unknown): unknown =>
  typeof value === 'string' && value.trim() === '' ? undefined : value;

export const EnvConfigSchema = z.object({
  GDCM_TIMEOUT: z.preprocess(
    (value) => {
      const v = emptyToUndefined(value);
      return typeof v === 'string' ? Number(v) : v;
    },
    z.number().positive().optional()
  ),
  GDCM_WHINY: z.preprocess(emptyToUndefined, z.enum(['true', 'false']).optional()),
  GDCM_DEBUG: z.preprocess(
    (value) => {
      const v = emptyToUndefined(value);
      return typeof v === 'string' ? v.trim().toLowerCase() : v;
    },
    z.enum(['true', 'false', '1', '0']).optional()
  ),
  GDCM_SHELL_API: z.preprocess(emptyToUndefined, z.enum(SHELL_API_NAMES).optional()),
  LOG_LEVEL: z.preprocess(emptyToUndefined, z.enum(LOG_LEVELS).optional()),
});

export type EnvConfig = z.infer<typeof EnvConfigSchema>;
