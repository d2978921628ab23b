import pino from 'pino';

const DEBUG_FLAGS = new Set(['1', 'true']);

/** `GDCM_DEBUG=true` (or `1`) forces debug output; otherwise LOG_LEVEL, then info. */
export function logLevelFromEnv(env: NodeJS.ProcessEnv = process.env): string {
  if (DEBUG_FLAGS.has(env['GDCM_DEBUG']?.trim().toLowerCase() ?? '')) return 'debug';
  return env['LOG_LEVEL']?.trim() || 'info';
}

export const logger = pino({
  name: 'gdcm-kit',
  level: logLevelFromEnv(),
  // Commands and their durations go to stderr while developing against a local GDCM build
  transport:
    process.env.NODE_ENV === 'development'
      ? { target: 'pino/file', options: { destination: 2 } }
      : undefined,
});
