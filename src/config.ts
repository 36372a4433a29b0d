/**
 * Environment Configuration
 *
 * VCDIFF_BACKEND    force a backend id for the default registry (e.g. vcdiff/store)
 * VCDIFF_DISABLE    comma separated candidate ids that are never probed
 * VCDIFF_LOG_LEVEL  winston level for diagnostics (default: warn)
 */

const LOG_LEVELS = ['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export interface VcdiffConfig {
  backend: string | null;
  disabled: string[];
  logLevel: LogLevel;
}

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): VcdiffConfig {
  const backend = env.VCDIFF_BACKEND?.trim();
  const level = env.VCDIFF_LOG_LEVEL?.trim().toLowerCase() ?? '';

  return {
    backend: backend ? backend : null,
    disabled: (env.VCDIFF_DISABLE ?? '')
      .split(',')
      .map((id) => id.trim())
      .filter((id) => id.length > 0),
    logLevel: isLogLevel(level) ? level : 'warn',
  };
}
