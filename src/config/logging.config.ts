/**
 * Logging Configuration
 * Single source of truth for all logging behavior
 */

export type LogLevelName = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export interface LoggingConfig {
  level: LogLevelName;
  pretty: boolean;
  toFile: boolean;
  dir: string;
  rotateDays: number;
  console: boolean;
  redactFields: string[];
}

const LOG_LEVELS: readonly LogLevelName[] = ['debug', 'info', 'warn', 'error', 'silent'];

function isLogLevel(value: string | undefined): value is LogLevelName {
  return LOG_LEVELS.some((level) => level === value);
}

export function getLoggingConfig(env: NodeJS.ProcessEnv = process.env): LoggingConfig {
  const isDev = env.NODE_ENV !== 'production';
  const rotateDays = Number(env.LOG_ROTATE_DAYS || 14);

  return {
    level: isLogLevel(env.LOG_LEVEL) ? env.LOG_LEVEL : 'info',
    pretty: env.LOG_PRETTY === 'true' || (isDev && env.LOG_PRETTY !== 'false'),
    // Library code: never write files unless asked to
    toFile: env.LOG_TO_FILE === 'true',
    dir: env.LOG_DIR || './logs',
    rotateDays: Number.isFinite(rotateDays) && rotateDays > 0 ? rotateDays : 14,
    console: env.LOG_CONSOLE !== 'false',
    redactFields: (env.LOG_REDACT_FIELDS ||
      'authorization,cookie,token,password,apiKey,api_key,secret')
      .split(',').map(f => f.trim()).filter(f => f.length > 0),
  };
}
