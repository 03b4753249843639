/**
 * Logging Configuration
 * Single source of truth for all logging behavior
 */

export type LogLevelSetting = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export interface LoggingConfig {
  level: LogLevelSetting;
  pretty: boolean;
  toFile: boolean;
  dir: string;
  rotateDays: number;
  console: boolean;
  redactFields: string[];
}

const LOG_LEVELS: readonly LogLevelSetting[] = ['debug', 'info', 'warn', 'error', 'silent'];

function resolveLevel(value: string | undefined): LogLevelSetting {
  const match = LOG_LEVELS.find(level => level === value);
  return match ?? 'info';
}

export function getLoggingConfig(): LoggingConfig {
  const isDev = process.env.NODE_ENV === 'development';

  return {
    level: resolveLevel(process.env.LOG_LEVEL),
    pretty: process.env.LOG_PRETTY === 'true' || isDev,
    toFile: process.env.LOG_TO_FILE === 'true',
    dir: process.env.LOG_DIR || './logs',
    rotateDays: Number(process.env.LOG_ROTATE_DAYS || 14),
    console: process.env.LOG_CONSOLE !== 'false',
    redactFields: (process.env.LOG_REDACT_FIELDS ||
      'authorization,cookie,apiKey,api_key,token,secret')
      .split(',').map(f => f.trim()).filter(f => f.length > 0),
  };
}
