// Structured stderr logger — `[Scope:LEVEL] message {data}`
// stdout is left to the CLI; level filtered by INSIGHTS_LOG_LEVEL

export type LogLevel = 'info' | 'warn' | 'error';

export interface Logger {
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, data?: Record<string, unknown>): void;
}

const LEVEL_ORDER: Record<LogLevel | 'silent', number> = {
  info: 0,
  warn: 1,
  error: 2,
  silent: 3,
};

function threshold(): number {
  const env = process.env.INSIGHTS_LOG_LEVEL?.toLowerCase();
  if (env === 'info' || env === 'warn' || env === 'error' || env === 'silent') {
    return LEVEL_ORDER[env];
  }
  return LEVEL_ORDER.info;
}

export function createLogger(scope: string): Logger {
  function log(level: LogLevel, message: string, data?: Record<string, unknown>): void {
    if (LEVEL_ORDER[level] < threshold()) return;
    const prefix = `[${scope}:${level.toUpperCase()}]`;
    if (data) {
      console.error(`${prefix} ${message}`, JSON.stringify(data));
    } else {
      console.error(`${prefix} ${message}`);
    }
  }

  return {
    info: (message, data) => log('info', message, data),
    warn: (message, data) => log('warn', message, data),
    error: (message, data) => log('error', message, data),
  };
}
