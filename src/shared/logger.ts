export const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export type LogEvent = Record<string, unknown>;

export type Logger = {
  debug: (event: LogEvent) => void;
  info: (event: LogEvent) => void;
  warn: (event: LogEvent) => void;
  error: (event: LogEvent) => void;
};

export const isLogLevel = (value: string): value is LogLevel =>
  value === 'debug' || value === 'info' || value === 'warn' || value === 'error';

const serializeValue = (value: unknown): unknown =>
  value instanceof Error ? { name: value.name, message: value.message } : value;

function stripUndefined(obj: LogEvent): LogEvent {
  const cleaned: LogEvent = {};
  for (const [key, value] of Object.entries(obj)) {
    if (value !== undefined) cleaned[key] = serializeValue(value);
  }
  return cleaned;
}

export function createLogger(base: LogEvent, minLevel: LogLevel = 'info'): Logger {
  const baseFields = stripUndefined(base);
  const threshold = LOG_LEVELS.indexOf(minLevel);

  const log = (level: LogLevel, event: LogEvent) => {
    if (LOG_LEVELS.indexOf(level) < threshold) {
      return;
    }

    const line = JSON.stringify({
      timestamp: new Date().toISOString(),
      level,
      ...baseFields,
      ...stripUndefined(event),
    });

    if (level === 'error') {
      console.error(line);
      return;
    }
    if (level === 'warn') {
      console.warn(line);
      return;
    }
    console.log(line);
  };

  return {
    debug: (event) => log('debug', event),
    info: (event) => log('info', event),
    warn: (event) => log('warn', event),
    error: (event) => log('error', event),
  };
}
