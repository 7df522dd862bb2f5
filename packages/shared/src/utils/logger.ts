import pino from 'pino';

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal' | 'silent';

export interface CreateLoggerOptions {
  name?: string;
  level?: LogLevel;
  pretty?: boolean;
  destination?: string;
}

const LOG_LEVELS: readonly LogLevel[] = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'];

function isLogLevel(value: string | undefined): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

function levelFromEnv(): LogLevel {
  const value = process.env.REXEC_LOG_LEVEL;
  return isLogLevel(value) ? value : 'info';
}

export function createLogger(options: CreateLoggerOptions = {}): pino.Logger {
  const {
    name = 'rexec',
    level = levelFromEnv(),
    pretty = process.env.REXEC_LOG_PRETTY === '1',
    destination,
  } = options;

  const transport = pretty
    ? {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:HH:MM:ss.l',
          ignore: 'pid,hostname',
        },
      }
    : undefined;

  const dest = destination ? pino.destination(destination) : undefined;

  return pino(
    {
      name,
      level,
      transport: dest ? undefined : transport,
      timestamp: pino.stdTimeFunctions.isoTime,
      formatters: {
        level(label) {
          return { level: label };
        },
      },
    },
    dest,
  );
}
