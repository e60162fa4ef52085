import pino, { type Logger } from 'pino';
import { getConfig, logLevelSchema, type LogLevel } from '@riskscan/config';

const PID = process.pid;

export type ScopedLogger = Logger;

export interface LoggerOptions {
  level?: LogLevel;
}

const destination = pino.destination({
  sync: false
});

function resolveLevel(defaultLevel: LoggerOptions['level']): LogLevel {
  const fromEnv = logLevelSchema.safeParse(process.env.LOG_LEVEL);
  if (fromEnv.success) {
    return fromEnv.data;
  }
  return defaultLevel ?? getConfig().logging.level;
}

export function createLogger(scope: string, options?: LoggerOptions): ScopedLogger {
  const level = resolveLevel(options?.level);
  const baseLogger = pino(
    {
      level,
      base: { pid: PID, scope },
      formatters: {
        level: (label) => ({ level: label })
      },
      timestamp: pino.stdTimeFunctions.isoTime
    },
    destination
  );
  return baseLogger;
}
