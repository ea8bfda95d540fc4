import pino from 'pino';
import type { Logger, LevelWithSilent, LoggerOptions } from 'pino';

export type { Logger } from 'pino';

export function createLogger(level: LevelWithSilent): Logger {
  const options: LoggerOptions = {
    level,
    formatters: {
      level(label) {
        return { level: label };
      },
    },
    timestamp: pino.stdTimeFunctions.isoTime,
  };
  // silent: no transport worker
  if (level === 'silent') return pino(options);
  return pino({
    ...options,
    transport: {
      target: 'pino/file',
      options: { destination: 1 }, // stdout
    },
  });
}

export function createChildLogger(parent: Logger, module: string): Logger {
  return parent.child({ module });
}
