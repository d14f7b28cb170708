import { pino } from 'pino';
import type { Logger } from 'pino';

export type { Logger };

const LOG_LEVEL = process.env['LOG_LEVEL'] ?? 'info';

export const rootLogger: Logger = pino({
  level: LOG_LEVEL,
  timestamp: pino.stdTimeFunctions.isoTime,
  formatters: {
    level(label: string) {
      return { level: label };
    },
  },
});

export function createLogger(module: string, extra?: Record<string, unknown>): Logger {
  return rootLogger.child({ module, ...extra });
}
