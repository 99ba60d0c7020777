import { pino, type Logger } from 'pino';
import { config } from './config.js';

export type { Logger };

export const logger: Logger = pino({
  level: config.logLevel,
  base: { app: 'jugsense' }
});

export function componentLogger(component: string): Logger {
  return logger.child({ component });
}
