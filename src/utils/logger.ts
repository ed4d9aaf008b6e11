import winston from 'winston';
import { env } from '../config/env';

const root = winston.createLogger({
  level: env.LOG_LEVEL,
  format: winston.format.combine(
    winston.format.timestamp(),
    winston.format.json()
  ),
  transports: [new winston.transports.Console()],
  silent: env.NODE_ENV === 'test',
});

/**
 * Child logger tagged with the component that writes through it.
 */
export function createLogger(scope: string): winston.Logger {
  return root.child({ scope });
}

export type Logger = winston.Logger;
