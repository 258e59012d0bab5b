import pino, { Logger } from 'pino';

export type { Logger };

export function createLogger(name: string, level: string = process.env.PROCWAY_LOG_LEVEL || 'info'): Logger {
  return pino({ name, level });
}

/**
 * Logger that discards everything; default for library classes constructed
 * without one
 */
export const silentLogger: Logger = pino({ level: 'silent' });
