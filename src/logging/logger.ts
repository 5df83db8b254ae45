import { pino, type Logger } from 'pino';
import type { LogLevel } from '../types/config.types.js';

export type { Logger };

/**
 * JSON-lines logger on stderr. stdout stays free for CLI output.
 */
export function createLogger(level: LogLevel = 'info', name = 'inferline'): Logger {
  return pino({ name, level }, process.stderr);
}

export const silentLogger: Logger = pino({ level: 'silent' });
