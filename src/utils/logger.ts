/**
 * utils/logger.ts
 * Pino logger writing to the log file, and to stdout outside production.
 */
import pino, { type Logger } from 'pino';
import type { LoggingConfig } from '../core/types.js';

export function logLevelFor(config: LoggingConfig): pino.Level {
  return config.environment === 'production' ? 'info' : 'trace';
}

export function createLogger(config: LoggingConfig): Logger {
  const level = logLevelFor(config);
  const streams: pino.StreamEntry[] = [
    // Synchronous so nothing is buffered when the CLI calls process.exit().
    { level, stream: pino.destination({ dest: config.logFile, mkdir: true, sync: true }) },
  ];
  if (config.environment !== 'production') {
    streams.push({ level, stream: process.stdout });
  }
  return pino({ level, base: { app: 'rollcall' } }, pino.multistream(streams));
}
