import fs from 'node:fs';
import path from 'node:path';
import type { LogLevel } from '@zbx-provision/shared';
import pino, { type DestinationStream, type Logger } from 'pino';

export type { Logger };

export interface LoggerOptions {
  level: LogLevel;
  /** NDJSON log file; created with its parent directory */
  file?: string;
  /** Also write to stdout (headless runs) */
  console?: boolean;
}

/**
 * Structured run logger. Destinations are synchronous so the log is
 * complete even when the process exits right after a failure.
 */
export function createLogger(options: LoggerOptions): Logger {
  const streams: { stream: DestinationStream }[] = [];
  if (options.file) {
    fs.mkdirSync(path.dirname(options.file), { recursive: true });
    streams.push({ stream: pino.destination({ dest: options.file, sync: true }) });
  }
  if (options.console) {
    streams.push({ stream: pino.destination({ dest: 1, sync: true }) });
  }

  const streamLevel = options.level === 'silent' ? 'fatal' : options.level;
  return pino(
    {
      name: 'zbx-provision',
      level: options.level,
      timestamp: pino.stdTimeFunctions.isoTime,
      base: { pid: process.pid },
    },
    pino.multistream(streams.map((s) => ({ ...s, level: streamLevel }))),
  );
}

/** Logger that drops everything */
export function createSilentLogger(): Logger {
  return pino({ level: 'silent' });
}
