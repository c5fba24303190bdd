/**
 * Structured Logger with Pino
 *
 * Features:
 * - Fast JSON logging with Pino
 * - Pretty console output in DEV
 * - Optional daily rotated log files (LOG_TO_FILE=true)
 * - Automatic secret redaction
 * - Connection/request tracking via child loggers
 */

import pino from 'pino';
import { PinoPretty } from 'pino-pretty';
import { createStream } from 'rotating-file-stream';
import path from 'node:path';
import fs from 'node:fs';
import { getLoggingConfig } from '../../config/logging.config.js';

const config = getLoggingConfig();

function buildStreams(level: pino.Level): pino.StreamEntry[] {
  const streams: pino.StreamEntry[] = [];

  if (config.console) {
    streams.push({
      level,
      stream: config.pretty
        ? PinoPretty({
            colorize: true,
            translateTime: 'SYS:HH:MM:ss',
            ignore: 'pid,hostname',
          })
        : process.stdout,
    });
  }

  if (config.toFile) {
    const logsDir = path.resolve(process.cwd(), config.dir);
    fs.mkdirSync(logsDir, { recursive: true });

    streams.push({
      level,
      stream: createStream('hub.log', {
        interval: '1d',
        path: logsDir,
        maxFiles: config.rotateDays,
        compress: 'gzip',
      }),
    });
  }

  return streams;
}

export const logger = pino(
  {
    level: config.level,
    redact: {
      paths: config.redactFields,
      censor: '[REDACTED]',
    },
    formatters: {
      level: (label) => ({ level: label }),
    },
    timestamp: pino.stdTimeFunctions.isoTime,
  },
  pino.multistream(config.level === 'silent' ? [] : buildStreams(config.level))
);

export type Logger = typeof logger;
