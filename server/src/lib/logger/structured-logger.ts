/**
 * Structured Logger with Pino
 *
 * - JSON logging with Pino
 * - Optional daily rotated log files
 * - Pretty console output in development
 * - Secret redaction (API keys end up in Forvo URLs)
 * - Request tracking via child loggers
 */

import pino from 'pino';
import * as rfs from 'rotating-file-stream';
import pinoPretty from 'pino-pretty';
import path from 'node:path';
import fs from 'node:fs';
import { getLoggingConfig } from '../../config/logging.config.js';

const config = getLoggingConfig();

// Multistream entries need a concrete level; 'silent' is handled by the root logger
const streamLevel: pino.Level = config.level === 'silent' ? 'fatal' : config.level;

const streams: pino.StreamEntry[] = [];

if (config.console) {
  streams.push({
    level: streamLevel,
    stream: config.pretty
      ? pinoPretty({
          colorize: true,
          translateTime: 'SYS:HH:MM:ss',
          ignore: 'pid,hostname',
        })
      : process.stdout,
  });
}

if (config.toFile) {
  const logsDir = path.resolve(process.cwd(), config.dir);
  if (!fs.existsSync(logsDir)) {
    fs.mkdirSync(logsDir, { recursive: true });
  }

  streams.push({
    level: streamLevel,
    stream: rfs.createStream('lexicon.log', {
      interval: '1d',
      path: logsDir,
      maxFiles: config.rotateDays,
      compress: 'gzip',
    }),
  });
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
  pino.multistream(streams)
);

export type Logger = pino.Logger;
