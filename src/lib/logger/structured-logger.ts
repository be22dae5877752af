/**
 * Structured Logger with Pino
 *
 * - Fast JSON logging with Pino
 * - Pretty console output in DEV
 * - Daily rotated log files when LOG_TO_FILE=true
 * - Automatic secret redaction
 * - One child logger per component, tagged with `component`
 */

import pino from 'pino';
import * as rfs from 'rotating-file-stream';
import pinoPretty from 'pino-pretty';
import path from 'path';
import fs from 'fs';
import { getLoggingConfig } from '../../config/logging.config.js';

const config = getLoggingConfig();
const streamLevel: pino.Level = config.level === 'silent' ? 'error' : config.level;

let fileStream: rfs.RotatingFileStream | undefined;
if (config.toFile) {
  const logsDir = path.resolve(process.cwd(), config.dir);
  if (!fs.existsSync(logsDir)) {
    fs.mkdirSync(logsDir, { recursive: true });
  }

  fileStream = rfs.createStream('dominos-client.log', {
    interval: '1d',
    path: logsDir,
    maxFiles: config.rotateDays,
    compress: 'gzip',
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
  pino.multistream([
    ...(config.console ? [{
      level: streamLevel,
      stream: config.pretty
        ? pinoPretty({
            colorize: true,
            translateTime: 'SYS:HH:MM:ss',
            ignore: 'pid,hostname',
          })
        : process.stdout,
    }] : []),

    ...(fileStream ? [{
      level: streamLevel,
      stream: fileStream,
    }] : []),
  ])
);

export type Logger = typeof logger;

/**
 * Child logger bound to one component, so every line it writes can be
 * filtered by `component` without repeating it at each call site.
 */
export function createComponentLogger(component: string): Logger {
  return logger.child({ component });
}
