/**
 * Pino logger
 *
 * Pretty console output in development, JSON lines in production,
 * plus an optional file target when LOG_FILE is set. Tests get a silent
 * in-process logger so no transport worker is started.
 */

import { pino } from 'pino';
import { config } from '../config/index.js';

function buildTargets(): pino.TransportTargetOptions[] {
  const level = config.logging.level;
  const targets: pino.TransportTargetOptions[] = [];

  if (config.app.env === 'production') {
    targets.push({ target: 'pino/file', level, options: { destination: 1 } });
  } else {
    targets.push({
      target: 'pino-pretty',
      level,
      options: {
        colorize: true,
        translateTime: 'HH:MM:ss',
        ignore: 'pid,hostname',
      },
    });
  }

  if (config.logging.file) {
    targets.push({
      target: 'pino/file',
      level,
      options: { destination: config.logging.file, mkdir: true },
    });
  }

  return targets;
}

/**
 * Errors are logged under `error` throughout, so that key gets pino's error serializer
 */
export function buildLoggerOptions(level: string = config.logging.level): pino.LoggerOptions {
  return {
    name: config.app.name,
    level,
    serializers: { error: pino.stdSerializers.err },
  };
}

function createLogger(): pino.Logger {
  if (config.app.env === 'test') {
    return pino(buildLoggerOptions());
  }

  return pino(buildLoggerOptions(), pino.transport({ targets: buildTargets() }));
}

export const logger = createLogger();
