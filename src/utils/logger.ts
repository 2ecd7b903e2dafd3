import path from 'path';
import winston from 'winston';
import type { AppConfig } from '../types/index.js';

const { combine, timestamp, printf, colorize } = winston.format;

const logFormat = printf(({ level, message, timestamp: ts, module: mod, ...meta }) => {
  const moduleTag = mod ? `[${mod}]` : '';
  const metaStr = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : '';
  return `${ts} ${level} ${moduleTag} ${message}${metaStr}`;
});

export const logger = winston.createLogger({
  level: 'info',
  format: combine(
    timestamp({ format: 'HH:mm:ss.SSS' }),
    logFormat
  ),
  transports: [
    new winston.transports.Console({
      format: combine(colorize(), timestamp({ format: 'HH:mm:ss.SSS' }), logFormat),
    }),
  ],
});

/** Apply the configured level, and add file output when a log directory is set. */
export function configureLogger(config: Pick<AppConfig, 'logLevel' | 'logDir'>): void {
  logger.level = config.logLevel;
  if (!config.logDir) return;

  logger.add(new winston.transports.File({
    filename: path.join(config.logDir, 'snapshot.log'),
    maxsize: 10_000_000, // 10MB
    maxFiles: 5,
  }));
  logger.add(new winston.transports.File({
    filename: path.join(config.logDir, 'errors.log'),
    level: 'error',
    maxsize: 10_000_000,
    maxFiles: 3,
  }));
}

export function createModuleLogger(moduleName: string): winston.Logger {
  return logger.child({ module: moduleName });
}
