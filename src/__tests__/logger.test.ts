import { describe, it, expect, afterEach } from 'vitest';
import fs from 'fs';
import os from 'os';
import path from 'path';
import winston from 'winston';
import { configureLogger, createModuleLogger, logger } from '../utils/logger.js';

function fileTransports() {
  return logger.transports.flatMap(t => (t instanceof winston.transports.File ? [t] : []));
}

describe('configureLogger', () => {
  afterEach(() => {
    logger.level = 'info';
    for (const t of fileTransports()) {
      logger.remove(t);
    }
  });

  it('applies the configured level to module loggers', () => {
    configureLogger({ logLevel: 'debug', logDir: undefined });

    expect(logger.level).toBe('debug');
    expect(createModuleLogger('test').isDebugEnabled()).toBe(true);
    expect(fileTransports()).toHaveLength(0);
  });

  it('adds snapshot and error files when a log directory is set', () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'snapshot-logs-'));

    configureLogger({ logLevel: 'warn', logDir: dir });

    expect(logger.level).toBe('warn');
    expect(fileTransports().map(t => t.filename)).toEqual(['snapshot.log', 'errors.log']);
  });
});
