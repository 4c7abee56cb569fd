import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { ConfigService } from '../config';
import { Logger } from './logger';

describe('Logger', () => {
  let logDir: string;

  beforeEach(() => {
    logDir = fs.mkdtempSync(path.join(os.tmpdir(), 'locations-logs-'));
  });

  afterEach(() => {
    vi.restoreAllMocks();
    fs.rmSync(logDir, { recursive: true, force: true });
  });

  it('writes JSON lines to a dated file in the log directory', async () => {
    const logger = new Logger(new ConfigService({
      LOG_TO_CONSOLE: 'false',
      LOG_TO_FILE: 'true',
      LOG_DIR: logDir
    }));
    const now = new Date();
    const expectedName = `app-${now.getFullYear()}-${String(now.getMonth() + 1).padStart(2, '0')}-${String(now.getDate()).padStart(2, '0')}.log`;

    logger.getLogger('LoggerTest').info('location store ready', { count: 2 });

    const logFile = logger.getLogFilePath();
    expect(logFile).toBe(path.join(logDir, expectedName));
    await vi.waitFor(() => {
      expect(fs.readFileSync(path.join(logDir, expectedName), 'utf8')).toContain('location store ready');
    });

    const entry: unknown = JSON.parse(fs.readFileSync(path.join(logDir, expectedName), 'utf8').trim().split('\n')[0]);
    expect(entry).toMatchObject({
      level: 'info',
      message: 'location store ready',
      module: 'LoggerTest',
      data: { count: 2 }
    });
  });

  it('creates a missing log directory', () => {
    const nested = path.join(logDir, 'nested', 'logs');

    const logger = new Logger(new ConfigService({
      LOG_TO_CONSOLE: 'false',
      LOG_TO_FILE: 'true',
      LOG_DIR: nested
    }));

    expect(fs.statSync(nested).isDirectory()).toBe(true);
    expect(path.dirname(logger.getLogFilePath() ?? '')).toBe(nested);
  });

  it('stays quiet when no transport is enabled', () => {
    const consoleError = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const logger = new Logger(new ConfigService({ LOG_TO_CONSOLE: 'false', LOG_TO_FILE: 'false' }));

    logger.getLogger('LoggerTest').error('nobody is listening');

    expect(logger.getLogFilePath()).toBeNull();
    expect(consoleError).not.toHaveBeenCalled();
  });

  it('flattens errors passed as data', async () => {
    const logger = new Logger(new ConfigService({
      LOG_TO_CONSOLE: 'false',
      LOG_TO_FILE: 'true',
      LOG_DIR: logDir
    }));
    const logFile = logger.getLogFilePath() ?? '';

    logger.getLogger('LoggerTest').error('save failed', new Error('disk full'));

    await vi.waitFor(() => {
      expect(fs.readFileSync(logFile, 'utf8')).toContain('disk full');
    });
    const entry: unknown = JSON.parse(fs.readFileSync(logFile, 'utf8').trim().split('\n')[0]);
    expect(entry).toMatchObject({ data: { name: 'Error', message: 'disk full' } });
  });
});
