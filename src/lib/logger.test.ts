/**
 * Tests for logger utility functions.
 */

import { createLogger } from './logger';

describe('createLogger', () => {
  let consoleSpy: {
    debug: jest.SpyInstance;
    log: jest.SpyInstance;
    warn: jest.SpyInstance;
    error: jest.SpyInstance;
  };

  beforeEach(() => {
    consoleSpy = {
      debug: jest.spyOn(console, 'debug').mockImplementation(),
      log: jest.spyOn(console, 'log').mockImplementation(),
      warn: jest.spyOn(console, 'warn').mockImplementation(),
      error: jest.spyOn(console, 'error').mockImplementation(),
    };
  });

  afterEach(() => {
    consoleSpy.debug.mockRestore();
    consoleSpy.log.mockRestore();
    consoleSpy.warn.mockRestore();
    consoleSpy.error.mockRestore();
  });

  describe('info', () => {
    it('logs message with prefix', () => {
      const logger = createLogger('Selection');
      logger.info('Loaded audio');

      expect(consoleSpy.log).toHaveBeenCalledWith('[Selection] Loaded audio');
    });

    it('logs message with context object', () => {
      const logger = createLogger('Selection');
      const ctx = { durationMs: 5000, channels: 2 };
      logger.info('Loaded audio', ctx);

      expect(consoleSpy.log).toHaveBeenCalledWith('[Selection] Loaded audio', ctx);
    });
  });

  describe('warn', () => {
    it('logs warning with prefix', () => {
      const logger = createLogger('Codec');
      logger.warn('ffmpeg not found');

      expect(consoleSpy.warn).toHaveBeenCalledWith('[Codec] ffmpeg not found');
    });
  });

  describe('error', () => {
    it('logs error with context', () => {
      const logger = createLogger('Export');
      const ctx = { outputPath: 'clip.wav', error: 'disk full' };
      logger.error('Export failed', ctx);

      expect(consoleSpy.error).toHaveBeenCalledWith('[Export] Export failed', ctx);
    });
  });

  describe('debug', () => {
    it('is silent by default', () => {
      const logger = createLogger('Selection');
      logger.debug('Dropped re-entrant update');

      expect(consoleSpy.debug).not.toHaveBeenCalled();
    });

    it('logs when enabled', () => {
      const logger = createLogger('Selection', { debug: true });
      logger.debug('Ignored input', { type: 'pointerMove' });

      expect(consoleSpy.debug).toHaveBeenCalledWith('[Selection] Ignored input', { type: 'pointerMove' });
    });
  });

  it('uses different prefixes for different loggers', () => {
    const codecLogger = createLogger('Codec');
    const exportLogger = createLogger('Export');

    codecLogger.info('codec message');
    exportLogger.info('export message');

    expect(consoleSpy.log).toHaveBeenNthCalledWith(1, '[Codec] codec message');
    expect(consoleSpy.log).toHaveBeenNthCalledWith(2, '[Export] export message');
  });
});
