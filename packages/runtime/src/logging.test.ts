// Tests for logging

import { afterEach, describe, it, expect, vi } from 'vitest';
import { consoleLogger, createCapturingLogger, createConsoleLogger } from './logging.js';

// --- Tests ---

describe('createConsoleLogger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should prefix lines with the level and scope', () => {
    const info = vi.spyOn(console, 'info').mockImplementation(() => {});
    const logger = createConsoleLogger('weather-bridge');

    logger.info('Resolved locale table', { kind: 'units' });

    expect(info).toHaveBeenCalledWith('[INFO] [weather-bridge] Resolved locale table', { kind: 'units' });
  });

  it('should pass an empty string when there is no data', () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});

    createConsoleLogger('weather-bridge').error('Diagnostic listener failed');

    expect(error).toHaveBeenCalledWith('[ERROR] [weather-bridge] Diagnostic listener failed', '');
  });

  it('should use the default scope for the shared console logger', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});

    consoleLogger.warn('Unresolved reference @compass_rose');

    expect(warn).toHaveBeenCalledWith('[WARN] [station-locale] Unresolved reference @compass_rose', '');
  });

  it('should route debug lines to console.debug', () => {
    const debug = vi.spyOn(console, 'debug').mockImplementation(() => {});

    createConsoleLogger().debug('Loading', { language: 'cs' });

    expect(debug).toHaveBeenCalledWith('[DEBUG] [station-locale] Loading', { language: 'cs' });
  });
});

describe('createCapturingLogger', () => {
  it('should group messages by level', () => {
    const logger = createCapturingLogger();

    logger.info('first');
    logger.warn('second');
    logger.info('third');

    expect(logger.messages('info')).toEqual(['first', 'third']);
    expect(logger.entries).toHaveLength(3);
  });
});
