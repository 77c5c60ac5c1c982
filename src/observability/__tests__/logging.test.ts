import { afterEach, describe, it, expect, vi } from 'vitest';
import { StoreError } from '../../errors/categories.js';
import { parseStoreErrorCode } from '../../errors/codes.js';
import { ConsoleLogger, errorContext, isLogLevel, redactUrl } from '../logging.js';

describe('ConsoleLogger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('writes structured lines at or above its level', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const debug = vi.spyOn(console, 'debug').mockImplementation(() => undefined);
    const logger = new ConsoleLogger('warn');

    logger.warn('Aborting failed multipart upload', { key: 'big' });
    logger.debug('Request completed');

    expect(warn).toHaveBeenCalledTimes(1);
    expect(warn.mock.calls[0]?.[0]).toMatch(
      /^\[\d{4}-\d{2}-\d{2}T[\d:.]+Z\] \[WARN\] Aborting failed multipart upload \{"key":"big"\}$/
    );
    expect(debug).not.toHaveBeenCalled();
  });

  it('reports which levels are enabled', () => {
    const logger = new ConsoleLogger('info');

    expect(logger.isEnabled('error')).toBe(true);
    expect(logger.isEnabled('info')).toBe(true);
    expect(logger.isEnabled('debug')).toBe(false);
  });
});

describe('isLogLevel', () => {
  it('accepts level names only', () => {
    expect(isLogLevel('trace')).toBe(true);
    expect(isLogLevel('verbose')).toBe(false);
    expect(isLogLevel('toString')).toBe(false);
  });
});

describe('redactUrl', () => {
  it('drops the query string', () => {
    expect(redactUrl('http://store.test/photos/a?X-Amz-Signature=abc')).toBe('http://store.test/photos/a');
    expect(redactUrl('http://store.test/photos')).toBe('http://store.test/photos');
  });
});

describe('errorContext', () => {
  it('describes store errors by code', () => {
    const error = new StoreError({ status: 404, errorCode: parseStoreErrorCode('NoSuchKey'), message: 'gone' });

    expect(errorContext(error)).toEqual({ errorName: 'StoreError', errorMessage: 'NoSuchKey: gone', errorCode: 'NoSuchKey' });
  });

  it('describes other values', () => {
    expect(errorContext('boom')).toEqual({ errorMessage: 'boom' });
    expect(errorContext(new Error('plain'))).toEqual({ errorName: 'Error', errorMessage: 'plain', errorCode: undefined });
  });
});
