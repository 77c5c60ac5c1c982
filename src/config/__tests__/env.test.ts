import { describe, it, expect } from 'vitest';
import { ConfigError } from '../../errors/categories.js';
import { ENV_VARS, createConfigFromEnv, readConfigFromEnv } from '../env.js';

const required = {
  S3_ENDPOINT: 'http://store.test',
  S3_ACCESS_KEY: 'test-key',
  S3_SECRET_KEY: 'test-secret',
};

describe('readConfigFromEnv', () => {
  it('leaves unset variables undefined', () => {
    expect(readConfigFromEnv({})).toEqual({
      endpoint: undefined,
      region: undefined,
      key: undefined,
      secret: undefined,
      token: undefined,
      urlStyle: undefined,
      actionsExpiresIn: undefined,
      timeout: undefined,
      multipartChunkSize: undefined,
      multipartThreshold: undefined,
      multipartConcurrency: undefined,
      logLevel: undefined,
    });
  });

  it('parses every variable', () => {
    const config = readConfigFromEnv({
      ...required,
      [ENV_VARS.REGION]: 'eu-west-1',
      [ENV_VARS.SESSION_TOKEN]: 'test-token',
      [ENV_VARS.URL_STYLE]: 'virtual-host',
      [ENV_VARS.ACTIONS_EXPIRES_IN]: '120',
      [ENV_VARS.TIMEOUT_MS]: ' 2500 ',
      [ENV_VARS.MULTIPART_CHUNK_SIZE]: '6291456',
      [ENV_VARS.MULTIPART_THRESHOLD]: '5242880',
      [ENV_VARS.MULTIPART_CONCURRENCY]: '3',
      [ENV_VARS.LOG_LEVEL]: 'DEBUG',
    });

    expect(config).toEqual({
      endpoint: 'http://store.test',
      region: 'eu-west-1',
      key: 'test-key',
      secret: 'test-secret',
      token: 'test-token',
      urlStyle: 'virtual-host',
      actionsExpiresIn: 120,
      timeout: 2500,
      multipartChunkSize: 6291456,
      multipartThreshold: 5242880,
      multipartConcurrency: 3,
      logLevel: 'debug',
    });
  });

  it.each(['10MB', '1e6', '1.5', 'ten'])('rejects %s as an integer', (value) => {
    expect(() => readConfigFromEnv({ [ENV_VARS.MULTIPART_CHUNK_SIZE]: value })).toThrow(
      `Invalid configuration field S3_MULTIPART_CHUNK_SIZE: must be an integer, got "${value}"`
    );
  });

  it('rejects an unknown url style', () => {
    expect(() => readConfigFromEnv({ [ENV_VARS.URL_STYLE]: 'dns' })).toThrow(ConfigError);
  });

  it('rejects an unknown log level', () => {
    expect(() => readConfigFromEnv({ [ENV_VARS.LOG_LEVEL]: 'toString' })).toThrow(
      'Invalid configuration field S3_LOG_LEVEL: unknown log level "tostring"'
    );
  });
});

describe('createConfigFromEnv', () => {
  it('validates what it reads', () => {
    const config = createConfigFromEnv(required);

    expect(config.endpoint.host).toBe('store.test');
    expect(config.credentials.secretKey).toBe('test-secret');
  });

  it('names the missing field', () => {
    expect(() => createConfigFromEnv({ S3_ENDPOINT: 'http://store.test' })).toThrow(
      'Missing required configuration field: key'
    );
  });
});
