import { describe, it, expect } from '@jest/globals';
import { DEFAULT_ENGINE_CONFIG, loadConfig } from '../../src/config/index.js';
import { SchemaInvalidError } from '../../src/core/errors.js';

describe('Engine configuration', () => {
  it('should fall back to defaults', () => {
    expect(loadConfig({})).toEqual(DEFAULT_ENGINE_CONFIG);
  });

  it('should read PDP_ variables from the environment', () => {
    const config = loadConfig({
      PDP_MAX_ATTEMPTS: '5',
      PDP_TICK_BATCH_SIZE: '10',
      PDP_RETRY_BACKOFF_MS: '0',
      PDP_LOG_LEVEL: 'debug',
      PDP_DATA_DIR: ' /var/lib/pdp ',
      HOME: '/root',
    });

    expect(config).toEqual({
      ...DEFAULT_ENGINE_CONFIG,
      maxAttempts: 5,
      tickBatchSize: 10,
      retryBackoffMs: 0,
      logLevel: 'debug',
      dataDir: '/var/lib/pdp',
    });
  });

  it('should treat blank variables as unset', () => {
    expect(loadConfig({ PDP_MAX_ATTEMPTS: '  ', PDP_SERVICE_NAME: '' })).toEqual(DEFAULT_ENGINE_CONFIG);
  });

  it('should let explicit overrides win over the environment', () => {
    const config = loadConfig({ PDP_MAX_ATTEMPTS: '5' }, { maxAttempts: 1, serviceName: 'audit-worker' });

    expect(config.maxAttempts).toBe(1);
    expect(config.serviceName).toBe('audit-worker');
  });

  it('should reject invalid values with every error listed', () => {
    expect.assertions(3);
    try {
      loadConfig({ PDP_MAX_ATTEMPTS: '0', PDP_LOG_LEVEL: 'verbose' });
    } catch (error) {
      expect(error).toBeInstanceOf(SchemaInvalidError);
      if (!(error instanceof SchemaInvalidError)) return;
      expect(error.errors).toHaveLength(2);
      expect(error.errors[0]).toMatch(/^PDP_MAX_ATTEMPTS: /);
    }
  });

  it('should reject non-integer counts', () => {
    expect(() => loadConfig({ PDP_TICK_BATCH_SIZE: 'ten' })).toThrow(SchemaInvalidError);
    expect(() => loadConfig({ PDP_TICK_BATCH_SIZE: '2.5' })).toThrow(SchemaInvalidError);
  });
});
