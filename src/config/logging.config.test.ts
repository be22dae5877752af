import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { getLoggingConfig } from './logging.config.js';

describe('getLoggingConfig', () => {
  it('should default to info with pretty console output outside production', () => {
    const config = getLoggingConfig({});

    assert.equal(config.level, 'info');
    assert.equal(config.pretty, true);
    assert.equal(config.toFile, false);
    assert.equal(config.console, true);
    assert.equal(config.dir, './logs');
    assert.equal(config.rotateDays, 14);
  });

  it('should disable pretty output in production', () => {
    const config = getLoggingConfig({ NODE_ENV: 'production' });
    assert.equal(config.pretty, false);
  });

  it('should fall back to info for an unknown level', () => {
    assert.equal(getLoggingConfig({ LOG_LEVEL: 'verbose' }).level, 'info');
    assert.equal(getLoggingConfig({ LOG_LEVEL: 'warn' }).level, 'warn');
  });

  it('should split and trim redact fields', () => {
    const config = getLoggingConfig({ LOG_REDACT_FIELDS: ' token , secret,,' });
    assert.deepEqual(config.redactFields, ['token', 'secret']);
  });

  it('should redact only credential fields by default', () => {
    assert.deepEqual(getLoggingConfig({}).redactFields, [
      'authorization',
      'cookie',
      'token',
      'password',
      'apiKey',
      'api_key',
      'secret',
    ]);
  });

  it('should ignore a non-positive rotation window', () => {
    assert.equal(getLoggingConfig({ LOG_ROTATE_DAYS: '0' }).rotateDays, 14);
    assert.equal(getLoggingConfig({ LOG_ROTATE_DAYS: '3' }).rotateDays, 3);
  });
});
