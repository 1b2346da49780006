// tests/unit/Logger.test.ts

import { describe, it, expect } from 'vitest';
import { Logger } from '../../src/observability/Logger';

describe('Logger', () => {
  const logger = new Logger({ level: 'error', format: 'json' });

  it('should redact access and refresh tokens', () => {
    const redacted = logger['redactSensitive']({
      fullname: 't1_abc123',
      accessToken: 'test-access-token',
      refreshToken: 'test-refresh-token',
    });

    expect(redacted).toEqual({
      fullname: 't1_abc123',
      accessToken: '[REDACTED]',
      refreshToken: '[REDACTED]',
    });
  });

  it('should redact credentials by their wire names', () => {
    const redacted = logger['redactSensitive']({
      access_token: 'test-access-token',
      refresh_token: 'test-refresh-token',
      password: 'test-password',
      clientSecret: 'test-secret',
    });

    expect(redacted).toEqual({
      access_token: '[REDACTED]',
      refresh_token: '[REDACTED]',
      password: '[REDACTED]',
      clientSecret: '[REDACTED]',
    });
  });

  it('should redact credentials inside form bodies', () => {
    const redacted = logger['redactSensitive']({
      url: 'https://www.reddit.com/api/v1/access_token',
      form: { grant_type: 'password', username: 'test-user', password: 'test-password' },
    });

    expect(redacted.form).toEqual({
      grant_type: 'password',
      username: 'test-user',
      password: '[REDACTED]',
    });
    expect(redacted.url).toBe('https://www.reddit.com/api/v1/access_token');
  });

  it('should leave non-sensitive metadata unchanged', () => {
    const meta = { fullname: 't3_xyz789', format: 'richtext', restored: 2 };

    expect(logger['redactSensitive'](meta)).toEqual(meta);
  });

  it('should not mutate the metadata passed in', () => {
    const meta = { accessToken: 'test-access-token' };

    logger['redactSensitive'](meta);

    expect(meta.accessToken).toBe('test-access-token');
  });

  it('should log at every level without throwing', () => {
    const pretty = new Logger({ level: 'error', format: 'pretty' });

    expect(() => {
      pretty.debug('Debug message', { key: 'value' });
      pretty.info('Info message');
      pretty.warn('Warn message', { key: 'value' });
      logger.error('Error message', { password: 'test-password' });
    }).not.toThrow();
  });
});
