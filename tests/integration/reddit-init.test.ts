// tests/integration/reddit-init.test.ts

import { describe, it, expect, afterEach } from 'vitest';
import { ZodError } from 'zod';
import { Reddit } from '../../src/reddit';
import { ClientError } from '../../src/utils/errors';

const baseConfig = {
  clientId: 'test-client-id',
  clientSecret: null,
  userAgent: 'test-agent/1.0',
  logging: { level: 'error' as const },
};

describe('Reddit.init', () => {
  let reddit: Reddit | undefined;

  afterEach(async () => {
    await reddit?.close();
    reddit = undefined;
  });

  it('should start read-only without user credentials', async () => {
    reddit = await Reddit.init(baseConfig);

    expect(reddit.readOnly).toBe(true);
    expect(() => {
      if (reddit) reddit.readOnly = false;
    }).toThrow(ClientError);
  });

  it('should start authenticated with a refresh token', async () => {
    reddit = await Reddit.init({
      ...baseConfig,
      clientSecret: 'test-secret',
      refreshToken: 'test-refresh-token',
    });

    expect(reddit.readOnly).toBe(false);
    reddit.readOnly = true;
    expect(reddit.readOnly).toBe(true);
  });

  it('should reject invalid configuration', async () => {
    await expect(Reddit.init({ ...baseConfig, clientId: '' })).rejects.toThrow(ZodError);
  });

  it('should build lazy models', async () => {
    reddit = await Reddit.init(baseConfig);

    const comment = reddit.comment('c1');
    const submission = reddit.submission('s1');

    expect(comment.fullname).toBe('t1_c1');
    expect(comment.isFetched).toBe(false);
    expect(submission.fullname).toBe('t3_s1');
    expect(reddit.subreddit('test').toString()).toBe('test');
  });

  it('should toggle validate on submit', async () => {
    reddit = await Reddit.init(baseConfig);

    expect(reddit.validateOnSubmit).toBe(false);
    reddit.validateOnSubmit = true;
    expect(reddit.validateOnSubmit).toBe(true);
  });

  it('should expose its metrics registry', async () => {
    reddit = await Reddit.init(baseConfig);

    const metrics = await reddit.getMetrics();

    expect(metrics).toContain('# TYPE edits_total counter');
  });
});
