// tests/helpers/deps.ts

import { AuthCore } from '../../src/core/auth/AuthCore';
import { HttpCore } from '../../src/core/http/HttpCore';
import { TokenStore } from '../../src/core/token/TokenStore';
import { Logger } from '../../src/observability/Logger';
import { MetricsCollector } from '../../src/observability/MetricsCollector';
import type { CoreDeps } from '../../src/models/types';

export const TEST_API = 'https://oauth.reddit.com';
export const TEST_USER_AGENT = 'test-agent/1.0';

/**
 * Model dependencies authenticated with a fixed implicit token, so no
 * token endpoint is involved.
 */
export function createTestDeps(settings: { validateOnSubmit?: boolean } = {}): CoreDeps {
  const logger = new Logger({ level: 'error' });
  const metrics = new MetricsCollector();
  const tokens = new TokenStore({ backend: 'memory' }, logger);

  const auth = new AuthCore(
    {
      clientId: 'test-client-id',
      clientSecret: null,
      redditUrl: 'https://www.reddit.com',
      userAgent: TEST_USER_AGENT,
      timeout: 1000,
    },
    tokens,
    metrics,
    logger
  );
  auth.implicit({ accessToken: 'test-access-token', expiresIn: 3600, scope: '*' });

  const http = new HttpCore(
    { oauthUrl: TEST_API, userAgent: TEST_USER_AGENT, timeout: 1000 },
    metrics,
    logger
  );
  http.useTokenProvider(auth);

  return {
    auth,
    http,
    logger,
    metrics,
    settings: { validateOnSubmit: settings.validateOnSubmit ?? false },
  };
}

export function thingsEnvelope(kind: string, data: Record<string, unknown>) {
  return { json: { errors: [], data: { things: [{ kind, data }] } } };
}

export function listing(kind: string, data: Record<string, unknown>) {
  return { kind: 'Listing', data: { children: [{ kind, data }] } };
}
