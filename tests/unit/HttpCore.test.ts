// tests/unit/HttpCore.test.ts

import { describe, it, expect, beforeAll, afterAll, beforeEach, afterEach } from 'vitest';
import nock from 'nock';
import { HttpCore } from '../../src/core/http/HttpCore';
import { Logger } from '../../src/observability/Logger';
import { MetricsCollector } from '../../src/observability/MetricsCollector';
import {
  ApiClientError,
  ApiServerError,
  InsufficientScopeError,
  InvalidTokenError,
  NetworkError,
  NetworkTimeoutError,
  OAuthConfigError,
  RateLimitError,
} from '../../src/utils/errors';

const API = 'https://oauth.reddit.com';
const USER_AGENT = 'test-agent/1.0';

describe('HttpCore', () => {
  let metrics: MetricsCollector;
  let httpCore: HttpCore;

  beforeAll(() => {
    nock.disableNetConnect();
  });

  afterAll(() => {
    nock.enableNetConnect();
  });

  beforeEach(() => {
    metrics = new MetricsCollector();
    httpCore = new HttpCore(
      { oauthUrl: API, userAgent: USER_AGENT, timeout: 1000 },
      metrics,
      new Logger({ level: 'error' })
    );
    httpCore.useTokenProvider({ getAccessToken: async () => 'test-access-token' });
  });

  afterEach(() => {
    nock.cleanAll();
  });

  describe('API requests', () => {
    it('should authenticate GET requests and ask for raw JSON', async () => {
      const scope = nock(API)
        .get('/api/v1/me')
        .query({ raw_json: '1' })
        .matchHeader('authorization', 'Bearer test-access-token')
        .matchHeader('user-agent', USER_AGENT)
        .matchHeader('x-request-id', /^[0-9a-f-]{36}$/)
        .reply(200, { name: 'test-user' });

      const response = await httpCore.get('api/v1/me');

      expect(scope.isDone()).toBe(true);
      expect(response.status).toBe(200);
      expect(response.data).toEqual({ name: 'test-user' });
    });

    it('should merge caller query parameters', async () => {
      const scope = nock(API)
        .get('/api/info/')
        .query({ id: 't1_abc123', raw_json: '1' })
        .reply(200, { kind: 'Listing', data: { children: [] } });

      await httpCore.get('api/info/', { id: 't1_abc123' });

      expect(scope.isDone()).toBe(true);
    });

    it('should send form posts url-encoded with api_type=json', async () => {
      const scope = nock(API)
        .post('/api/del/', 'id=t1_abc123&api_type=json')
        .query({ raw_json: '1' })
        .matchHeader('content-type', 'application/x-www-form-urlencoded')
        .reply(200, {});

      await httpCore.post('api/del/', { id: 't1_abc123' });

      expect(scope.isDone()).toBe(true);
    });

    it('should drop undefined form fields', async () => {
      const scope = nock(API)
        .post('/api/editusertext/', 'thing_id=t1_abc123&validate_on_submit=false&api_type=json')
        .query({ raw_json: '1' })
        .reply(200, {});

      await httpCore.post('api/editusertext/', {
        thing_id: 't1_abc123',
        text: undefined,
        validate_on_submit: false,
      });

      expect(scope.isDone()).toBe(true);
    });

    it('should require a token provider', async () => {
      const bare = new HttpCore(
        { oauthUrl: API, userAgent: USER_AGENT, timeout: 1000 },
        metrics,
        new Logger({ level: 'error' })
      );

      await expect(bare.get('api/v1/me')).rejects.toThrow(OAuthConfigError);
    });

    it('should count requests by method and status', async () => {
      nock(API).get('/api/v1/me').query(true).reply(200, {});

      await httpCore.get('api/v1/me');

      expect(await metrics.getMetrics()).toContain(
        'http_requests_total{method="GET",status="200"} 1'
      );
    });
  });

  describe('plain requests', () => {
    it('should not attach a bearer token', async () => {
      const scope = nock('https://uploads.example.com', { badheaders: ['authorization'] })
        .post('/')
        .matchHeader('user-agent', USER_AGENT)
        .reply(201);

      const response = await httpCore.request({
        url: 'https://uploads.example.com/',
        method: 'POST',
        body: 'payload',
      });

      expect(scope.isDone()).toBe(true);
      expect(response.status).toBe(201);
    });
  });

  describe('error mapping', () => {
    it('should map a 401 invalid_token challenge to InvalidTokenError', async () => {
      nock(API)
        .get('/api/v1/me')
        .query(true)
        .reply(401, { message: 'Unauthorized', error: 401 }, {
          'www-authenticate': 'Bearer realm="reddit", error="invalid_token"',
        });

      await expect(httpCore.get('api/v1/me')).rejects.toThrow(InvalidTokenError);
    });

    it('should map a 403 insufficient_scope challenge to InsufficientScopeError', async () => {
      nock(API)
        .post('/api/editusertext/')
        .query(true)
        .reply(403, { message: 'Forbidden', error: 403 }, {
          'www-authenticate': 'Bearer realm="reddit", error="insufficient_scope"',
        });

      await expect(httpCore.post('api/editusertext/', {})).rejects.toThrow(InsufficientScopeError);
    });

    it('should map 429 to RateLimitError with the retry delay', async () => {
      nock(API).get('/api/v1/me').query(true).reply(429, {}, { 'retry-after': '60' });

      const error = await httpCore.get('api/v1/me').catch((e: unknown) => e);

      expect(error).toBeInstanceOf(RateLimitError);
      expect(error).toHaveProperty('retryAfter', 60);
    });

    it('should map other 4xx responses to ApiClientError with the body', async () => {
      nock(API).get('/api/info/').query(true).reply(404, { message: 'Not Found', error: 404 });

      const error = await httpCore.get('api/info/').catch((e: unknown) => e);

      expect(error).toBeInstanceOf(ApiClientError);
      expect(error).toHaveProperty('status', 404);
      expect(error).toHaveProperty('details.response', { message: 'Not Found', error: 404 });
    });

    it('should map a 401 without a challenge to ApiClientError', async () => {
      nock(API).get('/api/v1/me').query(true).reply(401, {});

      await expect(httpCore.get('api/v1/me')).rejects.toThrow(ApiClientError);
    });

    it('should map 5xx responses to ApiServerError', async () => {
      nock(API).get('/api/v1/me').query(true).reply(503, 'unavailable');

      const error = await httpCore.get('api/v1/me').catch((e: unknown) => e);

      expect(error).toBeInstanceOf(ApiServerError);
      expect(error).toHaveProperty('status', 503);
    });

    it('should map timeouts to NetworkTimeoutError', async () => {
      nock(API).get('/api/v1/me').query(true).delay(500).reply(200, {});

      await expect(
        httpCore.request({ url: `${API}/api/v1/me`, timeout: 50 })
      ).rejects.toThrow(NetworkTimeoutError);
    });

    it('should map connection failures to NetworkError', async () => {
      nock(API).get('/api/v1/me').query(true).replyWithError('socket hang up');

      const error = await httpCore.get('api/v1/me').catch((e: unknown) => e);

      expect(error).toBeInstanceOf(NetworkError);
      expect(error).not.toBeInstanceOf(NetworkTimeoutError);
    });
  });
});
