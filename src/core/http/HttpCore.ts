// src/core/http/HttpCore.ts

import axios, { AxiosInstance } from 'axios';
import * as http from 'http';
import * as https from 'https';
import type {
  ApiRequestOptions,
  FormFields,
  HttpMethod,
  HttpRequestConfig,
  HttpResponse,
  HttpSettings,
  TokenProvider,
} from './types';
import type { MetricsCollector } from '../../observability/MetricsCollector';
import type { Logger } from '../../observability/Logger';
import {
  ApiClientError,
  ApiServerError,
  InsufficientScopeError,
  InvalidTokenError,
  NetworkError,
  NetworkTimeoutError,
  OAuthConfigError,
  RateLimitError,
} from '../../utils/errors';
import { generateCorrelationId, withHttpSpan } from '../../observability/tracing';

export class HttpCore {
  private axiosInstance: AxiosInstance;
  private tokenProvider?: TokenProvider;

  constructor(
    private settings: HttpSettings,
    private metrics: MetricsCollector,
    private logger: Logger
  ) {
    this.axiosInstance = axios.create({
      timeout: settings.timeout,
      httpAgent: new http.Agent({ keepAlive: true }),
      httpsAgent: new https.Agent({ keepAlive: true }),
    });
  }

  useTokenProvider(provider: TokenProvider): void {
    this.tokenProvider = provider;
  }

  /**
   * Authenticated GET against an API path such as `api/v1/me`.
   */
  async get<T = unknown>(
    path: string,
    query?: Record<string, string | number | boolean>
  ): Promise<HttpResponse<T>> {
    return this.api<T>('GET', path, { query });
  }

  /**
   * Authenticated form POST against an API path such as `api/editusertext/`.
   */
  async post<T = unknown>(path: string, form: FormFields = {}): Promise<HttpResponse<T>> {
    return this.api<T>('POST', path, { form });
  }

  async api<T = unknown>(
    method: HttpMethod,
    path: string,
    options: ApiRequestOptions = {}
  ): Promise<HttpResponse<T>> {
    if (!this.tokenProvider) {
      throw new OAuthConfigError('No access token provider registered');
    }
    const accessToken = await this.tokenProvider.getAccessToken();

    return this.request<T>({
      url: this.resolveApiUrl(path),
      method,
      headers: { Authorization: `Bearer ${accessToken}` },
      // raw_json=1 disables HTML entity escaping in responses
      query: { ...options.query, raw_json: 1 },
      form: method === 'GET' ? undefined : { ...options.form, api_type: 'json' },
    });
  }

  /**
   * Plain request to an absolute URL; no bearer token is attached.
   */
  async request<T = unknown>(config: HttpRequestConfig): Promise<HttpResponse<T>> {
    const requestId = generateCorrelationId();
    const method = config.method ?? 'GET';

    const headers: Record<string, string> = {
      'X-Request-ID': requestId,
      'User-Agent': this.settings.userAgent,
      ...config.headers,
    };

    let data = config.body;
    if (config.form) {
      data = encodeForm(config.form);
      headers['Content-Type'] = 'application/x-www-form-urlencoded';
    }

    this.logger.debug('HTTP request', {
      requestId,
      url: config.url,
      method,
      query: config.query,
      form: config.form,
    });

    return withHttpSpan(method, config.url, async () => {
      const startTime = Date.now();

      try {
        const axiosResponse = await this.axiosInstance.request<T>({
          url: config.url,
          method,
          headers,
          params: config.query,
          data,
          timeout: config.timeout,
        });

        this.metrics.incrementCounter('http_requests_total', {
          method,
          status: axiosResponse.status.toString(),
        });
        this.metrics.recordLatency('http_request_duration', Date.now() - startTime, {
          method,
          status: axiosResponse.status,
        });

        return {
          data: axiosResponse.data,
          status: axiosResponse.status,
          headers: toHeaderRecord(axiosResponse.headers),
        };
      } catch (error: unknown) {
        const status =
          axios.isAxiosError(error) && error.response ? String(error.response.status) : 'error';
        this.metrics.incrementCounter('http_requests_total', { method, status });
        throw this.transformError(error, config.url);
      }
    });
  }

  private resolveApiUrl(path: string): string {
    return `${this.settings.oauthUrl.replace(/\/+$/, '')}/${path.replace(/^\/+/, '')}`;
  }

  private transformError(error: unknown, url: string): Error {
    if (!axios.isAxiosError(error)) {
      return error instanceof Error ? error : new NetworkError(String(error), { url });
    }

    if (error.response) {
      const status = error.response.status;
      const headers = toHeaderRecord(error.response.headers);
      const authenticate = headers['www-authenticate'] ?? '';
      const response: unknown = error.response.data;

      this.logger.debug('HTTP error response', {
        url,
        status,
        statusText: error.response.statusText,
        data: response,
      });

      if (status === 401 && authenticate.includes('invalid_token')) {
        return new InvalidTokenError('Invalid access token', { url, status });
      }
      if (status === 403 && authenticate.includes('insufficient_scope')) {
        return new InsufficientScopeError('Insufficient scope for this request', { url, status });
      }
      if (status === 429) {
        const retryAfter = Number.parseInt(headers['retry-after'] ?? '', 10);
        return new RateLimitError('Rate limit exceeded', Number.isNaN(retryAfter) ? undefined : retryAfter, {
          url,
        });
      }
      if (status >= 400 && status < 500) {
        return new ApiClientError(`Client error: ${status}`, status, { url, response });
      }
      return new ApiServerError(`Server error: ${status}`, status, { url });
    }

    if (error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT') {
      return new NetworkTimeoutError('Request timeout', { url });
    }
    return new NetworkError('Network error', { url, cause: error.message });
  }
}

function encodeForm(form: FormFields): string {
  const params = new URLSearchParams();
  for (const [key, value] of Object.entries(form)) {
    if (value !== undefined) params.append(key, String(value));
  }
  return params.toString();
}

function toHeaderRecord(headers: object): Record<string, string> {
  const record: Record<string, string> = {};
  for (const [key, value] of Object.entries(headers)) {
    if (typeof value === 'string') {
      record[key.toLowerCase()] = value;
    }
  }
  return record;
}
