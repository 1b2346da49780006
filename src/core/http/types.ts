// src/core/http/types.ts

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'DELETE' | 'PATCH';

export type FormFields = Record<string, string | number | boolean | undefined>;

export interface HttpRequestConfig {
  url: string;
  method?: HttpMethod;
  headers?: Record<string, string>;
  query?: Record<string, string | number | boolean>;
  // Sent as application/x-www-form-urlencoded
  form?: FormFields;
  body?: unknown;
  timeout?: number;
}

export interface ApiRequestOptions {
  query?: Record<string, string | number | boolean>;
  form?: FormFields;
}

export interface HttpResponse<T = unknown> {
  data: T;
  status: number;
  headers: Record<string, string>;
}

export interface HttpSettings {
  oauthUrl: string;
  userAgent: string;
  timeout: number;
}

/**
 * Supplies bearer tokens for API calls.
 */
export interface TokenProvider {
  getAccessToken(): Promise<string>;
}
