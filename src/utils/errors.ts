// src/utils/errors.ts

export class SDKError extends Error {
  constructor(
    message: string,
    public code: string,
    public details?: Record<string, unknown>
  ) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}

export class ClientError extends SDKError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'CLIENT_ERROR', details);
  }
}

export class InvalidArgumentError extends ClientError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, details);
    this.code = 'INVALID_ARGUMENT';
  }
}

export class ReadOnlyError extends ClientError {
  constructor(message: string = 'Not available in read-only mode', details?: Record<string, unknown>) {
    super(message, details);
    this.code = 'READ_ONLY';
  }
}

// Rich text errors
export class RichTextSchemaError extends SDKError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'RICHTEXT_SCHEMA_VIOLATION', details);
  }
}

export class UnknownMediaKindError extends SDKError {
  constructor(
    public mediaKind: string,
    details?: Record<string, unknown>
  ) {
    super(`Unknown inline media kind: ${mediaKind}`, 'UNKNOWN_MEDIA_KIND', {
      ...details,
      mediaKind,
    });
  }
}

// Media upload errors
export class TooLargeMediaError extends SDKError {
  constructor(
    public maximumSize: number,
    public actualSize: number,
    details?: Record<string, unknown>
  ) {
    super(
      `The media that you uploaded was too large (maximum size is ${maximumSize} bytes, uploaded ${actualSize} bytes)`,
      'MEDIA_TOO_LARGE',
      { ...details, maximumSize, actualSize }
    );
  }
}

// OAuth errors
export class OAuthError extends SDKError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'OAUTH_ERROR', details);
  }
}

export class OAuthConfigError extends OAuthError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, details);
    this.code = 'OAUTH_CONFIG_ERROR';
  }
}

// Token errors
export class TokenError extends SDKError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'TOKEN_ERROR', details);
  }
}

export class TokenExpiredError extends TokenError {
  constructor(message: string = 'Token expired', details?: Record<string, unknown>) {
    super(message, details);
    this.code = 'TOKEN_EXPIRED';
  }
}

export class TokenRefreshError extends TokenError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, details);
    this.code = 'TOKEN_REFRESH_FAILED';
  }
}

export class InvalidTokenError extends TokenError {
  constructor(message: string = 'Invalid access token', details?: Record<string, unknown>) {
    super(message, details);
    this.code = 'INVALID_TOKEN';
  }
}

export class InsufficientScopeError extends TokenError {
  constructor(message: string = 'Insufficient scope', details?: Record<string, unknown>) {
    super(message, details);
    this.code = 'INSUFFICIENT_SCOPE';
  }
}

// API errors
export class ApiError extends SDKError {
  constructor(
    message: string,
    public status: number,
    details?: Record<string, unknown>
  ) {
    super(message, 'API_ERROR', { ...details, status });
  }
}

export class ApiClientError extends ApiError {
  constructor(message: string, status: number = 400, details?: Record<string, unknown>) {
    super(message, status, details);
    this.code = 'API_CLIENT_ERROR';
  }
}

export class ApiServerError extends ApiError {
  constructor(message: string, status: number = 500, details?: Record<string, unknown>) {
    super(message, status, details);
    this.code = 'API_SERVER_ERROR';
  }
}

export class RateLimitError extends ApiError {
  constructor(
    message: string = 'Rate limit exceeded',
    public retryAfter?: number,
    details?: Record<string, unknown>
  ) {
    super(message, 429, { ...details, retryAfter });
    this.code = 'RATE_LIMIT_EXCEEDED';
  }
}

export interface RedditErrorItem {
  errorType: string;
  message: string;
  field?: string;
}

/**
 * Errors Reddit reports inside a 200 response (`json.errors`).
 */
export class RedditApiError extends SDKError {
  constructor(public items: RedditErrorItem[]) {
    super(
      items.map((item) => formatErrorItem(item)).join('\n'),
      'REDDIT_API_ERROR',
      { items }
    );
  }
}

function formatErrorItem(item: RedditErrorItem): string {
  const base = `${item.errorType}: '${item.message}'`;
  return item.field ? `${base} on field '${item.field}'` : base;
}

// Network errors
export class NetworkError extends SDKError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'NETWORK_ERROR', details);
  }
}

export class NetworkTimeoutError extends NetworkError {
  constructor(message: string = 'Request timeout', details?: Record<string, unknown>) {
    super(message, details);
    this.code = 'NETWORK_TIMEOUT';
  }
}
