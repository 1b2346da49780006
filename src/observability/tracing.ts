/**
 * OpenTelemetry Tracing (Opt-in)
 *
 * Spans for API requests, token grants and edits. Only the API package is
 * used here; the host application registers a tracer provider.
 *
 * Enable via environment variables:
 * - OTEL_ENABLED=1
 */

import { trace, context, SpanStatusCode, SpanKind, Span } from '@opentelemetry/api';
import { v4 as uuidv4 } from 'uuid';

const TRACER_NAME = 'reddit-rtjson-sdk';

export type SpanAttributes = Record<string, string | number | boolean>;

/**
 * Check if OpenTelemetry is enabled
 */
export function isOTelEnabled(): boolean {
  return process.env.OTEL_ENABLED === '1' || process.env.OTEL_ENABLED === 'true';
}

/**
 * Get the tracer, or null while tracing is disabled
 */
export function getTracer() {
  if (!isOTelEnabled()) {
    return null;
  }
  return trace.getTracer(TRACER_NAME);
}

/**
 * Generate a unique correlation ID for request tracing
 */
export function generateCorrelationId(): string {
  return uuidv4();
}

/**
 * Execute a function within a span
 *
 * @param name - Span name
 * @param fn - Function to execute
 * @param attributes - Optional span attributes
 * @returns Result of fn
 */
export async function withSpan<T>(
  name: string,
  fn: (span: Span | null) => Promise<T>,
  attributes?: SpanAttributes
): Promise<T> {
  const tracer = getTracer();

  if (!tracer) {
    return fn(null);
  }

  return tracer.startActiveSpan(name, async (span) => {
    try {
      if (attributes) {
        Object.entries(attributes).forEach(([key, value]) => {
          span.setAttribute(key, value);
        });
      }

      const result = await fn(span);
      span.setStatus({ code: SpanStatusCode.OK });
      return result;
    } catch (error: unknown) {
      const err = error instanceof Error ? error : new Error(String(error));
      span.recordException(err);
      span.setStatus({
        code: SpanStatusCode.ERROR,
        message: err.message,
      });
      throw error;
    } finally {
      span.end();
    }
  });
}

/**
 * Create a span for HTTP requests
 *
 * @param method - HTTP method
 * @param url - Request URL
 * @param fn - Function to execute
 * @returns Result of fn
 */
export async function withHttpSpan<T>(
  method: string,
  url: string,
  fn: (span: Span | null) => Promise<T>
): Promise<T> {
  return withSpan(`HTTP ${method}`, fn, {
    'http.method': method,
    'http.url': url,
    'span.kind': SpanKind.CLIENT,
  });
}

/**
 * Create a span for OAuth operations
 *
 * @param operation - e.g. 'grant', 'authorize', 'revoke'
 * @param grantType - OAuth grant type or flow name
 * @param fn - Function to execute
 * @returns Result of fn
 */
export async function withOAuthSpan<T>(
  operation: string,
  grantType: string,
  fn: (span: Span | null) => Promise<T>
): Promise<T> {
  return withSpan(`OAuth ${operation}`, fn, {
    'oauth.operation': operation,
    'oauth.grant_type': grantType,
  });
}

/**
 * Create a span for operations on a Reddit thing
 *
 * @param operation - e.g. 'fetch', 'edit', 'delete'
 * @param fullname - Thing fullname such as `t1_abc123`
 * @param fn - Function to execute
 * @returns Result of fn
 */
export async function withModelSpan<T>(
  operation: string,
  fullname: string,
  fn: (span: Span | null) => Promise<T>
): Promise<T> {
  return withSpan(`Reddit ${operation}`, fn, {
    'reddit.operation': operation,
    'reddit.fullname': fullname,
  });
}

/**
 * Get current span from context
 */
export function getCurrentSpan(): Span | undefined {
  if (!isOTelEnabled()) {
    return undefined;
  }
  return trace.getSpan(context.active());
}

/**
 * Add event to current span
 *
 * @param name - Event name
 * @param attributes - Event attributes
 */
export function addSpanEvent(name: string, attributes?: SpanAttributes): void {
  const span = getCurrentSpan();
  if (span) {
    span.addEvent(name, attributes);
  }
}
