// src/observability/Logger.ts

import winston from 'winston';

export interface LoggerConfig {
  level?: 'debug' | 'info' | 'warn' | 'error';
  format?: 'json' | 'pretty';
}

const REDACTED = '[REDACTED]';

const SENSITIVE_FIELDS = [
  'accessToken',
  'refreshToken',
  'access_token',
  'refresh_token',
  'clientSecret',
  'password',
  'authorization',
];

export class Logger {
  private logger: winston.Logger;

  constructor(config: LoggerConfig = {}) {
    const format =
      config.format === 'pretty'
        ? winston.format.combine(winston.format.colorize(), winston.format.simple())
        : winston.format.json();

    this.logger = winston.createLogger({
      level: config.level ?? 'info',
      format,
      transports: [new winston.transports.Console()],
    });
  }

  private redactSensitive(meta: Record<string, unknown>): Record<string, unknown> {
    const redacted = { ...meta };

    for (const field of SENSITIVE_FIELDS) {
      if (field in redacted) redacted[field] = REDACTED;
    }

    // Form bodies carry credentials under their wire names
    const form = redacted.form;
    if (form && typeof form === 'object' && !Array.isArray(form)) {
      const nested: Record<string, unknown> = { ...form };
      for (const field of SENSITIVE_FIELDS) {
        if (field in nested) nested[field] = REDACTED;
      }
      redacted.form = nested;
    }

    return redacted;
  }

  debug(message: string, meta?: Record<string, unknown>): void {
    this.logger.debug(message, meta ? this.redactSensitive(meta) : {});
  }

  info(message: string, meta?: Record<string, unknown>): void {
    this.logger.info(message, meta ? this.redactSensitive(meta) : {});
  }

  warn(message: string, meta?: Record<string, unknown>): void {
    this.logger.warn(message, meta ? this.redactSensitive(meta) : {});
  }

  error(message: string, meta?: Record<string, unknown>): void {
    this.logger.error(message, meta ? this.redactSensitive(meta) : {});
  }
}
