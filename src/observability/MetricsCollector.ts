// src/observability/MetricsCollector.ts

import { Registry, Counter, Histogram } from 'prom-client';
import * as http from 'http';
import type { Logger } from './Logger';

export interface MetricsConfig {
  enabled?: boolean;
  port?: number;
  path?: string;
}

type Labels = Record<string, string | number>;

export class MetricsCollector {
  private registry: Registry;
  private counters: Map<string, Counter> = new Map();
  private histograms: Map<string, Histogram> = new Map();
  private server?: http.Server;
  private logger?: Logger;

  constructor(config: MetricsConfig = {}, logger?: Logger) {
    this.logger = logger;
    this.registry = new Registry();

    if (config.enabled !== false) {
      this.initializeMetrics();

      if (config.port) {
        this.exposeMetrics(config.port, config.path ?? '/metrics');
      }
    }
  }

  private initializeMetrics(): void {
    // HTTP metrics
    this.counters.set(
      'http_requests_total',
      new Counter({
        name: 'http_requests_total',
        help: 'Total HTTP requests',
        labelNames: ['method', 'status'],
        registers: [this.registry],
      })
    );

    this.histograms.set(
      'http_request_duration',
      new Histogram({
        name: 'http_request_duration_seconds',
        help: 'HTTP request duration',
        labelNames: ['method', 'status'],
        buckets: [0.1, 0.5, 1, 2, 5],
        registers: [this.registry],
      })
    );

    // OAuth metrics
    this.counters.set(
      'oauth_grants_total',
      new Counter({
        name: 'oauth_grants_total',
        help: 'Access token grants requested',
        labelNames: ['grant', 'status'],
        registers: [this.registry],
      })
    );

    // Model metrics
    this.counters.set(
      'edits_total',
      new Counter({
        name: 'edits_total',
        help: 'Edits submitted',
        labelNames: ['kind', 'format'],
        registers: [this.registry],
      })
    );

    this.counters.set(
      'inline_media_reconciled',
      new Counter({
        name: 'inline_media_reconciled_total',
        help: 'Rich text links rewritten into inline media elements',
        registers: [this.registry],
      })
    );
  }

  incrementCounter(name: string, labels: Labels = {}, value: number = 1): void {
    const counter = this.counters.get(name);
    counter?.inc(labels, value);
  }

  recordLatency(name: string, durationMs: number, labels: Labels): void {
    const histogram = this.histograms.get(name);
    histogram?.observe(labels, durationMs / 1000);
  }

  async getMetrics(): Promise<string> {
    return this.registry.metrics();
  }

  private exposeMetrics(port: number, path: string): void {
    this.server = http.createServer((req, res) => {
      if (req.url !== path) {
        res.statusCode = 404;
        res.end('Not Found');
        return;
      }
      this.getMetrics()
        .then((body) => {
          res.setHeader('Content-Type', this.registry.contentType);
          res.end(body);
        })
        .catch((error: unknown) => {
          res.statusCode = 500;
          res.end();
          this.logger?.error('Metrics rendering failed', {
            error: error instanceof Error ? error.message : String(error),
          });
        });
    });

    this.server.on('error', (error: Error) => {
      this.logger?.error('MetricsCollector server error', { error: error.message });
    });

    this.server.listen(port, () => {
      this.logger?.info(`Metrics exposed on http://localhost:${port}${path}`);
    });
  }

  async close(): Promise<void> {
    const server = this.server;
    if (!server) return;
    this.server = undefined;
    await new Promise<void>((resolve) => server.close(() => resolve()));
  }
}
