/**
 * Prometheus metrics
 *
 * - HTTP request performance
 * - Launch verification outcomes
 * - Upstream platform API calls
 */

import { Counter, Histogram, Gauge, Registry, collectDefaultMetrics } from 'prom-client';
import { Request, Response, NextFunction } from 'express';
import { ServerErrorCode } from '../types.js';
import { createLogger } from '../utils/logger.js';

const logger = createLogger('PrometheusMetrics');

export class PrometheusMetrics {
  private readonly registry: Registry;

  // HTTP metrics
  public readonly httpRequestDuration: Histogram<string>;
  public readonly httpRequestsTotal: Counter<string>;
  public readonly httpRequestsInFlight: Gauge<string>;

  // Business metrics
  public readonly launchVerifications: Counter<string>;
  public readonly upstreamRequests: Counter<string>;
  public readonly upstreamDuration: Histogram<string>;

  constructor(options: { collectDefaults?: boolean } = {}) {
    this.registry = new Registry();

    if (options.collectDefaults ?? true) {
      collectDefaultMetrics({
        register: this.registry,
        prefix: 'miniapp_'
      });
    }

    this.httpRequestDuration = new Histogram({
      name: 'miniapp_http_request_duration_seconds',
      help: 'Duration of HTTP requests in seconds',
      labelNames: ['method', 'route', 'status_code'],
      buckets: [0.005, 0.01, 0.025, 0.05, 0.1, 0.25, 0.5, 1, 2.5, 5, 10],
      registers: [this.registry]
    });

    this.httpRequestsTotal = new Counter({
      name: 'miniapp_http_requests_total',
      help: 'Total number of HTTP requests',
      labelNames: ['method', 'route', 'status_code'],
      registers: [this.registry]
    });

    this.httpRequestsInFlight = new Gauge({
      name: 'miniapp_http_requests_in_flight',
      help: 'Number of HTTP requests currently being processed',
      labelNames: ['method'],
      registers: [this.registry]
    });

    this.launchVerifications = new Counter({
      name: 'miniapp_launch_verifications_total',
      help: 'Launch parameter verifications by outcome',
      labelNames: ['result'],
      registers: [this.registry]
    });

    this.upstreamRequests = new Counter({
      name: 'miniapp_upstream_requests_total',
      help: 'Calls to the platform API',
      labelNames: ['operation', 'result'],
      registers: [this.registry]
    });

    this.upstreamDuration = new Histogram({
      name: 'miniapp_upstream_request_duration_seconds',
      help: 'Duration of platform API calls in seconds',
      labelNames: ['operation'],
      buckets: [0.05, 0.1, 0.25, 0.5, 1, 2.5, 5, 10],
      registers: [this.registry]
    });

    logger.debug('Prometheus metrics initialized');
  }

  /**
   * Time an upstream call and count its outcome
   */
  async trackUpstream<T>(operation: string, call: () => Promise<T>): Promise<T> {
    const end = this.upstreamDuration.startTimer({ operation });
    try {
      const result = await call();
      this.upstreamRequests.inc({ operation, result: 'success' });
      return result;
    } catch (error) {
      this.upstreamRequests.inc({ operation, result: 'failure' });
      throw error;
    } finally {
      end();
    }
  }

  async getMetrics(): Promise<string> {
    return this.registry.metrics();
  }

  getContentType(): string {
    return this.registry.contentType;
  }

  /**
   * Reset all metric values (for testing)
   */
  reset(): void {
    this.registry.resetMetrics();
  }
}

let instance: PrometheusMetrics | null = null;

/**
 * Get or create metrics instance
 */
export function getPrometheusMetrics(): PrometheusMetrics {
  if (!instance) {
    instance = new PrometheusMetrics();
  }
  return instance;
}

/**
 * Middleware to track HTTP metrics
 */
export function metricsMiddleware(metrics: PrometheusMetrics = getPrometheusMetrics()) {
  return (req: Request, res: Response, next: NextFunction) => {
    const start = Date.now();
    metrics.httpRequestsInFlight.inc({ method: req.method });

    res.on('finish', () => {
      // Route pattern once matched, so ids in paths do not explode label cardinality
      const route = typeof req.route?.path === 'string' ? `${req.baseUrl}${req.route.path}` : 'unmatched';
      const labels = { method: req.method, route, status_code: res.statusCode.toString() };

      metrics.httpRequestDuration.observe(labels, (Date.now() - start) / 1000);
      metrics.httpRequestsTotal.inc(labels);
      metrics.httpRequestsInFlight.dec({ method: req.method });
    });

    next();
  };
}

/**
 * Prometheus scrape endpoint
 */
export function metricsHandler(metrics: PrometheusMetrics = getPrometheusMetrics()) {
  return async (req: Request, res: Response) => {
    try {
      const body = await metrics.getMetrics();
      res.type(metrics.getContentType()).send(body);
    } catch (error) {
      logger.error('Failed to collect metrics', error);
      res.status(500).json({ error: ServerErrorCode.INTERNAL_ERROR, message: 'Failed to collect metrics' });
    }
  };
}
