import express from 'express';
import helmet from 'helmet';
import cors from 'cors';

import { ServerConfig } from './types.js';
import { PurchaseApi, createPlatformClient } from './services/purchase-api.js';
import { PageRenderer, Renderer } from './views/render.js';
import { errorHandler, notFoundHandler } from './middleware/error-handler.js';
import { createHealthRouter } from './routes/health.js';
import { createPageRouter } from './routes/page.js';
import { createApiRouter } from './routes/api.js';
import { requestLogger, createLogger } from './utils/logger.js';
import { PrometheusMetrics, getPrometheusMetrics, metricsHandler, metricsMiddleware } from './monitoring/prometheus-metrics.js';

const logger = createLogger('App');

/** Origins allowed to frame the app and to serve its SDK script */
const PLATFORM_ORIGINS = ['https://ton.place', 'https://*.ton.place'];

export interface AppDependencies {
  platformClient?: PurchaseApi;
  renderer?: Renderer;
  metrics?: PrometheusMetrics;
  now?: () => Date;
}

/**
 * Creates and configures the Express application
 */
export const createApp = (config: ServerConfig, deps: AppDependencies = {}): express.Application => {
  const app = express();
  const client = deps.platformClient ?? createPlatformClient(config);
  const renderer = deps.renderer ?? PageRenderer.fromFile();
  const metrics = deps.metrics ?? getPrometheusMetrics();

  // The page runs inside the platform's iframe with inline handlers
  app.use(
    helmet({
      xFrameOptions: false,
      contentSecurityPolicy: {
        directives: {
          scriptSrc: ["'self'", "'unsafe-inline'", ...PLATFORM_ORIGINS],
          scriptSrcAttr: ["'unsafe-inline'"],
          frameAncestors: ["'self'", ...PLATFORM_ORIGINS]
        }
      }
    })
  );
  app.use(
    cors({
      origin: config.corsOrigin ?? true,
      credentials: true
    })
  );

  app.use(express.json({ limit: '16kb' }));

  if (config.httpProxyCount > 0) {
    app.set('trust proxy', config.httpProxyCount);
  }

  app.use(metricsMiddleware(metrics));
  app.use(requestLogger(logger));

  app.use('/api', createHealthRouter(config));
  app.use('/api', createApiRouter({ config, client, metrics, now: deps.now }));
  app.get('/metrics', metricsHandler(metrics));
  app.use('/', createPageRouter({ config, client, renderer, metrics, now: deps.now }));

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
};
