import { Router, Request, Response } from 'express';
import type { LaunchParams, Purchase } from '@tonplace-miniapp/sdk';
import { PageData, ServerConfig } from '../types.js';
import { PurchaseApi } from '../services/purchase-api.js';
import { Renderer } from '../views/render.js';
import { PrometheusMetrics } from '../monitoring/prometheus-metrics.js';
import {
  AUTH_FAILED_MESSAGE,
  rawQuery,
  recordVerification,
  verifyLaunchQuery
} from '../middleware/launch-verification.js';
import { createLogger } from '../utils/logger.js';

const logger = createLogger('PageRoute');

const ANONYMOUS: LaunchParams = { appId: '', userId: '', timestamp: '', firstName: '', lastName: '' };

export interface PageRouterDeps {
  config: ServerConfig;
  client: PurchaseApi;
  renderer: Renderer;
  metrics: PrometheusMetrics;
  now?: () => Date;
}

/**
 * Creates the router serving the mini app page
 */
export const createPageRouter = ({ config, client, renderer, metrics, now = () => new Date() }: PageRouterDeps) => {
  const router = Router();

  const send = (res: Response, status: number, data: PageData) => {
    let html: string;
    try {
      html = renderer.render(data);
    } catch (error) {
      logger.error('Template error', error);
      res.status(500).type('text/plain').send('Internal server error');
      return;
    }
    res.status(status).type('html').send(html);
  };

  router.get('/favicon.ico', (req: Request, res: Response) => {
    res.status(404).end();
  });

  router.get('/', async (req: Request, res: Response) => {
    const result = verifyLaunchQuery(rawQuery(req), config.appSecret, config.signatureMaxAge, now());
    recordVerification(result, req, metrics);

    if (!result.ok) {
      send(res, 401, {
        user: ANONYMOUS,
        transactions: [],
        error: AUTH_FAILED_MESSAGE,
        isAuthorized: false
      });
      return;
    }

    const user = result.launch;
    res.locals.launch = user;

    let transactions: Purchase[] = [];
    try {
      transactions = await metrics.trackUpstream('list_purchases', () =>
        client.getPurchases(Number(user.userId), { count: config.purchaseHistoryLimit })
      );
    } catch (error) {
      logger.warn('Failed to load purchases, rendering an empty list', {
        userId: user.userId,
        error: error instanceof Error ? error.message : String(error)
      });
    }

    send(res, 200, { user, transactions, isAuthorized: true });
  });

  return router;
};
