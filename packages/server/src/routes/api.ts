import { Router, Request, Response, NextFunction } from 'express';
import { PlatformError } from '@tonplace-miniapp/sdk';
import { ServerConfig, ServerError, ServerErrorCode } from '../types.js';
import { PurchaseApi } from '../services/purchase-api.js';
import { PrometheusMetrics } from '../monitoring/prometheus-metrics.js';
import { createLaunchVerification, getLaunch } from '../middleware/launch-verification.js';
import { validateCreatePurchase, handleValidationErrors } from '../middleware/validation.js';
import { createRateLimit } from '../middleware/rate-limit.js';
import { createLogger } from '../utils/logger.js';

const logger = createLogger('ApiRoute');

export interface ApiRouterDeps {
  config: ServerConfig;
  client: PurchaseApi;
  metrics: PrometheusMetrics;
  now?: () => Date;
}

const upstreamError = (operation: string, userId: string, error: unknown): ServerError => {
  logger.error(`Platform API ${operation} failed`, error, {
    userId,
    status: error instanceof PlatformError ? error.status : undefined
  });
  return new ServerError(ServerErrorCode.UPSTREAM_ERROR, 'Platform API request failed', 502);
};

/**
 * Creates the JSON API router used by the page script
 */
export const createApiRouter = ({ config, client, metrics, now }: ApiRouterDeps) => {
  const router = Router();

  // Per route, so unknown /api paths fall through to the 404 handler
  const rateLimit = createRateLimit(config.rateLimitRequests, config.rateLimitWindow);
  const verifyLaunch = createLaunchVerification({
    secret: config.appSecret,
    maxAgeSeconds: config.signatureMaxAge,
    source: 'header',
    metrics,
    now
  });

  /**
   * POST /api/create-purchase
   * Creates a purchase for the launching user
   */
  router.post(
    '/create-purchase',
    rateLimit,
    verifyLaunch,
    validateCreatePurchase,
    handleValidationErrors,
    async (req: Request, res: Response, next: NextFunction) => {
      try {
        const { userId } = getLaunch(res);
        const amount: unknown = req.body.amount;
        const title: unknown = req.body.title;

        if (typeof amount !== 'number' || typeof title !== 'string') {
          throw new ServerError(ServerErrorCode.INVALID_REQUEST, 'Validation error: invalid body', 400);
        }

        const purchaseId = await metrics
          .trackUpstream('create_purchase', () => client.createPurchase({ userId: Number(userId), amount, title }))
          .catch((error: unknown) => {
            throw upstreamError('create_purchase', userId, error);
          });

        logger.info('Purchase created', { userId, purchaseId, amount });
        res.json({ purchase_id: purchaseId });
      } catch (error) {
        next(error);
      }
    }
  );

  /**
   * GET /api/transactions
   * Lists the launching user's purchases
   */
  router.get('/transactions', rateLimit, verifyLaunch, async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { userId } = getLaunch(res);
      const transactions = await metrics
        .trackUpstream('list_purchases', () =>
          client.getPurchases(Number(userId), { count: config.purchaseHistoryLimit })
        )
        .catch((error: unknown) => {
          throw upstreamError('list_purchases', userId, error);
        });

      res.json({ transactions });
    } catch (error) {
      next(error);
    }
  });

  return router;
};
