/**
 * Launch verification middleware
 *
 * Authenticates requests opened from the platform by checking the signed
 * launch parameters (`app_id`, `user_id`, `ts`, ..., `hash`). Clients get
 * one generic message whichever check failed; the reason is only logged
 * and counted.
 */

import { Request, Response, NextFunction } from 'express';
import { checkLaunch, extractSignature, readLaunchParams, toParameterSet } from '@tonplace-miniapp/sdk';
import type { LaunchParams } from '@tonplace-miniapp/sdk';
import { LaunchRejection, ServerError, ServerErrorCode } from '../types.js';
import { PrometheusMetrics, getPrometheusMetrics } from '../monitoring/prometheus-metrics.js';
import { createLogger } from '../utils/logger.js';

const logger = createLogger('LaunchVerification');

/** Header the page script uses to forward its own query string */
export const LAUNCH_PARAMS_HEADER = 'X-Launch-Params';

export const AUTH_FAILED_MESSAGE = 'Authorization failed. Please reopen this app from Ton.Place.';

const USER_ID = /^[0-9]+$/;

export interface LaunchVerificationConfig {
  secret: string;
  maxAgeSeconds: number;
  /** Where the signed parameters come from */
  source: 'query' | 'header';
  metrics?: PrometheusMetrics;
  now?: () => Date;
}

export type LaunchVerification =
  | { ok: true; launch: LaunchParams }
  | { ok: false; reason: LaunchRejection };

/**
 * Raw query string of the request URL. Express's parsed `req.query` merges
 * repeated names into arrays and nests bracketed ones, so it is not used.
 */
export function rawQuery(req: Request): string {
  const index = req.originalUrl.indexOf('?');
  return index === -1 ? '' : req.originalUrl.slice(index + 1);
}

/**
 * Verify a raw launch query string
 */
export function verifyLaunchQuery(
  query: string,
  secret: string,
  maxAgeSeconds: number,
  now: Date = new Date()
): LaunchVerification {
  const params = toParameterSet(query);
  const userId = params.get('user_id');

  if (!extractSignature(query) || !userId) {
    return { ok: false, reason: 'missing' };
  }

  const { signatureValid, timestampFresh } = checkLaunch(query, secret, { now, maxAgeSeconds });
  if (!timestampFresh) {
    return { ok: false, reason: 'stale' };
  }
  if (!signatureValid) {
    return { ok: false, reason: 'signature' };
  }

  // Signed by the platform, but upstream calls need a numeric id
  if (!USER_ID.test(userId) || !Number.isSafeInteger(Number(userId))) {
    return { ok: false, reason: 'malformed' };
  }

  return { ok: true, launch: readLaunchParams(params) };
}

/**
 * Record the outcome of a verification
 */
export function recordVerification(
  result: LaunchVerification,
  req: Request,
  metrics: PrometheusMetrics = getPrometheusMetrics()
): void {
  if (result.ok) {
    metrics.launchVerifications.inc({ result: 'accepted' });
    return;
  }

  metrics.launchVerifications.inc({ result: result.reason });
  logger.warn('Launch verification failed', {
    reason: result.reason,
    path: req.path,
    ip: req.ip
  });
}

function isLaunchParams(value: unknown): value is LaunchParams {
  return (
    typeof value === 'object' &&
    value !== null &&
    'userId' in value &&
    typeof value.userId === 'string' &&
    'appId' in value &&
    typeof value.appId === 'string'
  );
}

/**
 * Launch parameters stored by the middleware for this request
 */
export function getLaunch(res: Response): LaunchParams {
  const launch: unknown = res.locals.launch;
  if (!isLaunchParams(launch)) {
    throw new ServerError(ServerErrorCode.UNAUTHORIZED, AUTH_FAILED_MESSAGE, 401);
  }
  return launch;
}

/**
 * Create launch verification middleware
 */
export function createLaunchVerification(config: LaunchVerificationConfig) {
  const metrics = config.metrics ?? getPrometheusMetrics();
  const now = config.now ?? (() => new Date());

  return (req: Request, res: Response, next: NextFunction) => {
    const query = config.source === 'query' ? rawQuery(req) : (req.get(LAUNCH_PARAMS_HEADER) ?? '');
    const result = verifyLaunchQuery(query, config.secret, config.maxAgeSeconds, now());

    recordVerification(result, req, metrics);

    if (!result.ok) {
      return next(new ServerError(ServerErrorCode.UNAUTHORIZED, AUTH_FAILED_MESSAGE, 401));
    }

    res.locals.launch = result.launch;
    next();
  };
}
