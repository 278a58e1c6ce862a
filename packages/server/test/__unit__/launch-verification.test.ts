import express from 'express';
import request from 'supertest';
import {
  AUTH_FAILED_MESSAGE,
  createLaunchVerification,
  getLaunch,
  verifyLaunchQuery
} from '../../src/middleware/launch-verification';
import { errorHandler } from '../../src/middleware/error-handler';
import { NOW_SECONDS, TEST_SECRET, createTestMetrics, now, signedQuery } from '../utils';

describe('verifyLaunchQuery', () => {
  const verify = (query: string) => verifyLaunchQuery(query, TEST_SECRET, 300, now());

  it('should accept a signed, fresh launch', () => {
    expect(verify(signedQuery())).toEqual({
      ok: true,
      launch: {
        appId: '7',
        userId: '42',
        timestamp: String(NOW_SECONDS),
        firstName: 'Ada',
        lastName: 'Lovelace'
      }
    });
  });

  it('should accept a leading question mark', () => {
    expect(verify(`?${signedQuery()}`).ok).toBe(true);
  });

  it('should require the signature and user id', () => {
    expect(verify('app_id=7&user_id=42&ts=1700000000')).toEqual({ ok: false, reason: 'missing' });
    expect(verify(signedQuery({ user_id: undefined }))).toEqual({ ok: false, reason: 'missing' });
    expect(verify('')).toEqual({ ok: false, reason: 'missing' });
  });

  it('should reject stale and future timestamps', () => {
    expect(verify(signedQuery({ ts: String(NOW_SECONDS - 300) })).ok).toBe(true);
    expect(verify(signedQuery({ ts: String(NOW_SECONDS - 301) }))).toEqual({ ok: false, reason: 'stale' });
    expect(verify(signedQuery({ ts: String(NOW_SECONDS + 60) })).ok).toBe(true);
    expect(verify(signedQuery({ ts: String(NOW_SECONDS + 61) }))).toEqual({ ok: false, reason: 'stale' });
  });

  it('should reject a signature made with another secret', () => {
    expect(verify(signedQuery({}, 'other-secret'))).toEqual({ ok: false, reason: 'signature' });
  });

  it('should reject a tampered value', () => {
    const tampered = signedQuery().replace('user_id=42', 'user_id=43');
    expect(verify(tampered)).toEqual({ ok: false, reason: 'signature' });
  });

  it('should report staleness before the signature', () => {
    expect(verify(signedQuery({ ts: String(NOW_SECONDS - 1000) }, 'other-secret'))).toEqual({
      ok: false,
      reason: 'stale'
    });
  });

  it('should use the first value of a repeated name', () => {
    const result = verify(`${signedQuery()}&user_id=43`);
    expect(result.ok && result.launch.userId).toBe('42');
  });

  it('should reject a signed but non-numeric user id', () => {
    expect(verify(signedQuery({ user_id: 'abc' }))).toEqual({ ok: false, reason: 'malformed' });
    expect(verify(signedQuery({ user_id: '99999999999999999999' }))).toEqual({ ok: false, reason: 'malformed' });
  });
});

describe('createLaunchVerification', () => {
  const createProbe = (source: 'query' | 'header') => {
    const metrics = createTestMetrics();
    const app = express();
    app.get(
      '/probe',
      createLaunchVerification({ secret: TEST_SECRET, maxAgeSeconds: 300, source, metrics, now }),
      (req, res) => {
        res.json(getLaunch(res));
      }
    );
    app.use(errorHandler);
    return { app, metrics };
  };

  const countsByResult = async (metrics: ReturnType<typeof createTestMetrics>) => {
    const { values } = await metrics.launchVerifications.get();
    return values.map(value => [value.labels.result, value.value]);
  };

  it('should read the query string', async () => {
    const { app, metrics } = createProbe('query');

    const response = await request(app).get(`/probe?${signedQuery()}`);

    expect(response.status).toBe(200);
    expect(response.body.userId).toBe('42');
    expect(await countsByResult(metrics)).toEqual([['accepted', 1]]);
  });

  it('should read the launch header', async () => {
    const { app } = createProbe('header');

    const response = await request(app).get('/probe').set('X-Launch-Params', signedQuery());

    expect(response.status).toBe(200);
    expect(response.body.firstName).toBe('Ada');
  });

  it('should ignore the query string when reading the header', async () => {
    const { app } = createProbe('header');

    const response = await request(app).get(`/probe?${signedQuery()}`);

    expect(response.status).toBe(401);
  });

  it('should answer every failure with the same message', async () => {
    const { app, metrics } = createProbe('query');

    const stale = await request(app).get(`/probe?${signedQuery({ ts: String(NOW_SECONDS - 301) })}`);
    const forged = await request(app).get(`/probe?${signedQuery({}, 'other-secret')}`);

    expect(stale.status).toBe(401);
    expect(forged.status).toBe(401);
    expect(stale.body).toEqual({ error: 'UNAUTHORIZED', message: AUTH_FAILED_MESSAGE });
    expect(forged.body).toEqual(stale.body);
    expect(await countsByResult(metrics)).toEqual([
      ['stale', 1],
      ['signature', 1]
    ]);
  });
});
