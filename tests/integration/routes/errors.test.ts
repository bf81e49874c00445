import { describe, it, expect } from 'vitest';
import express from 'express';
import request from 'supertest';
import { createApp } from '../../fixtures/app.js';
import { errorHandler } from '@/middleware/error-handler.js';
import { getScheduler } from '@/scheduler/index.js';

const app = createApp();

// ─── Request bodies the JSON parser rejects ──────────────────────────────────

describe('malformed request bodies', () => {
  it('returns 400 for JSON that does not parse', async () => {
    const res = await request(app)
      .post('/scheduler/start')
      .set('Content-Type', 'application/json')
      .send('{"topic": ');

    expect(res.status).toBe(400);
    expect(res.body).toEqual({
      error: 'Validation failed',
      details: [{ path: 'body', message: 'Request body is not valid JSON' }],
    });
    expect(getScheduler().getStatus().state).toBe('idle');
  });

  it('returns 413 for a body over the size limit', async () => {
    const res = await request(app)
      .post('/plans/weekly')
      .send({ business_plan: 'x'.repeat(1_100_000) });

    expect(res.status).toBe(413);
    expect(res.body).toEqual({ error: 'request entity too large' });
  });
});

// ─── Errors that carry their own HTTP status ─────────────────────────────────

describe('errorHandler', () => {
  function appThrowing(error: Error) {
    const failing = express();
    failing.get('/fail', () => {
      throw error;
    });
    failing.use(errorHandler);
    return failing;
  }

  it('uses the status an error carries', async () => {
    const res = await request(appThrowing(Object.assign(new Error('Gone for good'), { status: 410 }))).get('/fail');

    expect(res.status).toBe(410);
    expect(res.body).toEqual({ error: 'Gone for good' });
  });

  it('uses statusCode when there is no status', async () => {
    const res = await request(appThrowing(Object.assign(new Error('Slow down'), { statusCode: 429 }))).get('/fail');

    expect(res.status).toBe(429);
    expect(res.body).toEqual({ error: 'Slow down' });
  });

  it('falls back to 500 for an unusable status', async () => {
    const res = await request(appThrowing(Object.assign(new Error('Odd'), { status: 'teapot' }))).get('/fail');

    expect(res.status).toBe(500);
    expect(res.body).toEqual({ error: 'Odd' });
  });
});
