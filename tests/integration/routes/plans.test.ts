import { describe, it, expect, vi, beforeEach } from 'vitest';
import request from 'supertest';
import { clearDatabase } from '../../fixtures/db.js';
import { createApp } from '../../fixtures/app.js';
import type { LLMAdapter } from '@/llm/adapter.js';

const mockGenerate = vi.hoisted(() => vi.fn<LLMAdapter['generate']>());

vi.mock('../../../src/llm/index.js', () => ({
  getLLMAdapter: () => ({ generate: mockGenerate }),
}));

const app = createApp();

beforeEach(() => {
  clearDatabase();
  mockGenerate.mockReset();
});

describe('POST /plans/weekly', () => {
  it('returns 201 with the generated plan', async () => {
    mockGenerate.mockResolvedValueOnce({ content: 'Monday: launch post', provider: 'fake', model: 'fake-model' });

    const res = await request(app)
      .post('/plans/weekly')
      .send({ business_plan: 'We sell bikes in Lisbon.' });

    expect(res.status).toBe(201);
    expect(res.body).toEqual({ plan: 'Monday: launch post' });
    expect(mockGenerate.mock.calls[0][0]).toContain('Business Plan: We sell bikes in Lisbon.');
  });

  it('returns 502 with the error text when generation fails', async () => {
    mockGenerate.mockRejectedValueOnce(new Error('quota exceeded'));

    const res = await request(app)
      .post('/plans/weekly')
      .send({ business_plan: 'We sell bikes in Lisbon.' });

    expect(res.status).toBe(502);
    expect(res.body).toEqual({ error: 'Error generating weekly content plan: quota exceeded' });
  });

  it('returns 400 for a blank business plan', async () => {
    const res = await request(app).post('/plans/weekly').send({ business_plan: '' });

    expect(res.status).toBe(400);
    expect(res.body.details).toEqual([{ path: 'business_plan', message: 'Please enter a valid business plan' }]);
  });
});

describe('GET /plans/weekly', () => {
  it('returns 404 before a plan exists', async () => {
    const res = await request(app).get('/plans/weekly');

    expect(res.status).toBe(404);
    expect(res.body).toEqual({ error: 'No weekly content plan has been generated yet' });
  });

  it('returns and downloads the latest plan', async () => {
    mockGenerate.mockResolvedValueOnce({ content: 'Monday: launch post', provider: 'fake', model: 'fake-model' });
    await request(app).post('/plans/weekly').send({ business_plan: 'We sell bikes in Lisbon.' });

    const res = await request(app).get('/plans/weekly');
    expect(res.status).toBe(200);
    expect(res.body.plan).toBe('Monday: launch post');

    const download = await request(app).get('/plans/weekly/download');
    expect(download.status).toBe(200);
    expect(download.headers['content-disposition']).toBe('attachment; filename="weekly_content_plan.txt"');
    expect(download.text).toBe('Monday: launch post');
  });
});
