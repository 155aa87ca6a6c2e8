/// <reference types="jest" />

import type { Server } from 'http';
import { z } from 'zod';
import { createApp } from '../app';

const envelopeSchema = z.object({
  success: z.boolean().optional(),
  data: z.unknown(),
  error: z
    .object({ code: z.string(), message: z.string() })
    .passthrough()
    .optional(),
  status: z.string().optional(),
  catalogs: z.unknown(),
});

let server: Server;
let baseUrl: string;

beforeAll(async () => {
  server = createApp().listen(0, '127.0.0.1');
  await new Promise<void>((resolve) => server.once('listening', resolve));
  const address = server.address();
  if (address === null || typeof address === 'string') {
    throw new Error('expected a TCP address');
  }
  baseUrl = `http://127.0.0.1:${address.port}`;
});

afterAll(async () => {
  await new Promise<void>((resolve, reject) =>
    server.close((err) => (err ? reject(err) : resolve()))
  );
});

async function call(method: string, path: string, body?: unknown) {
  const response = await fetch(`${baseUrl}${path}`, {
    method,
    headers: body === undefined ? undefined : { 'Content-Type': 'application/json' },
    body: body === undefined ? undefined : JSON.stringify(body),
  });
  return {
    status: response.status,
    json: envelopeSchema.parse(await response.json()),
  };
}

describe('API', () => {
  it('should report health', async () => {
    const { status, json } = await call('GET', '/health');

    expect(status).toBe(200);
    expect(json.status).toBe('ok');
    expect(json.catalogs).toEqual({ activities: 15, healthTopics: 5 });
  });

  it('should echo the request id header', async () => {
    const response = await fetch(`${baseUrl}/health`, {
      headers: { 'X-Request-ID': 'trace-123' },
    });
    expect(response.headers.get('x-request-id')).toBe('trace-123');
  });

  it('should parse a workout description', async () => {
    const { status, json } = await call('POST', '/api/workouts/parse', {
      text: 'I did 30 minutes of cycling',
    });

    expect(status).toBe(200);
    expect(json).toEqual({
      success: true,
      data: { activity: 'cycling', duration_minutes: 30 },
    });
  });

  it('should answer parse failures with 422', async () => {
    const { status, json } = await call('POST', '/api/workouts/parse', {
      text: 'workout',
    });

    expect(status).toBe(422);
    expect(json.success).toBe(false);
    expect(json.error).toEqual({
      code: 'MISSING_DURATION',
      message: "Please include duration like '30 minutes' in your input.",
    });
  });

  it('should answer an oversized body with 413', async () => {
    const { status, json } = await call('POST', '/api/workouts/parse', {
      text: 'x'.repeat(200_000),
    });

    expect(status).toBe(413);
    expect(json.error).toEqual({
      code: 'PAYLOAD_TOO_LARGE',
      message: 'request entity too large',
    });
  });

  it('should answer a malformed body with 400', async () => {
    const response = await fetch(`${baseUrl}/api/workouts/parse`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: '{"text":',
    });
    const json = envelopeSchema.parse(await response.json());

    expect(response.status).toBe(400);
    expect(json.error?.code).toBe('INVALID_JSON');
  });

  it('should answer an overlong duration with 422', async () => {
    const { status, json } = await call('POST', '/api/workouts/parse', {
      text: '12345678901234567891 minutes running',
    });

    expect(status).toBe(422);
    expect(json.error?.code).toBe('DURATION_OUT_OF_RANGE');
  });

  it('should list the activity catalog in declaration order', async () => {
    const { status, json } = await call('GET', '/api/workouts/activities');

    expect(status).toBe(200);
    expect(json.data).toEqual([
      { name: 'walking', met: 3.5 },
      { name: 'running', met: 7.5 },
      { name: 'cycling', met: 6.8 },
      { name: 'swimming', met: 5.8 },
      { name: 'yoga', met: 2.5 },
      { name: 'weights', met: 4 },
      { name: 'dancing', met: 5 },
      { name: 'aerobics', met: 6 },
      { name: 'hiking', met: 6 },
      { name: 'jumping rope', met: 10 },
      { name: 'rowing', met: 7 },
      { name: 'riding', met: 4.5 },
      { name: 'skating', met: 7 },
      { name: 'football', met: 8 },
      { name: 'basketball', met: 6.5 },
    ]);
  });

  it('should estimate calories', async () => {
    const { json } = await call('POST', '/api/workouts/calories', {
      activity: 'Running',
      duration_minutes: 45,
      weight_kg: 80,
    });

    expect(json.data).toEqual({
      activity: 'running',
      duration_minutes: 45,
      weight_kg: 80,
      met: 7.5,
      calories: 450,
    });
  });

  it('should compute BMI, goal and foods', async () => {
    const { json } = await call('POST', '/api/metrics/bmi', {
      weight_kg: 50,
      height_cm: 180,
    });

    expect(json.data).toMatchObject({ bmi: 15.43, goal: 'gain' });
    expect(json.data).toEqual(
      expect.objectContaining({
        foods: expect.arrayContaining(['Peanut butter toast']),
      })
    );
  });

  it('should enforce weight and height bounds', async () => {
    const { status, json } = await call('POST', '/api/metrics/bmi', {
      weight_kg: 30,
      height_cm: 170,
    });

    expect(status).toBe(400);
    expect(json.error?.code).toBe('VALIDATION_ERROR');
  });

  it('should treat goals case-sensitively', async () => {
    const { json } = await call('GET', '/api/recommendations/foods/GAIN');
    expect(json.data).toEqual({ goal: 'GAIN', foods: [] });
  });

  it('should return an empty food list for unknown goals', async () => {
    const { json } = await call('GET', '/api/recommendations/foods/bulk');
    expect(json.data).toEqual({ goal: 'bulk', foods: [] });
  });

  it('should answer health questions', async () => {
    const { json } = await call('POST', '/api/recommendations/health', {
      query: 'I have a headache and fatigue',
    });

    expect(json.data).toMatchObject({ topic: { key: 'headache' } });
    expect(json.data).toEqual(
      expect.objectContaining({
        suggestion: expect.stringMatching(/^\*\*Pain in the head region/),
      })
    );
  });

  it('should reject a blank health question', async () => {
    const { status, json } = await call('POST', '/api/recommendations/health', {
      query: '   ',
    });

    expect(status).toBe(400);
    expect(json.error?.message).toBe('Please type something!');
  });

  it('should run a session from start to end', async () => {
    const created = await call('POST', '/api/sessions');
    expect(created.status).toBe(201);
    const { sessionId } = z
      .object({ sessionId: z.string().uuid() })
      .parse(created.json.data);
    const workouts = `/api/sessions/${sessionId}/workouts`;

    const logged = await call('POST', workouts, {
      text: 'I did 30 minutes of cycling',
      weight_kg: 70,
      height_cm: 170,
      date: '2026-03-01',
    });
    expect(logged.status).toBe(201);
    expect(logged.json.data).toMatchObject({
      message: 'Added cycling for 30 min - ~238 cal burned',
    });

    const rejected = await call('POST', workouts, {
      text: '45 min of something unknown',
      weight_kg: 70,
      height_cm: 170,
    });
    expect(rejected.status).toBe(422);
    expect(rejected.json.error?.code).toBe('UNKNOWN_ACTIVITY');

    const history = await call('GET', `${workouts}?limit=5`);
    expect(history.json.data).toEqual({
      records: [
        {
          date: '2026-03-01',
          activity: 'Cycling',
          duration_minutes: 30,
          calories: 238,
          weight_kg: 70,
          height_cm: 170,
          bmi: 24.22,
        },
      ],
      total: 1,
    });

    const summary = await call('GET', `/api/sessions/${sessionId}/summary`);
    expect(summary.json.data).toMatchObject({
      total: 1,
      goal: 'maintain',
      caloriesByActivity: [{ activity: 'Cycling', calories: 238 }],
    });

    const ended = await call('DELETE', `/api/sessions/${sessionId}`);
    expect(ended.json.data).toEqual({ ended: true });

    const gone = await call('GET', `/api/sessions/${sessionId}/summary`);
    expect(gone.status).toBe(404);
    expect(gone.json.error?.code).toBe('SESSION_NOT_FOUND');
  });

  it('should answer unknown routes with 404', async () => {
    const { status, json } = await call('GET', '/api/nothing');

    expect(status).toBe(404);
    expect(json.error?.code).toBe('NOT_FOUND');
  });
});
