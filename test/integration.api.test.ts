import request from 'supertest';
import { app } from '../index.js';
import { createApp, registerBodyErrorHandler } from '../src/server/create-app.js';
import { registerPrecipRoutes } from '../src/routes/precip.js';
import type { FetchWithTimeout } from '../src/utils/http-client.js';
import { hourIso, hourlyRecords } from './hourly-fixtures.js';

const series = hourlyRecords([0, 0, 1, 2, 0, 0, 0, 3, 0]);

beforeEach(() => {
  jest.spyOn(console, 'log').mockImplementation(() => undefined);
  jest.spyOn(console, 'warn').mockImplementation(() => undefined);
});

afterEach(() => {
  jest.restoreAllMocks();
});

test('GET /healthz returns healthy payload', async () => {
  const res = await request(app).get('/healthz');
  expect(res.status).toBe(200);
  expect(res.body.ok).toBe(true);
  expect(res.body.service).toBe('precip-events-backend');
  expect((await request(app).get('/api/healthz')).status).toBe(200);
});

test('POST /api/precip/validate reports the validated span', async () => {
  const res = await request(app).post('/api/precip/validate').send({ series });
  expect(res.status).toBe(200);
  expect(res.body).toEqual({ ok: true, hours: 9, start: hourIso(0), end: hourIso(8) });
});

test('POST /api/precip/validate returns the failing check as 422', async () => {
  const gappy = [...series.slice(0, 2), ...series.slice(3)];
  const res = await request(app).post('/api/precip/validate').send({ series: gappy });
  expect(res.status).toBe(422);
  expect(res.body.kind).toBe('DiscontinuousSeries');
  expect(res.body.detail).toEqual({ kind: 'DiscontinuousSeries', index: 2, from: hourIso(1), to: hourIso(3), gapHours: 2 });
});

test('POST /api/precip/validate rejects series off the whole hour', async () => {
  const res = await request(app)
    .post('/api/precip/validate')
    .send({ series: [{ timestamp: '2024-05-01T09:17:00Z', precip: 0.3 }, { timestamp: '2024-05-01T10:17:00Z', precip: 0 }] });
  expect(res.status).toBe(422);
  expect(res.body.kind).toBe('OffHourTimestamp');
});

test('POST /api/precip/validate rejects malformed bodies with 400', async () => {
  const res = await request(app).post('/api/precip/validate').send({ series: [{ precip: 1 }] });
  expect(res.status).toBe(400);
  expect(res.body.error).toBe('Invalid request');
  expect(res.body.issues[0].path).toEqual(['series', 0, 'timestamp']);
});

test('POST /api/precip/antecedent returns null for hours without history', async () => {
  const res = await request(app)
    .post('/api/precip/antecedent')
    .send({ series: hourlyRecords([1, 2, 3, 4, 5]), period: 3 });
  expect(res.status).toBe(200);
  expect(res.body.points.map((point: { value: number | null }) => point.value)).toEqual([null, null, 6, 9, 12]);
  expect(res.body.reducer).toBe('sum');
});

test('POST /api/precip/antecedent maps bad windows to InvalidWindowParameters', async () => {
  const res = await request(app).post('/api/precip/antecedent').send({ series, period: 0 });
  expect(res.status).toBe(422);
  expect(res.body.kind).toBe('InvalidWindowParameters');
});

test('POST /api/precip/events returns segmentation and summaries', async () => {
  const res = await request(app).post('/api/precip/events').send({ series, type: 'Wet' });
  expect(res.status).toBe(200);
  expect(res.body.events.map((record: { eventId: number }) => record.eventId)).toEqual([1, 1, 2, 2, 3, 3, 3, 4, 5]);
  expect(res.body.summaries).toEqual([
    { eventId: 2, eventType: 'Wet', startTime: hourIso(2), endTime: hourIso(3), durationHours: 2, totalDepth: 3, peakIntensity: 2, meanIntensity: 1.5 },
    { eventId: 4, eventType: 'Wet', startTime: hourIso(7), endTime: hourIso(7), durationHours: 1, totalDepth: 3, peakIntensity: 3, meanIntensity: 3 },
  ]);
});

test('POST /api/precip/weather annotates rows and reports coverage', async () => {
  const res = await request(app)
    .post('/api/precip/weather')
    .send({
      series,
      rows: [
        { site: 'outfall-1', sampledAt: '2024-05-01T03:40:00Z' },
        { site: 'outfall-2', sampledAt: '2024-05-02T03:40:00Z' },
      ],
      timestampColumn: 'sampledAt',
      period: 2,
      threshold: 1,
    });
  expect(res.status).toBe(200);
  expect(res.body.rows).toEqual([
    { site: 'outfall-1', sampledAt: '2024-05-01T03:40:00Z', antecedentPrecip2h: 3, weather: 'Wet' },
    { site: 'outfall-2', sampledAt: '2024-05-02T03:40:00Z', antecedentPrecip2h: null, weather: null },
  ]);
  expect(res.body.coverage).toMatchObject({ matchedRows: 1, unmatchedRows: 1, unmatchedIndices: [1] });
});

describe('GET /api/precip/station-events', () => {
  const buildApp = (fetchWithTimeout: FetchWithTimeout) => {
    const stationApp = createApp({
      isProduction: false,
      corsAllowlist: [],
      rateLimitWindowMs: 60000,
      rateLimitMaxRequests: 100,
      jsonBodyLimit: '1mb',
    });
    registerPrecipRoutes({
      app: stationApp,
      fetchWithTimeout,
      defaultFetchHeaders: {},
      archiveHost: 'archive.test',
      maxSeriesHours: 1000,
    });
    registerBodyErrorHandler(stationApp);
    return stationApp;
  };

  test('summarizes events from the remote hourly series', async () => {
    const fetchWithTimeout: FetchWithTimeout = async () =>
      new Response(
        JSON.stringify({
          hourly: {
            time: ['2024-05-01T00:00', '2024-05-01T01:00', '2024-05-01T02:00', '2024-05-01T03:00'],
            precipitation: [0, 0.2, 0.1, 0],
          },
        }),
        { status: 200 },
      );
    const res = await request(buildApp(fetchWithTimeout)).get('/api/precip/station-events?lat=44.5&lon=-93.25&start=2024-05-01&end=2024-05-01&type=Wet');
    expect(res.status).toBe(200);
    expect(res.body.hours).toBe(4);
    expect(res.body.summaries).toEqual([
      {
        eventId: 2,
        eventType: 'Wet',
        startTime: '2024-05-01T01:00:00Z',
        endTime: '2024-05-01T02:00:00Z',
        durationHours: 2,
        totalDepth: 0.2 + 0.1,
        peakIntensity: 0.2,
        meanIntensity: (0.2 + 0.1) / 2,
      },
    ]);
  });

  test('reports missing remote hours as a validation failure', async () => {
    const fetchWithTimeout: FetchWithTimeout = async () =>
      new Response(JSON.stringify({ hourly: { time: ['2024-05-01T00:00', '2024-05-01T01:00'], precipitation: [0, null] } }), { status: 200 });
    const res = await request(buildApp(fetchWithTimeout)).get('/api/precip/station-events?lat=44.5&lon=-93.25&start=2024-05-01&end=2024-05-01');
    expect(res.status).toBe(422);
    expect(res.body.kind).toBe('MissingValue');
  });

  test('maps source outages to 502', async () => {
    const fetchWithTimeout: FetchWithTimeout = async () => new Response('', { status: 503 });
    const res = await request(buildApp(fetchWithTimeout)).get('/api/precip/station-events?lat=44.5&lon=-93.25&start=2024-05-01&end=2024-05-01');
    expect(res.status).toBe(502);
    expect(res.body.details).toBe('Open-Meteo archive request failed with status 503');
  });

  test('rejects reversed date ranges', async () => {
    const fetchWithTimeout: FetchWithTimeout = async () => new Response('{}', { status: 200 });
    const res = await request(buildApp(fetchWithTimeout)).get('/api/precip/station-events?lat=44.5&lon=-93.25&start=2024-05-03&end=2024-05-01');
    expect(res.status).toBe(400);
  });
});
