import { Express, Request, Response } from 'express';
import { z, ZodError } from 'zod';
import { computeAntecedent, REDUCER_NAMES } from '../utils/antecedent.js';
import { filterEventsByType } from '../utils/event-summary.js';
import type { FetchWithTimeout } from '../utils/http-client.js';
import { isPrecipSeriesError } from '../utils/precip-errors.js';
import { analyzePrecipitation } from '../utils/precip-pipeline.js';
import { validateHourlySeries } from '../utils/precip-series.js';
import { appendWeather } from '../utils/precip-weather.js';
import { fetchHourlyPrecipitation } from '../utils/rainfall-source.js';
import { isIsoDate } from '../utils/time.js';

const MAX_STATION_RANGE_DAYS = 366;

// Window parameters are only type-checked here; range errors come back from
// the engine as InvalidWindowParameters.
const createSchemas = (maxSeriesHours: number) => {
  const series = z
    .array(
      z.object({
        timestamp: z.string().min(1),
        precip: z.number().nullable().optional(),
      }),
    )
    .max(maxSeriesHours);
  const reducer = z.enum(REDUCER_NAMES).optional();

  return {
    validate: z.object({ series }),
    antecedent: z.object({
      series,
      period: z.number(),
      delay: z.number().optional(),
      reducer,
    }),
    events: z.object({
      series,
      minDryGapHours: z.number().optional(),
      type: z.enum(['Wet', 'Dry']).optional(),
    }),
    weather: z.object({
      series,
      rows: z.array(z.record(z.unknown())),
      period: z.number(),
      delay: z.number().optional(),
      threshold: z.number(),
      reducer,
      timestampColumn: z.string().min(1).optional(),
      columnPrefix: z.string().optional(),
      weatherColumn: z.string().min(1).optional(),
    }),
    stationEvents: z
      .object({
        lat: z.coerce.number().min(-90).max(90),
        lon: z.coerce.number().min(-180).max(180),
        start: z.string().refine(isIsoDate, 'start must be YYYY-MM-DD'),
        end: z.string().refine(isIsoDate, 'end must be YYYY-MM-DD'),
        minDryGapHours: z.coerce.number().optional(),
        type: z.enum(['Wet', 'Dry']).optional(),
      })
      .refine(({ start, end }) => start <= end, { message: 'start must not be after end', path: ['end'] })
      .refine(({ start, end }) => Date.parse(end) - Date.parse(start) <= MAX_STATION_RANGE_DAYS * 24 * 60 * 60 * 1000, {
        message: `date range is limited to ${MAX_STATION_RANGE_DAYS} days`,
        path: ['end'],
      }),
  };
};

class UpstreamSourceError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UpstreamSourceError';
  }
}

const sendError = (req: Request, res: Response, error: unknown) => {
  if (error instanceof ZodError) {
    return res.status(400).json({ error: 'Invalid request', issues: error.issues });
  }
  if (isPrecipSeriesError(error)) {
    return res.status(422).json({ error: error.message, kind: error.kind, detail: error.detail });
  }
  if (error instanceof UpstreamSourceError) {
    return res.status(502).json({ error: 'Hourly precipitation source unavailable', details: error.message });
  }
  console.error(`[precip] ${req.method} ${req.originalUrl} failed:`, error);
  return res.status(500).json({ error: 'Internal error' });
};

interface RegisterPrecipRoutesOptions {
  app: Express;
  fetchWithTimeout: FetchWithTimeout;
  defaultFetchHeaders: Record<string, string>;
  archiveHost: string;
  maxSeriesHours: number;
}

export const registerPrecipRoutes = ({ app, fetchWithTimeout, defaultFetchHeaders, archiveHost, maxSeriesHours }: RegisterPrecipRoutesOptions) => {
  const schemas = createSchemas(maxSeriesHours);

  app.post('/api/precip/validate', (req: Request, res: Response) => {
    try {
      const { series } = schemas.validate.parse(req.body);
      const validated = validateHourlySeries(series);
      res.json({
        ok: true,
        hours: validated.length,
        start: validated.length ? validated[0].timestamp : null,
        end: validated.length ? validated[validated.length - 1].timestamp : null,
      });
    } catch (error) {
      sendError(req, res, error);
    }
  });

  app.post('/api/precip/antecedent', (req: Request, res: Response) => {
    try {
      const { series, period, delay, reducer } = schemas.antecedent.parse(req.body);
      const points = computeAntecedent(validateHourlySeries(series), { period, delay, reducer });
      res.json({ period, delay: delay ?? 0, reducer: reducer ?? 'sum', points });
    } catch (error) {
      sendError(req, res, error);
    }
  });

  app.post('/api/precip/events', (req: Request, res: Response) => {
    try {
      const { series, minDryGapHours, type } = schemas.events.parse(req.body);
      const { events, summaries } = analyzePrecipitation(series, { minDryGapHours });
      res.json({ events, summaries: type ? filterEventsByType(summaries, type) : summaries });
    } catch (error) {
      sendError(req, res, error);
    }
  });

  app.post('/api/precip/weather', (req: Request, res: Response) => {
    try {
      const { series, rows, ...options } = schemas.weather.parse(req.body);
      const result = appendWeather(rows, validateHourlySeries(series), options);
      const { coverage } = result;
      if (coverage.unmatchedIndices.length) {
        console.warn(
          `[precip] weather join left ${coverage.unmatchedIndices.length}/${coverage.totalRows} rows uncovered ` +
            `(no hour: ${coverage.unmatchedRows}, short history: ${coverage.undefinedAntecedentRows}, bad timestamp: ${coverage.invalidTimestampRows})`,
        );
      }
      res.json(result);
    } catch (error) {
      sendError(req, res, error);
    }
  });

  app.get('/api/precip/station-events', async (req: Request, res: Response) => {
    try {
      const { lat, lon, start, end, minDryGapHours, type } = schemas.stationEvents.parse(req.query);
      const records = await fetchHourlyPrecipitation({
        lat,
        lon,
        startDate: start,
        endDate: end,
        host: archiveHost,
        fetchWithTimeout,
        fetchOptions: { headers: defaultFetchHeaders },
      }).catch((sourceError: unknown) => {
        throw new UpstreamSourceError(sourceError instanceof Error ? sourceError.message : String(sourceError));
      });
      const { series, summaries } = analyzePrecipitation(records, { minDryGapHours });
      res.json({
        lat,
        lon,
        start: series.length ? series[0].timestamp : null,
        end: series.length ? series[series.length - 1].timestamp : null,
        hours: series.length,
        units: 'inch',
        summaries: type ? filterEventsByType(summaries, type) : summaries,
      });
    } catch (error) {
      sendError(req, res, error);
    }
  });
};
