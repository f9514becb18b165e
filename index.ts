import { createApp, registerBodyErrorHandler } from './src/server/create-app.js';
import { startServer } from './src/server/start-server.js';
import {
  PORT,
  IS_PRODUCTION,
  REQUEST_TIMEOUT_MS,
  RATE_LIMIT_WINDOW_MS,
  RATE_LIMIT_MAX_REQUESTS,
  CORS_ALLOWLIST,
  JSON_BODY_LIMIT,
  MAX_SERIES_HOURS,
  OPEN_METEO_ARCHIVE_HOST,
} from './src/server/runtime.js';
import { DEFAULT_FETCH_HEADERS, createFetchWithTimeout } from './src/utils/http-client.js';
import { registerHealthRoutes } from './src/routes/health.js';
import { registerPrecipRoutes } from './src/routes/precip.js';

const app = createApp({
  isProduction: IS_PRODUCTION,
  corsAllowlist: CORS_ALLOWLIST,
  rateLimitWindowMs: RATE_LIMIT_WINDOW_MS,
  rateLimitMaxRequests: RATE_LIMIT_MAX_REQUESTS,
  jsonBodyLimit: JSON_BODY_LIMIT,
});

const fetchWithTimeout = createFetchWithTimeout(REQUEST_TIMEOUT_MS);

registerHealthRoutes(app);
registerPrecipRoutes({
  app,
  fetchWithTimeout,
  defaultFetchHeaders: DEFAULT_FETCH_HEADERS,
  archiveHost: OPEN_METEO_ARCHIVE_HOST,
  maxSeriesHours: MAX_SERIES_HOURS,
});
registerBodyErrorHandler(app);

if (process.env.NODE_ENV !== 'test') {
  startServer({ app, port: PORT });
}

export { app };
export { validateHourlySeries } from './src/utils/precip-series.js';
export { computeAntecedent, REDUCERS } from './src/utils/antecedent.js';
export { classifyWeather, appendWeather } from './src/utils/precip-weather.js';
export { segmentEvents, mergeStormEvents } from './src/utils/storm-events.js';
export { summarizeEvents, filterEventsByType } from './src/utils/event-summary.js';
export { analyzePrecipitation } from './src/utils/precip-pipeline.js';
export { PrecipSeriesError } from './src/utils/precip-errors.js';
