import dotenv from 'dotenv';

dotenv.config();

const parsePositiveInt = (rawValue: string | undefined, fallback: number): number => {
  const parsed = Number(rawValue);
  return Number.isFinite(parsed) && parsed > 0 ? Math.round(parsed) : fallback;
};

export const PORT = process.env.PORT || 3001;
export const IS_PRODUCTION = process.env.NODE_ENV === 'production';

export const REQUEST_TIMEOUT_MS = parsePositiveInt(process.env.REQUEST_TIMEOUT_MS, 9000);
export const RATE_LIMIT_WINDOW_MS = parsePositiveInt(process.env.RATE_LIMIT_WINDOW_MS, 15 * 60 * 1000);
export const RATE_LIMIT_MAX_REQUESTS = parsePositiveInt(process.env.RATE_LIMIT_MAX_REQUESTS, 300);

// A year of hourly records is ~400kb of JSON.
export const JSON_BODY_LIMIT = process.env.JSON_BODY_LIMIT || '5mb';
export const MAX_SERIES_HOURS = parsePositiveInt(process.env.MAX_SERIES_HOURS, 100000);
export const OPEN_METEO_ARCHIVE_HOST = process.env.OPEN_METEO_ARCHIVE_HOST || 'archive-api.open-meteo.com';

export const CORS_ALLOWLIST = (process.env.CORS_ORIGIN || '')
  .split(',')
  .map((origin) => origin.trim())
  .filter(Boolean);
