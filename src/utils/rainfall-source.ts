import { z } from 'zod';
import type { FetchWithTimeout } from './http-client.js';
import type { RawHourlyRecord } from './precip-series.js';

const openMeteoHourlyPayloadSchema = z.object({
  hourly: z.object({
    time: z.array(z.string()),
    precipitation: z.array(z.number().nullable()),
  }),
});

export const buildOpenMeteoHourlyArchiveUrl = (host: string, lat: number, lon: number, startDate: string, endDate: string): string => {
  const params = new URLSearchParams({
    latitude: String(lat),
    longitude: String(lon),
    timezone: 'UTC',
    start_date: startDate,
    end_date: endDate,
    hourly: 'precipitation',
    precipitation_unit: 'inch',
  });
  return `https://${host}/v1/archive?${params.toString()}`;
};

// Open-Meteo reports local times without seconds or offset ("2024-05-01T13:00").
const toUtcIso = (time: string): string => (/([zZ]|[+\-]\d{2}:\d{2})$/.test(time) ? time : `${time.length === 16 ? `${time}:00` : time}Z`);

interface FetchHourlyPrecipitationOptions {
  lat: number;
  lon: number;
  startDate: string;
  endDate: string;
  host: string;
  fetchWithTimeout: FetchWithTimeout;
  fetchOptions?: RequestInit;
  attempts?: number;
}

/**
 * Pulls an hourly precipitation series (inches, UTC) from the Open-Meteo
 * archive. Missing hours come back as `null` so validation reports them.
 */
export const fetchHourlyPrecipitation = async ({
  lat,
  lon,
  startDate,
  endDate,
  host,
  fetchWithTimeout,
  fetchOptions,
  attempts = 2,
}: FetchHourlyPrecipitationOptions): Promise<RawHourlyRecord[]> => {
  const url = buildOpenMeteoHourlyArchiveUrl(host, lat, lon, startDate, endDate);
  let lastError: unknown = null;

  for (let attempt = 1; attempt <= attempts; attempt += 1) {
    try {
      const response = await fetchWithTimeout(url, fetchOptions);
      if (!response.ok) {
        throw new Error(`Open-Meteo archive request failed with status ${response.status}`);
      }
      const parsed = openMeteoHourlyPayloadSchema.safeParse(await response.json());
      if (!parsed.success) {
        throw new Error('Open-Meteo archive response did not include an hourly precipitation series.');
      }
      const { time, precipitation } = parsed.data.hourly;
      if (time.length !== precipitation.length) {
        throw new Error(`Open-Meteo archive returned ${time.length} times but ${precipitation.length} precipitation values.`);
      }
      return time.map((timeValue, index) => ({ timestamp: toUtcIso(timeValue), precip: precipitation[index] }));
    } catch (error) {
      lastError = error;
    }
  }

  throw lastError instanceof Error ? lastError : new Error('Open-Meteo archive request failed');
};
