import { PrecipSeriesError } from './precip-errors.js';
import { HOUR_MS, hoursBetween, isOnWholeHour, parseIsoTimeToMs } from './time.js';

export interface RawHourlyRecord {
  timestamp: string;
  precip?: number | null;
}

export interface HourlyRecord {
  timestamp: string;
  timeMs: number;
  precip: number;
}

/** Continuous, complete hourly series. Only `validateHourlySeries` builds one. */
export type HourlySeries = readonly HourlyRecord[];

const hasValue = (precip: number | null | undefined): precip is number => typeof precip === 'number' && Number.isFinite(precip);

/**
 * Gate for every windowed computation. Checks run in a fixed order and the
 * first failing check throws; nothing is repaired.
 */
export const validateHourlySeries = (records: readonly RawHourlyRecord[]): HourlySeries => {
  const times = records.map((record, index) => {
    const timeMs = parseIsoTimeToMs(record.timestamp);
    if (timeMs === null) {
      throw new PrecipSeriesError({ kind: 'InvalidTimestamp', index, value: record.timestamp });
    }
    return timeMs;
  });

  for (let i = 1; i < times.length; i += 1) {
    if (times[i] <= times[i - 1]) {
      throw new PrecipSeriesError({
        kind: 'UnorderedOrDuplicateTimestamp',
        index: i,
        timestamp: records[i].timestamp,
        previousTimestamp: records[i - 1].timestamp,
      });
    }
  }

  for (let i = 1; i < times.length; i += 1) {
    if (times[i] - times[i - 1] !== HOUR_MS) {
      throw new PrecipSeriesError({
        kind: 'DiscontinuousSeries',
        index: i,
        from: records[i - 1].timestamp,
        to: records[i].timestamp,
        gapHours: hoursBetween(times[i - 1], times[i]),
      });
    }
  }

  const offHour = records.findIndex((record) => !isOnWholeHour(record.timestamp));
  if (offHour !== -1) {
    throw new PrecipSeriesError({ kind: 'OffHourTimestamp', index: offHour, timestamp: records[offHour].timestamp });
  }

  const validated: HourlyRecord[] = [];
  const missing: number[] = [];
  records.forEach((record, index) => {
    if (hasValue(record.precip)) {
      validated.push({ timestamp: record.timestamp, timeMs: times[index], precip: record.precip });
    } else {
      missing.push(index);
    }
  });
  if (missing.length) {
    throw new PrecipSeriesError({
      kind: 'MissingValue',
      indices: missing,
      timestamps: missing.map((index) => records[index].timestamp),
    });
  }

  const negative = validated.flatMap((record, index) => (record.precip < 0 ? [index] : []));
  if (negative.length) {
    throw new PrecipSeriesError({
      kind: 'NegativeValue',
      indices: negative,
      timestamps: negative.map((index) => validated[index].timestamp),
    });
  }

  return validated;
};
