import { PrecipSeriesError } from './precip-errors.js';
import type { HourlySeries } from './precip-series.js';

export const REDUCER_NAMES = ['sum', 'max', 'min', 'mean'] as const;

export type ReducerName = (typeof REDUCER_NAMES)[number];
export type Reducer = (values: readonly number[]) => number;

export const REDUCERS: Record<ReducerName, Reducer> = {
  sum: (values) => values.reduce((total, value) => total + value, 0),
  max: (values) => values.reduce((peak, value) => Math.max(peak, value), Number.NEGATIVE_INFINITY),
  min: (values) => values.reduce((low, value) => Math.min(low, value), Number.POSITIVE_INFINITY),
  mean: (values) => REDUCERS.sum(values) / values.length,
};

export interface AntecedentPoint {
  timestamp: string;
  timeMs: number;
  /** `null` while the trailing window reaches before the first hour. */
  value: number | null;
}

export interface AntecedentOptions {
  period: number;
  delay?: number;
  reducer?: ReducerName | Reducer;
}

export const assertWindowParameters = (period: number, delay: number) => {
  if (!Number.isInteger(period) || period <= 0 || !Number.isInteger(delay) || delay < 0) {
    throw new PrecipSeriesError({ kind: 'InvalidWindowParameters', parameters: { period, delay } });
  }
};

const resolveReducer = (reducer: ReducerName | Reducer): Reducer => (typeof reducer === 'function' ? reducer : REDUCERS[reducer]);

/**
 * Trailing-window aggregate for every hour. The window for index `i` spans
 * `[i - delay - period + 1, i - delay]`, so the first `period + delay - 1`
 * points are always `null`.
 */
export const computeAntecedent = (series: HourlySeries, { period, delay = 0, reducer = 'sum' }: AntecedentOptions): AntecedentPoint[] => {
  assertWindowParameters(period, delay);
  const reduce = resolveReducer(reducer);
  const precip = series.map((record) => record.precip);

  return series.map((record, index) => {
    const end = index - delay;
    const start = end - period + 1;
    return {
      timestamp: record.timestamp,
      timeMs: record.timeMs,
      value: start < 0 ? null : reduce(precip.slice(start, end + 1)),
    };
  });
};
