import { computeAntecedent, type AntecedentPoint, type Reducer, type ReducerName } from './antecedent.js';
import type { HourlySeries } from './precip-series.js';
import { floorToHourGrid, timeValueToMs } from './time.js';

export type WeatherLabel = 'Wet' | 'Dry';

export interface ClassifiedPoint extends AntecedentPoint {
  weather: WeatherLabel | null;
}

export type DataRow = Record<string, unknown>;

export const classifyValue = (value: number | null, threshold: number): WeatherLabel | null => {
  if (value === null) return null;
  return value >= threshold ? 'Wet' : 'Dry';
};

export const classifyWeather = (antecedent: readonly AntecedentPoint[], threshold: number): ClassifiedPoint[] =>
  antecedent.map((point) => ({ ...point, weather: classifyValue(point.value, threshold) }));

export interface AppendWeatherOptions {
  period: number;
  delay?: number;
  threshold: number;
  reducer?: ReducerName | Reducer;
  timestampColumn?: string;
  columnPrefix?: string;
  weatherColumn?: string;
}

export interface JoinCoverage {
  totalRows: number;
  matchedRows: number;
  unmatchedRows: number;
  undefinedAntecedentRows: number;
  invalidTimestampRows: number;
  /** Row indices that received `null` in both added columns. */
  unmatchedIndices: number[];
}

export interface AppendWeatherResult {
  rows: DataRow[];
  antecedentColumn: string;
  weatherColumn: string;
  coverage: JoinCoverage;
}

export const antecedentColumnName = (columnPrefix: string, period: number) => `${columnPrefix}${period}h`;

/**
 * Annotates copies of `rows` with the antecedent precipitation and Wet/Dry
 * label of the hour each row falls in. Rows that cannot be joined get `null`
 * in both columns and are tallied in `coverage`.
 */
export const appendWeather = (rows: readonly DataRow[], series: HourlySeries, options: AppendWeatherOptions): AppendWeatherResult => {
  const {
    period,
    delay = 0,
    threshold,
    reducer = 'sum',
    timestampColumn = 'timestamp',
    columnPrefix = 'antecedentPrecip',
    weatherColumn = 'weather',
  } = options;

  const classified = classifyWeather(computeAntecedent(series, { period, delay, reducer }), threshold);
  const byHour = new Map(classified.map((point) => [point.timeMs, point]));
  const anchorMs = series.length ? series[0].timeMs : 0;
  const antecedentColumn = antecedentColumnName(columnPrefix, period);

  const coverage: JoinCoverage = {
    totalRows: rows.length,
    matchedRows: 0,
    unmatchedRows: 0,
    undefinedAntecedentRows: 0,
    invalidTimestampRows: 0,
    unmatchedIndices: [],
  };

  const annotated = rows.map((row, index) => {
    const timeMs = timeValueToMs(row[timestampColumn]);
    const point = timeMs === null ? undefined : byHour.get(floorToHourGrid(timeMs, anchorMs));

    if (point && point.value !== null) {
      coverage.matchedRows += 1;
    } else {
      if (timeMs === null) coverage.invalidTimestampRows += 1;
      else if (!point) coverage.unmatchedRows += 1;
      else coverage.undefinedAntecedentRows += 1;
      coverage.unmatchedIndices.push(index);
    }

    return {
      ...row,
      [antecedentColumn]: point?.value ?? null,
      [weatherColumn]: point?.weather ?? null,
    };
  });

  return { rows: annotated, antecedentColumn, weatherColumn, coverage };
};
