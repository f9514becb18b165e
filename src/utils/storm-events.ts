import { PrecipSeriesError } from './precip-errors.js';
import type { HourlyRecord, HourlySeries } from './precip-series.js';
import type { WeatherLabel } from './precip-weather.js';

export type EventType = WeatherLabel;

export interface SegmentedRecord extends HourlyRecord {
  eventId: number;
  eventType: EventType;
}

export const hourEventType = (precip: number): EventType => (precip > 0 ? 'Wet' : 'Dry');

const labelRuns = (records: readonly HourlyRecord[], typeAt: (index: number) => EventType): SegmentedRecord[] => {
  let eventId = 0;
  let previousType: EventType | null = null;

  return records.map((record, index) => {
    const eventType = typeAt(index);
    if (eventType !== previousType) {
      eventId += 1;
      previousType = eventType;
    }
    return { ...record, eventId, eventType };
  });
};

/**
 * Splits the series into maximal runs of wet (`precip > 0`) or dry hours.
 * The first and last events are whatever the series bounds leave of them.
 */
export const segmentEvents = (series: HourlySeries): SegmentedRecord[] =>
  labelRuns(series, (index) => hourEventType(series[index].precip));

interface EventRun {
  eventType: EventType;
  start: number;
  end: number;
}

const collectRuns = (segmentation: readonly SegmentedRecord[]): EventRun[] => {
  const runs: EventRun[] = [];
  segmentation.forEach((record, index) => {
    const last = runs[runs.length - 1];
    if (last && segmentation[last.start].eventId === record.eventId) {
      last.end = index;
    } else {
      runs.push({ eventType: record.eventType, start: index, end: index });
    }
  });
  return runs;
};

export interface MergeStormOptions {
  /** Dry spells shorter than this, between two wet events, are absorbed into one storm. */
  minDryGapHours: number;
}

/**
 * Opt-in storm merging. Only interior dry runs flanked by wet events are
 * absorbed; dry runs touching either end of the series are left alone.
 */
export const mergeStormEvents = (segmentation: readonly SegmentedRecord[], { minDryGapHours }: MergeStormOptions): SegmentedRecord[] => {
  if (!Number.isInteger(minDryGapHours) || minDryGapHours <= 0) {
    throw new PrecipSeriesError({ kind: 'InvalidWindowParameters', parameters: { minDryGapHours } });
  }

  const types = segmentation.map((record) => record.eventType);
  const runs = collectRuns(segmentation);
  runs.forEach((run, runIndex) => {
    const isInterior = runIndex > 0 && runIndex < runs.length - 1;
    const length = run.end - run.start + 1;
    if (run.eventType === 'Dry' && isInterior && length < minDryGapHours) {
      types.fill('Wet', run.start, run.end + 1);
    }
  });

  return labelRuns(segmentation, (index) => types[index]);
};
