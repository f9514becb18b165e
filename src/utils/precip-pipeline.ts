import { computeAntecedent, type AntecedentOptions, type AntecedentPoint } from './antecedent.js';
import { summarizeEvents, type EventSummary } from './event-summary.js';
import { validateHourlySeries, type HourlySeries, type RawHourlyRecord } from './precip-series.js';
import { mergeStormEvents, segmentEvents, type SegmentedRecord } from './storm-events.js';

export interface AnalyzePrecipitationOptions {
  minDryGapHours?: number;
  antecedent?: AntecedentOptions;
}

export interface PrecipitationAnalysis {
  series: HourlySeries;
  events: SegmentedRecord[];
  summaries: EventSummary[];
  antecedent: AntecedentPoint[] | null;
}

export const analyzePrecipitation = (records: readonly RawHourlyRecord[], options: AnalyzePrecipitationOptions = {}): PrecipitationAnalysis => {
  const series = validateHourlySeries(records);
  const segmented = segmentEvents(series);
  const events = options.minDryGapHours === undefined ? segmented : mergeStormEvents(segmented, { minDryGapHours: options.minDryGapHours });

  return {
    series,
    events,
    summaries: summarizeEvents(events),
    antecedent: options.antecedent ? computeAntecedent(series, options.antecedent) : null,
  };
};
