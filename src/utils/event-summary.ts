import type { EventType, SegmentedRecord } from './storm-events.js';
import { hoursBetween } from './time.js';

export interface EventSummary {
  eventId: number;
  eventType: EventType;
  startTime: string;
  endTime: string;
  durationHours: number;
  totalDepth: number;
  peakIntensity: number;
  meanIntensity: number;
}

interface EventAccumulator {
  eventId: number;
  eventType: EventType;
  first: SegmentedRecord;
  last: SegmentedRecord;
  totalDepth: number;
  peakIntensity: number;
}

export const summarizeEvents = (segmentation: readonly SegmentedRecord[]): EventSummary[] => {
  const events = new Map<number, EventAccumulator>();

  for (const record of segmentation) {
    const current = events.get(record.eventId);
    if (!current) {
      events.set(record.eventId, {
        eventId: record.eventId,
        eventType: record.eventType,
        first: record,
        last: record,
        totalDepth: record.precip,
        peakIntensity: record.precip,
      });
      continue;
    }
    if (record.timeMs < current.first.timeMs) current.first = record;
    if (record.timeMs > current.last.timeMs) current.last = record;
    current.totalDepth += record.precip;
    current.peakIntensity = Math.max(current.peakIntensity, record.precip);
  }

  return [...events.values()]
    .sort((a, b) => a.first.timeMs - b.first.timeMs)
    .map((event) => {
      const durationHours = hoursBetween(event.first.timeMs, event.last.timeMs) + 1;
      return {
        eventId: event.eventId,
        eventType: event.eventType,
        startTime: event.first.timestamp,
        endTime: event.last.timestamp,
        durationHours,
        totalDepth: event.totalDepth,
        peakIntensity: event.peakIntensity,
        meanIntensity: event.totalDepth / durationHours,
      };
    });
};

export const filterEventsByType = (summaries: readonly EventSummary[], eventType: EventType): EventSummary[] =>
  summaries.filter((summary) => summary.eventType === eventType);
