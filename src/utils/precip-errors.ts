export type PrecipSeriesErrorDetail =
  | { kind: 'InvalidTimestamp'; index: number; value: string }
  | { kind: 'UnorderedOrDuplicateTimestamp'; index: number; timestamp: string; previousTimestamp: string }
  | { kind: 'DiscontinuousSeries'; index: number; from: string; to: string; gapHours: number }
  | { kind: 'OffHourTimestamp'; index: number; timestamp: string }
  | { kind: 'MissingValue'; indices: number[]; timestamps: string[] }
  | { kind: 'NegativeValue'; indices: number[]; timestamps: string[] }
  | { kind: 'InvalidWindowParameters'; parameters: Record<string, number> };

export type PrecipSeriesErrorKind = PrecipSeriesErrorDetail['kind'];

const MAX_LISTED_TIMESTAMPS = 5;

const listTimestamps = (timestamps: string[]): string => {
  const shown = timestamps.slice(0, MAX_LISTED_TIMESTAMPS).join(', ');
  const rest = timestamps.length - MAX_LISTED_TIMESTAMPS;
  return rest > 0 ? `${shown} (+${rest} more)` : shown;
};

const describeDetail = (detail: PrecipSeriesErrorDetail): string => {
  switch (detail.kind) {
    case 'InvalidTimestamp':
      return `Record ${detail.index} has an unparseable timestamp "${detail.value}"`;
    case 'UnorderedOrDuplicateTimestamp':
      return `Timestamp ${detail.timestamp} at index ${detail.index} does not follow ${detail.previousTimestamp}`;
    case 'DiscontinuousSeries':
      return `Series jumps ${detail.gapHours}h from ${detail.from} to ${detail.to} at index ${detail.index}`;
    case 'OffHourTimestamp':
      return `Timestamp ${detail.timestamp} at index ${detail.index} is not on a whole hour`;
    case 'MissingValue':
      return `Precipitation missing for ${detail.timestamps.length} hour(s): ${listTimestamps(detail.timestamps)}`;
    case 'NegativeValue':
      return `Negative precipitation for ${detail.timestamps.length} hour(s): ${listTimestamps(detail.timestamps)}`;
    case 'InvalidWindowParameters':
      return `Invalid window parameters ${JSON.stringify(detail.parameters)}`;
  }
};

export class PrecipSeriesError extends Error {
  readonly kind: PrecipSeriesErrorKind;
  readonly detail: PrecipSeriesErrorDetail;

  constructor(detail: PrecipSeriesErrorDetail, message: string = describeDetail(detail)) {
    super(message);
    this.name = 'PrecipSeriesError';
    this.kind = detail.kind;
    this.detail = detail;
  }
}

export const isPrecipSeriesError = (error: unknown): error is PrecipSeriesError => error instanceof PrecipSeriesError;
