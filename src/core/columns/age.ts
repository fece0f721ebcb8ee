/**
 * Human-readable object ages, in the coarse style kubectl prints
 */

const SECOND = 1000;
const MINUTE = 60 * SECOND;
const HOUR = 60 * MINUTE;
const DAY = 24 * HOUR;
const YEAR = 365 * DAY;

export const CELL_UNKNOWN = '<unknown>';
export const CELL_INVALID = '<invalid>';

function withRemainder(major: number, majorUnit: string, minor: number, minorUnit: string): string {
  return minor === 0 ? `${major}${majorUnit}` : `${major}${majorUnit}${minor}${minorUnit}`;
}

/**
 * Format an elapsed duration in milliseconds using the coarsest sensible
 * units, e.g. `45s`, `1m30s`, `3h4m`, `400d`, `2y15d`.
 */
export function humanDuration(elapsedMs: number): string {
  if (Number.isNaN(elapsedMs)) {
    return CELL_UNKNOWN;
  }
  const seconds = Math.trunc(elapsedMs / SECOND);
  // Up to a second of clock skew between client and server reads as "now"
  if (seconds < -1) {
    return CELL_INVALID;
  }
  if (seconds < 0) {
    return '0s';
  }
  if (seconds < 60) {
    return `${seconds}s`;
  }

  const minutes = Math.trunc(elapsedMs / MINUTE);
  if (minutes < 10) {
    return withRemainder(minutes, 'm', seconds % 60, 's');
  }
  if (minutes < 60 * 3) {
    return `${minutes}m`;
  }

  const hours = Math.trunc(elapsedMs / HOUR);
  if (hours < 8) {
    return withRemainder(hours, 'h', minutes % 60, 'm');
  }
  if (hours < 48) {
    return `${hours}h`;
  }

  const days = Math.trunc(elapsedMs / DAY);
  if (hours < 24 * 8) {
    return withRemainder(days, 'd', hours % 24, 'h');
  }
  if (hours < 24 * 365 * 2) {
    return `${days}d`;
  }

  const years = Math.trunc(elapsedMs / YEAR);
  if (hours < 24 * 365 * 8) {
    return withRemainder(years, 'y', days % 365, 'd');
  }
  return `${years}y`;
}

function toTimestamp(value: unknown): number | undefined {
  if (value instanceof Date) {
    const time = value.getTime();
    return Number.isNaN(time) ? undefined : time;
  }
  if (typeof value === 'string' && value.length > 0) {
    const time = Date.parse(value);
    return Number.isNaN(time) ? undefined : time;
  }
  return undefined;
}

/**
 * Elapsed time since a creation timestamp, or `<unknown>` when the timestamp
 * is absent, zero or unparsable
 */
export function translateTimestampSince(timestamp: unknown, now: Date): string {
  const time = toTimestamp(timestamp);
  if (time === undefined || time <= 0) {
    return CELL_UNKNOWN;
  }
  return humanDuration(now.getTime() - time);
}
