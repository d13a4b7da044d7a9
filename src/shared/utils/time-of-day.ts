/**
 * Wall-clock time helpers. Shifts carry no date, so every comparison is done
 * on seconds since midnight.
 */

/** `HH:mm` or `HH:mm:ss`, 24-hour clock */
export const TIME_OF_DAY_PATTERN = /^([01]\d|2[0-3]):([0-5]\d)(?::([0-5]\d))?$/;

export const SECONDS_PER_DAY = 24 * 60 * 60;

export function parseTimeOfDay(value: string): number | null {
  const match = TIME_OF_DAY_PATTERN.exec(value);
  if (!match) {
    return null;
  }

  const [, hours, minutes, seconds] = match;
  return Number(hours) * 3600 + Number(minutes) * 60 + Number(seconds ?? 0);
}

/**
 * Formats seconds since midnight as `HH:mm`, or `HH:mm:ss` when the seconds are not zero.
 */
export function formatTimeOfDay(totalSeconds: number): string {
  if (!Number.isInteger(totalSeconds) || totalSeconds < 0 || totalSeconds >= SECONDS_PER_DAY) {
    throw new RangeError(`Time of day out of range: ${totalSeconds}`);
  }

  const hours = Math.floor(totalSeconds / 3600);
  const minutes = Math.floor((totalSeconds % 3600) / 60);
  const seconds = totalSeconds % 60;
  const hhmm = `${pad(hours)}:${pad(minutes)}`;

  return seconds === 0 ? hhmm : `${hhmm}:${pad(seconds)}`;
}

export function normalizeTimeOfDay(value: string): string | null {
  const seconds = parseTimeOfDay(value);
  return seconds === null ? null : formatTimeOfDay(seconds);
}

function pad(part: number): string {
  return part.toString().padStart(2, '0');
}

/** Seconds since midnight UTC of an instant, whole seconds only */
export function utcTimeOfDay(instant: Date): number {
  return instant.getUTCHours() * 3600 + instant.getUTCMinutes() * 60 + instant.getUTCSeconds();
}
