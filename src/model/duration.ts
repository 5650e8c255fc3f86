export const SECONDS_PER_MINUTE = 60;
export const SECONDS_PER_HOUR = 3_600;
export const SECONDS_PER_DAY = 86_400;
// Fixed 30-day month, not calendar-aware.
export const SECONDS_PER_MONTH = 2_592_000;

export interface DurationParts {
  months: number;
  days: number;
  hours: number;
  minutes: number;
  seconds: number;
}

export function splitDuration(totalSeconds: number): DurationParts {
  const total = Math.max(0, Math.floor(totalSeconds));
  return {
    months: Math.floor(total / SECONDS_PER_MONTH),
    days: Math.floor((total % SECONDS_PER_MONTH) / SECONDS_PER_DAY),
    hours: Math.floor((total % SECONDS_PER_DAY) / SECONDS_PER_HOUR),
    minutes: Math.floor((total % SECONDS_PER_HOUR) / SECONDS_PER_MINUTE),
    seconds: total % SECONDS_PER_MINUTE,
  };
}

function pair(major: string, minor: string | null): string {
  return minor ? `${major} ${minor}` : major;
}

/**
 * Compact label for an accumulated duration: the largest non-zero unit plus
 * at most the next non-zero unit from the two below it.
 *
 * formatDuration(125) === '2m 5s'
 * formatDuration(90000) === '1d 1h'
 * formatDuration(0) === ''
 */
export function formatDuration(totalSeconds: number): string {
  const { months, days, hours, minutes, seconds } = splitDuration(totalSeconds);

  if (months > 0) {
    if (days > 0) return pair(`${months}mo`, `${days}d`);
    return pair(`${months}mo`, hours > 0 ? `${hours}h` : null);
  }
  if (days > 0) {
    if (hours > 0) return pair(`${days}d`, `${hours}h`);
    return pair(`${days}d`, minutes > 0 ? `${minutes}m` : null);
  }
  if (hours > 0) {
    if (minutes > 0) return pair(`${hours}h`, `${minutes}m`);
    return pair(`${hours}h`, seconds > 0 ? `${seconds}s` : null);
  }
  if (minutes > 0) return pair(`${minutes}m`, seconds > 0 ? `${seconds}s` : null);
  if (seconds > 0) return `${seconds}s`;
  return '';
}
