/**
 * Format a number of seconds as `m:ss`, or `h:mm:ss` once it reaches an hour.
 * Returns null for a missing value so callers can pass nullable columns straight through.
 */
export function formatDuration(totalSeconds: number | null): string | null {
  if (totalSeconds === null) {
    return null;
  }

  const whole = Math.max(0, Math.floor(totalSeconds));
  const hours = Math.floor(whole / 3600);
  const minutes = Math.floor((whole % 3600) / 60);
  const seconds = whole % 60;
  const ss = String(seconds).padStart(2, '0');

  if (hours > 0) {
    return `${hours}:${String(minutes).padStart(2, '0')}:${ss}`;
  }
  return `${minutes}:${ss}`;
}
