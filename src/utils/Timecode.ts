/**
 * Clock-style time formatting for the time display and scrubber tooltips.
 */

function pad2(value: number): string {
  return value.toString().padStart(2, '0');
}

/**
 * Format seconds as `MM:SS`, or `HH:MM:SS` from one hour on.
 * Fractions are truncated. NaN, infinite and negative inputs give `00:00`.
 */
export function formatClock(seconds: number): string {
  if (!Number.isFinite(seconds) || seconds < 0) return '00:00';

  const whole = Math.floor(seconds);
  const hours = Math.floor(whole / 3600);
  const minutes = Math.floor((whole % 3600) / 60);
  const secs = whole % 60;

  if (hours > 0) {
    return `${pad2(hours)}:${pad2(minutes)}:${pad2(secs)}`;
  }
  return `${pad2(minutes)}:${pad2(secs)}`;
}

/** `current / total` as shown next to the transport controls. */
export function formatProgress(currentSeconds: number, totalSeconds: number): string {
  return `${formatClock(currentSeconds)} / ${formatClock(totalSeconds)}`;
}
