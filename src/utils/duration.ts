/**
 * Compact human-readable duration: `250µs`, `150ms`, `1.5s`, `2m5s`.
 * The value is rounded to each unit's precision before the unit is chosen, so
 * a reading just under a boundary moves up to the next unit.
 */
export function formatDuration(ms: number): string {
  const micros = Math.round(ms * 1000);
  if (micros < 1000) return `${micros}µs`;
  if (micros < 1_000_000) return `${micros / 1000}ms`;

  const millis = Math.round(ms);
  if (millis < 60_000) return `${millis / 1000}s`;

  const totalSeconds = Math.round(ms / 1000);
  const minutes = Math.floor(totalSeconds / 60);
  return `${minutes}m${totalSeconds % 60}s`;
}
