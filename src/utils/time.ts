export function parseTime(timeStr: string | number): number {
  if (typeof timeStr === 'number') return timeStr;

  const units: Record<string, number> = {
    'ms': 1, 's': 1000, 'm': 60 * 1000, 'h': 60 * 60 * 1000
  };

  const match = timeStr.match(/^(\d+(?:\.\d+)?)(ms|s|m|h)$/);
  if (!match) throw new Error(`Invalid time format: ${timeStr}`);

  const [, value, unit] = match;
  return parseFloat(value) * units[unit];
}

/**
 * Parses a test duration. Bare numbers are seconds, anything else goes
 * through {@link parseTime}. Returns milliseconds.
 */
export function parseDuration(value: string | number): number {
  if (typeof value === 'number') return value * 1000;
  if (/^\d+(?:\.\d+)?$/.test(value)) return parseFloat(value) * 1000;
  return parseTime(value);
}
