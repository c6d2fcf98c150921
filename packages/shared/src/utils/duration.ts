/**
 * Duration parsing
 * @module @tidewater/shared/utils/duration
 *
 * Accepts Go-style duration strings (`300ms`, `30s`, `5m`, `1h30m`) or a plain
 * number of milliseconds.
 */

const UNIT_MS: Record<string, number> = {
  ms: 1,
  s: 1_000,
  m: 60_000,
  h: 3_600_000,
};

const SEGMENT_PATTERN = /(\d+(?:\.\d+)?)(ms|h|m|s)/y;

/**
 * Parse a duration into milliseconds. Returns null when the input is not a
 * valid duration.
 */
export function parseDuration(input: string | number): number | null {
  if (typeof input === 'number') {
    return Number.isFinite(input) && input >= 0 ? Math.round(input) : null;
  }

  const value = input.trim();
  if (value.length === 0) {
    return null;
  }

  if (/^\d+$/.test(value)) {
    return Number.parseInt(value, 10);
  }

  let total = 0;
  let offset = 0;
  SEGMENT_PATTERN.lastIndex = 0;

  while (offset < value.length) {
    SEGMENT_PATTERN.lastIndex = offset;
    const match = SEGMENT_PATTERN.exec(value);
    if (!match || match[1] === undefined || match[2] === undefined) {
      return null;
    }
    const unit = UNIT_MS[match[2]];
    if (unit === undefined) {
      return null;
    }
    total += Number.parseFloat(match[1]) * unit;
    offset = SEGMENT_PATTERN.lastIndex;
  }

  return Math.round(total);
}

/**
 * Format milliseconds as a compact duration string
 */
export function formatDuration(ms: number): string {
  if (ms < 1_000) {
    return `${ms}ms`;
  }

  const parts: string[] = [];
  let remaining = ms;
  for (const [unit, size] of [['h', 3_600_000], ['m', 60_000], ['s', 1_000]] as const) {
    const count = Math.floor(remaining / size);
    if (count > 0) {
      parts.push(`${count}${unit}`);
      remaining -= count * size;
    }
  }
  if (remaining > 0) {
    parts.push(`${remaining}ms`);
  }
  return parts.join('');
}
