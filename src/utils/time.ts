/**
 * Time helpers: lookback durations and the timestamp format used in
 * both sinks (`YYYY-MM-DD HH:MM:SS`, UTC).
 */

const DURATION_PATTERN = /^(\d+(?:\.\d+)?)\s*(s|m|h|d|w)$/i;

const UNIT_MS: Record<string, number> = {
  s: 1000,
  m: 60 * 1000,
  h: 60 * 60 * 1000,
  d: 24 * 60 * 60 * 1000,
  w: 7 * 24 * 60 * 60 * 1000,
};

/**
 * Parse a lookback duration into milliseconds.
 * A bare number is read as hours.
 *
 * @example parseDuration('24h') => 86400000
 * @example parseDuration(1.5)   => 5400000
 */
export function parseDuration(input: string | number): number {
  if (typeof input === 'number') {
    if (!Number.isFinite(input) || input <= 0) {
      throw new Error(`Invalid duration: ${input} (must be a positive number of hours)`);
    }
    return Math.round(input * UNIT_MS.h);
  }

  const trimmed = input.trim();
  if (/^\d+(?:\.\d+)?$/.test(trimmed)) {
    return parseDuration(Number(trimmed));
  }

  const match = DURATION_PATTERN.exec(trimmed);
  if (!match) {
    throw new Error(`Invalid duration: "${input}" (expected e.g. 90m, 24h, 7d)`);
  }

  const ms = Math.round(Number(match[1]) * UNIT_MS[match[2].toLowerCase()]);
  if (ms <= 0) {
    throw new Error(`Invalid duration: "${input}" (must be positive)`);
  }
  return ms;
}

/**
 * Human-readable form of a duration, largest whole unit first.
 */
export function formatDuration(ms: number): string {
  for (const unit of ['w', 'd', 'h', 'm'] as const) {
    if (ms % UNIT_MS[unit] === 0) return `${ms / UNIT_MS[unit]}${unit}`;
  }
  return `${ms / 1000}s`;
}

function pad(n: number): string {
  return String(n).padStart(2, '0');
}

export function formatDateTime(date: Date): string {
  return (
    `${date.getUTCFullYear()}-${pad(date.getUTCMonth() + 1)}-${pad(date.getUTCDate())} ` +
    `${pad(date.getUTCHours())}:${pad(date.getUTCMinutes())}:${pad(date.getUTCSeconds())}`
  );
}

export function formatDate(date: Date): string {
  return `${date.getUTCFullYear()}-${pad(date.getUTCMonth() + 1)}-${pad(date.getUTCDate())}`;
}

export function fromEpochSeconds(seconds: number): Date {
  return new Date(seconds * 1000);
}

export function toEpochSeconds(date: Date): number {
  return Math.floor(date.getTime() / 1000);
}
