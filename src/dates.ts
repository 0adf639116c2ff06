// Seat Posture Server - Calendar date helpers (UTC, YYYY-MM-DD)

const DAY_MS = 24 * 60 * 60 * 1000;
const DATE_KEY = /^(\d{4})-(\d{2})-(\d{2})$/;

/** Epoch ms of midnight UTC for a YYYY-MM-DD key, or null when it is not a real date. */
export function parseDateKey(key: string): number | null {
  const match = DATE_KEY.exec(key);
  if (!match) return null;
  const [, y, m, d] = match;
  const ms = Date.UTC(Number(y), Number(m) - 1, Number(d));
  return toDateKey(ms) === key ? ms : null;
}

export function toDateKey(timestampMs: number): string {
  return new Date(timestampMs).toISOString().slice(0, 10);
}

export function isDateKey(value: string): boolean {
  return parseDateKey(value) !== null;
}

/** [start, end) in epoch ms covering the whole UTC day. */
export function dayBounds(key: string): [number, number] | null {
  const start = parseDateKey(key);
  return start === null ? null : [start, start + DAY_MS];
}

/** The date key `days` days before `key`. */
export function shiftDateKey(key: string, days: number): string {
  const start = parseDateKey(key);
  if (start === null) throw new Error(`Invalid date: ${key}`);
  return toDateKey(start + days * DAY_MS);
}
