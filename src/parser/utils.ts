const TimestampRegex =
  /^(\d{4}-\d{2}-\d{2})[ T](\d{2}:\d{2}:\d{2})(?:[,.](\d+))?(Z|[+-]\d{2}:?\d{2})?$/i;

/**
 * Parse the log timestamp formats seen from the balancer and the container runtime.
 *
 * Accepts "2026-02-05 02:57:29,093", "2026-02-05 02:57:29",
 * "2026-02-05T02:57:29.093456789Z" and offsets like "+02:00".
 * Timestamps without a zone are read as UTC. Returns undefined when unreadable.
 */
export function parseTimestamp(ts: string | undefined): Date | undefined {
  if (!ts) return undefined;

  const match = ts.trim().match(TimestampRegex);
  if (!match) return undefined;

  const [, datePart, timePart, fraction, zone] = match;
  const ms = (fraction ?? '').padEnd(3, '0').slice(0, 3);
  let offset = 'Z';
  if (zone && zone.toUpperCase() !== 'Z') {
    offset = zone.includes(':') ? zone : `${zone.slice(0, 3)}:${zone.slice(3)}`;
  }

  const date = new Date(`${datePart}T${timePart}.${ms}${offset}`);
  return isNaN(date.getTime()) ? undefined : date;
}

/**
 * Canonical form of a guest reference for comparisons
 */
export function normalizeGuestRef(ref: string): string {
  return ref.trim().replace(/^['"]|['"]$/g, '').toLowerCase();
}

/**
 * Numeric VMID behind a reference such as "100", "vm100", "ct-101" or "qemu/100"
 */
export function guestNumericId(ref: string): number | undefined {
  const match = normalizeGuestRef(ref).match(/^(?:vm|ct|lxc|qemu)?[-_/ ]?(\d+)$/);
  if (!match) return undefined;
  return parseInt(match[1], 10);
}

/**
 * Whether two references name the same guest (by name or by VMID)
 */
export function isSameGuest(a: string, b: string): boolean {
  if (!a || !b) return false;
  if (normalizeGuestRef(a) === normalizeGuestRef(b)) return true;
  const idA = guestNumericId(a);
  return idA !== undefined && idA === guestNumericId(b);
}

/**
 * Coerce a JSON value to a finite number, or null
 */
export function toFiniteNumber(value: unknown): number | null {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : null;
  }
  if (typeof value === 'string' && value.trim() !== '') {
    const n = Number(value);
    return Number.isFinite(n) ? n : null;
  }
  return null;
}

/**
 * Epoch milliseconds truncated to the minute
 */
export function roundToMinute(date: Date): number {
  return Math.floor(date.getTime() / 60000) * 60000;
}

/**
 * Narrow unknown JSON to a plain object
 */
export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
