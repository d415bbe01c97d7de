const DATE_ONLY = /^\d{4}-\d{2}-\d{2}$/;
const HAS_ZONE = /(?:[zZ]|[+-]\d{2}:?\d{2})$/;

/**
 * Parse a timestamp into epoch ms, reading zone-less values as UTC.
 *
 * Accepts ISO strings with or without zone, a space instead of `T`, and
 * date-only values (UTC midnight). Returns undefined for anything else.
 */
export function parseTimestamp(value: string | null | undefined): number | undefined {
  if (!value) return undefined;
  let s = value.trim();
  if (!s) return undefined;

  if (DATE_ONLY.test(s)) s = `${s}T00:00:00Z`;
  else {
    s = s.replace(' ', 'T');
    if (!s.includes('T')) return undefined;
    if (!HAS_ZONE.test(s)) s = `${s}Z`;
  }

  const ms = Date.parse(s);
  return Number.isFinite(ms) ? ms : undefined;
}

/** `a > b` when both parse; undefined when either is unknown. */
export function isStrictlyAfter(a: string | null | undefined, b: string | null | undefined): boolean | undefined {
  const ta = parseTimestamp(a);
  const tb = parseTimestamp(b);
  if (ta === undefined || tb === undefined) return undefined;
  return ta > tb;
}

/** Latest of the given timestamps, as given; unparsable values are ignored. */
export function latest(...values: Array<string | null | undefined>): string | undefined {
  let best: { raw: string; ms: number } | undefined;
  for (const raw of values) {
    const ms = parseTimestamp(raw);
    if (raw && ms !== undefined && (!best || ms > best.ms)) best = { raw, ms };
  }
  return best?.raw;
}
