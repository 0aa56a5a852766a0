// Canonical text formats used when converting to and from strings.

const INTEGER_RE = /^[+-]?\d+$/;
const FLOAT_RE = /^[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?$/;
const DATE_RE =
  /^(\d{4})-(\d{2})-(\d{2})(?:T(\d{2}):(\d{2})(?::(\d{2})(?:\.\d{1,3})?)?(Z|[+-]\d{2}:\d{2})?)?$/;

export function parseInteger(s: string): number | undefined {
  if (!INTEGER_RE.test(s)) return undefined;
  const n = Number(s);
  return Number.isSafeInteger(n) ? n : undefined;
}

export function parseFloatStrict(s: string): number | undefined {
  if (!FLOAT_RE.test(s)) return undefined;
  const n = Number(s);
  return Number.isFinite(n) ? n : undefined;
}

export function parseBoolean(s: string): boolean | undefined {
  const t = s.toLowerCase();
  if (t === "true") return true;
  if (t === "false") return false;
  return undefined;
}

/**
 * ISO-8601 calendar date, optionally with a time. A time without a zone
 * is read as UTC.
 */
export function parseIsoDate(s: string): Date | undefined {
  const m = DATE_RE.exec(s);
  if (!m) return undefined;

  const [, y, mo, d, hh, mm, ss, zone] = m;
  const year = Number(y);
  const month = Number(mo);
  const day = Number(d);

  const probe = new Date(Date.UTC(year, month - 1, day));
  if (
    probe.getUTCFullYear() !== year ||
    probe.getUTCMonth() !== month - 1 ||
    probe.getUTCDate() !== day
  ) {
    return undefined;
  }

  if (hh === undefined) return probe;

  if (Number(hh) > 23 || Number(mm) > 59 || (ss !== undefined && Number(ss) > 59)) {
    return undefined;
  }

  const parsed = new Date(zone === undefined ? `${s}Z` : s);
  return Number.isNaN(parsed.valueOf()) ? undefined : parsed;
}

/**
 * Dates at UTC midnight render as YYYY-MM-DD, everything else as full ISO-8601.
 */
export function formatDate(d: Date): string {
  const iso = d.toISOString();
  return iso.endsWith("T00:00:00.000Z") ? iso.slice(0, 10) : iso;
}

export function formatValue(v: string | number | boolean | Date): string {
  if (v instanceof Date) return formatDate(v);
  return String(v);
}
