const DAYS = ['Sun', 'Mon', 'Tue', 'Wed', 'Thu', 'Fri', 'Sat'];
const MONTHS = ['Jan', 'Feb', 'Mar', 'Apr', 'May', 'Jun', 'Jul', 'Aug', 'Sep', 'Oct', 'Nov', 'Dec'];

const offsetFormatters = new Map<string, Intl.DateTimeFormat>();

function offsetFormatter(timeZone: string): Intl.DateTimeFormat {
  let fmt = offsetFormatters.get(timeZone);
  if (!fmt) {
    // Throws RangeError for unknown zones.
    fmt = new Intl.DateTimeFormat('en-US', { timeZone, timeZoneName: 'longOffset' });
    offsetFormatters.set(timeZone, fmt);
  }
  return fmt;
}

/** UTC offset of `timeZone` at instant `at`, in minutes (east positive). */
export function timezoneOffsetMinutes(timeZone: string, at: Date): number {
  const part = offsetFormatter(timeZone)
    .formatToParts(at)
    .find((p) => p.type === 'timeZoneName');
  const m = /^GMT(?:([+-])(\d{1,2})(?::(\d{2}))?)?$/.exec(part?.value ?? 'GMT');
  if (!m || !m[1]) return 0;
  const minutes = Number(m[2]) * 60 + Number(m[3] ?? 0);
  return m[1] === '-' ? -minutes : minutes;
}

function pad2(n: number): string {
  return String(n).padStart(2, '0');
}

/** Wall-clock fields for `at` shifted by `offsetMinutes`, read through UTC getters. */
function shifted(at: Date, offsetMinutes: number): Date {
  return new Date(at.getTime() + offsetMinutes * 60_000);
}

function formatOffset(offsetMinutes: number): string {
  const sign = offsetMinutes < 0 ? '-' : '+';
  const abs = Math.abs(offsetMinutes);
  return `${sign}${pad2(Math.floor(abs / 60))}${pad2(abs % 60)}`;
}

/** RFC 1123 with numeric zone, e.g. "Mon, 19 Oct 2026 17:30:00 +0530". */
export function formatRfc1123Z(at: Date, timeZone: string): string {
  const offset = timezoneOffsetMinutes(timeZone, at);
  const d = shifted(at, offset);
  return (
    `${DAYS[d.getUTCDay()]}, ${pad2(d.getUTCDate())} ${MONTHS[d.getUTCMonth()]} ${d.getUTCFullYear()} ` +
    `${pad2(d.getUTCHours())}:${pad2(d.getUTCMinutes())}:${pad2(d.getUTCSeconds())} ${formatOffset(offset)}`
  );
}

/** Short local label for forecasts, e.g. "14:00, Mon". */
export function formatHourAndDay(at: Date, timeZone: string): string {
  const d = shifted(at, timezoneOffsetMinutes(timeZone, at));
  return `${pad2(d.getUTCHours())}:${pad2(d.getUTCMinutes())}, ${DAYS[d.getUTCDay()]}`;
}

export function formatIsoDate(at: Date): string {
  return at.toISOString().slice(0, 10);
}
