// ISO-8601 parsing for date_threshold conditions. Accepted forms, all UTC:
//   2024-03-01
//   2024-03-01T12:30:00
//   2024-03-01T12:30:00.123456
// with any trailing "Z" stripped. Offsets such as "+02:00" are not accepted.

const ISO_RE = /^(\d{4})-(\d{1,2})-(\d{1,2})(?:T(\d{1,2}):(\d{1,2}):(\d{1,2})(?:\.(\d{1,6}))?)?$/;

export const MS_PER_DAY = 86_400_000;

export function parseIsoTimestamp(ts: string): Date | null {
  const m = ISO_RE.exec(ts.replace(/Z+$/, ""));
  if (!m) return null;
  const part = (i: number): number => Number(m[i] ?? 0);
  const [year, month, day, hour, minute, second] = [part(1), part(2), part(3), part(4), part(5), part(6)];
  const micros = Number((m[7] ?? "").padEnd(6, "0"));
  if (month < 1 || month > 12 || hour > 23 || minute > 59 || second > 59) return null;

  const d = new Date(Date.UTC(year, month - 1, day, hour, minute, second, Math.floor(micros / 1000)));
  // Date.UTC rolls 2024-02-30 over into March; reject instead.
  if (d.getUTCFullYear() !== year || d.getUTCMonth() !== month - 1 || d.getUTCDate() !== day) return null;
  return d;
}

export function ageInDays(value: Date, reference: Date): number {
  return (reference.getTime() - value.getTime()) / MS_PER_DAY;
}
