const DATE_RE = /^(\d{4})-(\d{2})-(\d{2})$/;

/** Parses `YYYY-MM-DD` as a UTC midnight; null when the text is not a real calendar date. */
export function parseDate(text: string): number | null {
  const m = DATE_RE.exec(text);
  if (!m) return null;
  const [y, mo, d] = [Number(m[1]), Number(m[2]), Number(m[3])];
  const ms = Date.UTC(y, mo - 1, d);
  const back = new Date(ms);
  if (back.getUTCFullYear() !== y || back.getUTCMonth() !== mo - 1 || back.getUTCDate() !== d) return null;
  return Math.floor(ms / 1000);
}

export function dateToEpochSec(text: string): number {
  const sec = parseDate(text);
  if (sec === null) throw new RangeError(`not a YYYY-MM-DD date: ${text}`);
  return sec;
}

export function dayKey(epochSec: number): string {
  return new Date(epochSec * 1000).toISOString().slice(0, 10);
}

// "2016-05-18 00:00:00"
export function formatTimestamp(epochSec: number): string {
  return new Date(epochSec * 1000).toISOString().slice(0, 19).replace('T', ' ');
}

export function toIso(epochSec: number): string {
  return new Date(epochSec * 1000).toISOString();
}

export function alignDown(epochSec: number, step: number): number {
  return Math.floor(epochSec / step) * step;
}

export function nowSec(): number {
  return Math.floor(Date.now() / 1000);
}
