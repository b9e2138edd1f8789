/**
 * Date conversions used on the Exposure wire
 */

const pad = (value: number, width = 2) => String(value).padStart(width, '0');

/**
 * `yyyy-MM-dd'T'HH:mm:ss.SSS'Z'` in UTC.
 */
export function toUtcString(date: Date): string {
  return (
    `${pad(date.getUTCFullYear(), 4)}-${pad(date.getUTCMonth() + 1)}-${pad(date.getUTCDate())}` +
    `T${pad(date.getUTCHours())}:${pad(date.getUTCMinutes())}:${pad(date.getUTCSeconds())}` +
    `.${pad(date.getUTCMilliseconds(), 3)}Z`
  );
}

/** Unix epoch time in milliseconds */
export function millisecondsSince1970(date: Date): number {
  return Math.round(date.getTime());
}

/**
 * Date from unix epoch milliseconds. Sub-second precision is dropped.
 */
export function dateFromMilliseconds(milliseconds: number): Date {
  return new Date(Math.trunc(milliseconds / 1000) * 1000);
}
