/**
 * Date extraction for telemetry records.
 *
 * Dates are opaque strings: no parsing, no timezone handling.
 *
 * @module ingest/date
 */

/**
 * Day a record belongs to.
 *
 * `date` is used verbatim when present; otherwise the part of `date_time`
 * before its first space. Returns an empty string when neither field is a
 * string.
 *
 * @example
 * ```typescript
 * extractDate({ date_time: '2024-01-03 08:15:00' }); // '2024-01-03'
 * ```
 */
export function extractDate(record: Readonly<Record<string, unknown>>): string {
  if ('date' in record) {
    const date = record.date;
    return typeof date === 'string' ? date : '';
  }

  const dateTime = record.date_time;
  if (typeof dateTime === 'string') {
    const space = dateTime.indexOf(' ');
    return space === -1 ? dateTime : dateTime.slice(0, space);
  }

  return '';
}
