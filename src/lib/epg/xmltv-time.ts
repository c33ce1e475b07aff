/**
 * XMLTV timestamps: YYYYMMDDHHMMSS followed by a ±HHMM offset,
 * e.g. "20240115183000 +0300"
 */

import type { XmltvTimestamp } from './types';

const XMLTV_TIMESTAMP = /^(\d{4})(\d{2})(\d{2})(\d{2})(\d{2})(\d{2})\s*([+-])(\d{2})(\d{2})$/;

export function parseXmltvTimestamp(value: string | undefined): XmltvTimestamp {
  const match = value === undefined ? null : XMLTV_TIMESTAMP.exec(value.trim());
  if (!match) {
    return { ok: false, reason: 'format' };
  }

  const [year, month, day, hour, minute, second] = match.slice(1, 7).map(Number);
  const sign = match[7] === '-' ? -1 : 1;
  const offsetHours = Number(match[8]);
  const offsetMinutes = Number(match[9]);

  if (
    month < 1 ||
    month > 12 ||
    day < 1 ||
    hour > 23 ||
    minute > 59 ||
    second > 59 ||
    offsetHours > 23 ||
    offsetMinutes > 59
  ) {
    return { ok: false, reason: 'calendar' };
  }

  const utc = Date.UTC(year, month - 1, day, hour, minute, second);
  const check = new Date(utc);
  if (check.getUTCMonth() !== month - 1 || check.getUTCDate() !== day) {
    // Day past the end of the month
    return { ok: false, reason: 'calendar' };
  }

  return {
    ok: true,
    epochMs: utc - sign * (offsetHours * 60 + offsetMinutes) * 60_000,
  };
}
