import { DecodeErrorCode, errorCell } from './cell-value';
import type { CellValue, DateTimeKind } from './cell-value';
import type { DateEpoch } from './types';

export const MS_PER_DAY = 86_400_000;

const EPOCH_1900_BASE = Date.UTC(1899, 11, 30);
const EPOCH_1904_BASE = Date.UTC(1904, 0, 1);

/** Days between the 1900 and 1904 epochs. */
export const EPOCH_1904_OFFSET = 1462;

/** Serial of 9999-12-31 + 1 under the 1900 epoch. */
const MAX_SERIAL_1900 = 2_958_466;
const MAX_SERIAL_1904 = MAX_SERIAL_1900 - EPOCH_1904_OFFSET;

/**
 * Converts a date serial to epoch milliseconds, or `null` when the serial
 * falls outside the representable calendar range.
 *
 * Serials below 60 under the 1900 epoch are moved one day forward: the
 * epoch counts a 1900-02-29 that never existed, so serial 60 and 59 both
 * land on 1900-02-28.
 */
export function serialToEpochMs(serial: number, epoch: DateEpoch): number | null {
  if (!Number.isFinite(serial) || serial < 0) return null;
  if (epoch === 1904) {
    if (serial >= MAX_SERIAL_1904) return null;
    return EPOCH_1904_BASE + Math.round(serial * MS_PER_DAY);
  }
  if (serial >= MAX_SERIAL_1900) return null;
  const days = serial >= 60 ? serial : serial + 1;
  return EPOCH_1900_BASE + Math.round(days * MS_PER_DAY);
}

export function serialToDateCell(serial: number, epoch: DateEpoch, kind: DateTimeKind): CellValue {
  const ms = serialToEpochMs(serial, epoch);
  if (ms === null) {
    return errorCell(DecodeErrorCode.DateRange, `serial ${serial} is outside the ${epoch} date range`);
  }
  return { type: 'datetime', value: new Date(ms), kind, serial };
}

export function serialToDurationCell(serial: number): CellValue {
  if (!Number.isFinite(serial)) {
    return errorCell(DecodeErrorCode.DateRange, `duration ${serial} is not finite`);
  }
  return { type: 'duration', milliseconds: Math.round(serial * MS_PER_DAY), serial };
}

const ISO_DATE = /^(-?\d{4,})-(\d{2})-(\d{2})(?:T(\d{2}):(\d{2})(?::(\d{2})(\.\d+)?)?)?(Z|[+-]\d{2}:?\d{2})?$/;

/**
 * Parses the ISO-8601 dates found in `t="d"` cells and `office:date-value`.
 * Values without an offset are read as UTC wall-clock time.
 */
export function isoToDateCell(text: string): CellValue {
  const match = ISO_DATE.exec(text.trim());
  if (!match) {
    return errorCell(DecodeErrorCode.Malformed, `"${text}" is not an ISO date`);
  }
  const [, year, month, day, hour, minute, second, fraction, offset] = match;
  const ms = Date.UTC(
    Number(year),
    Number(month) - 1,
    Number(day),
    Number(hour ?? 0),
    Number(minute ?? 0),
    Number(second ?? 0),
    fraction === undefined ? 0 : Math.round(Number(fraction) * 1000),
  );
  const shifted = ms - parseOffsetMinutes(offset) * 60_000;
  if (Number.isNaN(shifted)) {
    return errorCell(DecodeErrorCode.DateRange, `"${text}" is outside the date range`);
  }
  return { type: 'datetime', value: new Date(shifted), kind: hour === undefined ? 'date' : 'datetime', serial: null };
}

function parseOffsetMinutes(offset: string | undefined): number {
  if (offset === undefined || offset === 'Z') return 0;
  const digits = offset.replace(':', '');
  const sign = digits.startsWith('-') ? -1 : 1;
  return sign * (Number(digits.slice(1, 3)) * 60 + Number(digits.slice(3, 5)));
}

const ISO_DURATION = /^(-)?P(?:(\d+(?:\.\d+)?)D)?(?:T(?:(\d+(?:\.\d+)?)H)?(?:(\d+(?:\.\d+)?)M)?(?:(\d+(?:\.\d+)?)S)?)?$/;

/** Parses `office:time-value` durations such as `PT36H15M00S`. */
export function isoToDurationCell(text: string): CellValue {
  const match = ISO_DURATION.exec(text.trim());
  if (!match || text.trim() === 'P' || text.trim() === 'PT') {
    return errorCell(DecodeErrorCode.Malformed, `"${text}" is not an ISO duration`);
  }
  const [, negative, days, hours, minutes, seconds] = match;
  const total =
    Number(days ?? 0) * MS_PER_DAY +
    Number(hours ?? 0) * 3_600_000 +
    Number(minutes ?? 0) * 60_000 +
    Number(seconds ?? 0) * 1000;
  return { type: 'duration', milliseconds: Math.round(negative ? -total : total), serial: null };
}
