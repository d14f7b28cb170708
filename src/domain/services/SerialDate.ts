import type { DecodedDateTime } from '../model/DecodedDateTime.js';

/** Serial day of 9999-12-31, the last date a spreadsheet can hold. */
export const MAX_SERIAL_DAY = 2958465;

/** The serial day spreadsheets assign to the non-existent 1900-02-29. */
export const PHANTOM_LEAP_DAY = 60;

const MS_PER_DAY = 86_400_000;

// Serials 1-59 count from 1899-12-31. Every serial after the phantom leap day
// is one day further along, so from 61 onwards the effective epoch is 1899-12-30.
const EPOCH_BEFORE_PHANTOM = Date.UTC(1899, 11, 31);
const EPOCH_AFTER_PHANTOM = Date.UTC(1899, 11, 30);

/**
 * Decode a spreadsheet serial day number (`45118`, `45118.75`) into a date.
 *
 * The fractional part is discarded: serials yield dates only. Serial 60 maps
 * to 1900-02-29 exactly as spreadsheets display it. Returns `null` for values
 * that are not numbers or fall outside `1..MAX_SERIAL_DAY`.
 */
export function decodeSerialDate(value: string): DecodedDateTime | null {
  const serial = Number(value.trim());
  if (value.trim() === '' || !Number.isFinite(serial)) return null;

  const days = Math.floor(serial);
  if (days < 1 || days > MAX_SERIAL_DAY) return null;

  if (days === PHANTOM_LEAP_DAY) {
    return { year: 1900, month: 2, day: 29, hour: 0, minute: 0, second: 0, hasTime: false };
  }

  const epoch = days < PHANTOM_LEAP_DAY ? EPOCH_BEFORE_PHANTOM : EPOCH_AFTER_PHANTOM;
  const date = new Date(epoch + days * MS_PER_DAY);

  return {
    year: date.getUTCFullYear(),
    month: date.getUTCMonth() + 1,
    day: date.getUTCDate(),
    hour: 0,
    minute: 0,
    second: 0,
    hasTime: false,
  };
}
