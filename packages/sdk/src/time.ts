import { InvalidArgumentError } from './errors.js';

const NAIVE_DATETIME =
  /^(\d{4})-(\d{2})-(\d{2})(?:[T ](\d{2}):(\d{2})(?::(\d{2})(?:\.\d+)?)?)?$/;

const formatters = new Map<string, Intl.DateTimeFormat>();

function formatterFor(timeZone: string): Intl.DateTimeFormat {
  let formatter = formatters.get(timeZone);
  if (!formatter) {
    try {
      formatter = new Intl.DateTimeFormat('en-US', {
        timeZone,
        hourCycle: 'h23',
        year: 'numeric',
        month: '2-digit',
        day: '2-digit',
        hour: '2-digit',
        minute: '2-digit',
        second: '2-digit',
      });
    } catch (error) {
      throw new InvalidArgumentError(`Unknown time zone '${timeZone}'`, { cause: error });
    }
    formatters.set(timeZone, formatter);
  }
  return formatter;
}

/** Offset of `timeZone` from UTC at the given instant, in milliseconds. */
function zoneOffsetMs(epochMs: number, timeZone: string): number {
  const parts = formatterFor(timeZone).formatToParts(new Date(epochMs));
  const part = (type: Intl.DateTimeFormatPartTypes): number =>
    Number(parts.find((p) => p.type === type)?.value ?? 0);
  const wallAsUtc = Date.UTC(
    part('year'),
    part('month') - 1,
    part('day'),
    part('hour'),
    part('minute'),
    part('second')
  );
  return wallAsUtc - Math.floor(epochMs / 1000) * 1000;
}

function parseNaive(match: RegExpExecArray, timeZone: string): number {
  const [, year, month, day, hour = '0', minute = '0', second = '0'] = match;
  const wall = Date.UTC(
    Number(year),
    Number(month) - 1,
    Number(day),
    Number(hour),
    Number(minute),
    Number(second)
  );
  // Second pass corrects guesses that land on the other side of a DST change.
  const guess = wall - zoneOffsetMs(wall, timeZone);
  return wall - zoneOffsetMs(guess, timeZone);
}

/**
 * Encodes a datetime as unix epoch seconds, truncating sub-second precision.
 * Strings without an offset are wall time in `timeZone`.
 */
export function encodeUnix(value: Date | string, timeZone = 'UTC'): number {
  let epochMs: number;
  if (value instanceof Date) {
    epochMs = value.getTime();
  } else {
    const naive = NAIVE_DATETIME.exec(value.trim());
    epochMs = naive ? parseNaive(naive, timeZone) : Date.parse(value);
  }
  if (Number.isNaN(epochMs)) {
    throw new InvalidArgumentError(`Invalid datetime: ${String(value)}`);
  }
  return Math.floor(epochMs / 1000);
}

export function decodeUnix(seconds: number): Date {
  if (!Number.isFinite(seconds)) {
    throw new InvalidArgumentError(`Invalid unix timestamp: ${seconds}`);
  }
  return new Date(Math.trunc(seconds) * 1000);
}

/** Current time at the precision timestamps are persisted with. */
export function now(): Date {
  return decodeUnix(encodeUnix(new Date()));
}

export function addSeconds(date: Date, seconds: number): Date {
  return new Date(date.getTime() + seconds * 1000);
}
