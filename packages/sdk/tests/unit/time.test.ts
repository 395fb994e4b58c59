/**
 * Unit tests for the unix time codec
 */

import { describe, it, expect } from 'vitest';
import { decodeUnix, encodeUnix, now } from '../../src/time.js';
import { InvalidArgumentError } from '../../src/errors.js';

describe('time codec [unit]', () => {
  it('should truncate sub-second precision', () => {
    expect(encodeUnix(new Date('2024-01-01T00:00:00.999Z'))).toBe(1704067200);
  });

  it('should decode seconds to a date', () => {
    expect(decodeUnix(1704067200).toISOString()).toBe('2024-01-01T00:00:00.000Z');
  });

  it('should lose only sub-second precision on a round trip', () => {
    const original = new Date('2024-06-15T12:34:56.789Z');
    expect(decodeUnix(encodeUnix(original)).toISOString()).toBe('2024-06-15T12:34:56.000Z');
  });

  it('should honour explicit offsets in strings', () => {
    expect(encodeUnix('2024-01-01T01:00:00+01:00', 'America/New_York')).toBe(1704067200);
    expect(encodeUnix('2024-01-01T00:00:00Z', 'Europe/Berlin')).toBe(1704067200);
  });

  it('should read naive strings in the configured zone', () => {
    expect(encodeUnix('2024-01-01T00:00:00', 'UTC')).toBe(1704067200);
    expect(encodeUnix('2024-01-01T00:00:00', 'Europe/Berlin')).toBe(1704063600);
    expect(encodeUnix('2024-07-01 12:00', 'Europe/Berlin')).toBe(1719828000);
  });

  it('should reject unparseable values', () => {
    expect(() => encodeUnix('not a date')).toThrow(InvalidArgumentError);
    expect(() => encodeUnix('2024-01-01T00:00:00', 'Mars/Olympus')).toThrow(InvalidArgumentError);
  });

  it('should return whole seconds from now()', () => {
    expect(now().getMilliseconds()).toBe(0);
  });
});
