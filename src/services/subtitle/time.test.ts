import { describe, expect, it } from 'vitest';
import { formatTimestamp, parseTimestamp, parseTimingLine } from './time';

describe('parseTimestamp', () => {
  it('converts HH:MM:SS,mmm to milliseconds', () => {
    expect(parseTimestamp('00:00:01,500')).toBe(1500);
    expect(parseTimestamp('01:02:03,004')).toBe(3_723_004);
    expect(parseTimestamp('100:00:00,000')).toBe(360_000_000);
  });

  it('rejects malformed timestamps', () => {
    expect(() => parseTimestamp('00:00:01.500')).toThrow(RangeError);
    expect(() => parseTimestamp('00:61:00,000')).toThrow(RangeError);
    expect(() => parseTimestamp('0:00:01,000')).toThrow(RangeError);
  });
});

describe('formatTimestamp', () => {
  it('pads every field', () => {
    expect(formatTimestamp(3_723_004)).toBe('01:02:03,004');
    expect(formatTimestamp(0)).toBe('00:00:00,000');
  });

  it('clamps negative values to zero', () => {
    expect(formatTimestamp(-20)).toBe('00:00:00,000');
  });
});

describe('parseTimingLine', () => {
  it('returns start and end', () => {
    expect(parseTimingLine('00:00:01,000 --> 00:00:02,500')).toEqual({
      start: '00:00:01,000',
      end: '00:00:02,500',
    });
  });

  it('accepts trailing position coordinates', () => {
    expect(parseTimingLine('00:00:01,000 --> 00:00:02,500 X1:40 X2:600 Y1:20 Y2:50')).toEqual({
      start: '00:00:01,000',
      end: '00:00:02,500',
    });
  });

  it('returns null for lines that are not timings', () => {
    expect(parseTimingLine('00:00:01,000 -> 00:00:02,500')).toBeNull();
    expect(parseTimingLine('00:00:01,000 --> 00:00:62,500')).toBeNull();
    expect(parseTimingLine('Hello there')).toBeNull();
  });
});
