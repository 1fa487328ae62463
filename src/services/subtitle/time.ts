/** HH:MM:SS,mmm (hours may run past two digits) */
export const TIMESTAMP_PATTERN = /^(\d{2,}):([0-5]\d):([0-5]\d),(\d{3})$/;

/**
 * Timing line: `start --> end`, optionally followed by position coordinates
 * (`X1:40 X2:600 Y1:20 Y2:50`), which are kept verbatim.
 */
export const TIMING_LINE_PATTERN = /^(\d{2,}:\d{2}:\d{2},\d{3})[ \t]+-->[ \t]+(\d{2,}:\d{2}:\d{2},\d{3})(?:[ \t].*)?$/;

export const isValidTimestamp = (timeStr: string): boolean => TIMESTAMP_PATTERN.test(timeStr);

/**
 * Parses HH:MM:SS,mmm to milliseconds
 */
export const parseTimestamp = (timeStr: string): number => {
  const match = timeStr.match(TIMESTAMP_PATTERN);
  if (!match) {
    throw new RangeError(`Not an SRT timestamp: "${timeStr}"`);
  }
  const [, h, m, s, ms] = match;
  return (
    parseInt(h, 10) * 3_600_000 + parseInt(m, 10) * 60_000 + parseInt(s, 10) * 1000 + parseInt(ms, 10)
  );
};

/**
 * Formats milliseconds to HH:MM:SS,mmm
 */
export const formatTimestamp = (totalMs: number): string => {
  const clamped = Math.max(0, Math.round(totalMs));
  const h = Math.floor(clamped / 3_600_000);
  const m = Math.floor((clamped % 3_600_000) / 60_000);
  const s = Math.floor((clamped % 60_000) / 1000);
  const ms = clamped % 1000;
  return `${h.toString().padStart(2, '0')}:${m.toString().padStart(2, '0')}:${s.toString().padStart(2, '0')},${ms.toString().padStart(3, '0')}`;
};

/**
 * Splits a timing line into its start and end timestamps, or null when it does not match
 */
export const parseTimingLine = (line: string): { start: string; end: string } | null => {
  const match = line.trim().match(TIMING_LINE_PATTERN);
  if (!match) return null;
  const [, start, end] = match;
  if (!isValidTimestamp(start) || !isValidTimestamp(end)) return null;
  return { start, end };
};
