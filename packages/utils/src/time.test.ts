import { describe, expect, it } from 'vitest';
import { formatBytes, formatClock, formatDuration, parseTimecode } from './time.js';

describe('parseTimecode', () => {
  it('treats the fractional part as hundredths of a second', () => {
    expect(parseTimecode('00:01:23.45')).toBe(83450);
    expect(parseTimecode('00:02:00.00')).toBe(120000);
  });

  it('handles hours', () => {
    expect(parseTimecode('01:00:00.01')).toBe(3600010);
  });

  it('returns null for non-timecodes', () => {
    expect(parseTimecode('N/A')).toBeNull();
    expect(parseTimecode('00:01:23')).toBeNull();
    expect(parseTimecode('')).toBeNull();
  });
});

describe('formatClock', () => {
  it('uses MM:SS below an hour', () => {
    expect(formatClock(83450)).toBe('01:23');
  });

  it('adds hours past an hour', () => {
    expect(formatClock(3723000)).toBe('01:02:03');
  });

  it('renders placeholders for invalid input', () => {
    expect(formatClock(-1)).toBe('--:--');
    expect(formatClock(Infinity)).toBe('--:--');
  });
});

describe('formatDuration', () => {
  it('formats sub-second, minute and hour durations', () => {
    expect(formatDuration(500)).toBe('500ms');
    expect(formatDuration(65000)).toBe('1m 5s');
    expect(formatDuration(3725000)).toBe('1h 2m 5s');
  });
});

describe('formatBytes', () => {
  it('scales to the largest whole unit', () => {
    expect(formatBytes(0)).toBe('0 B');
    expect(formatBytes(1024)).toBe('1.00 KB');
    expect(formatBytes(4000000)).toBe('3.81 MB');
  });
});
