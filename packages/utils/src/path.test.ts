import { describe, expect, it } from 'vitest';
import { deriveOutputPath, getBasename } from './path.js';

describe('getBasename', () => {
  it('strips directory and extension', () => {
    expect(getBasename('/videos/holiday.mp4')).toBe('holiday');
  });
});

describe('deriveOutputPath', () => {
  it('places the output beside the input by default', () => {
    expect(deriveOutputPath('/videos/holiday.mp4', 'webm')).toBe('/videos/holiday_converted.webm');
  });

  it('uses the given output directory', () => {
    expect(deriveOutputPath('/videos/holiday.mp4', 'mp4', '/exports')).toBe('/exports/holiday_converted.mp4');
  });
});
