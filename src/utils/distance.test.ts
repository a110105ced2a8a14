import { describe, it, expect } from 'vitest';
import { calculateDistance, formatDistance } from './distance.js';

describe('calculateDistance', () => {
  it('should return zero for identical points', () => {
    expect(calculateDistance(40.0, -105.0, 40.0, -105.0)).toBe(0);
  });

  it('should measure along a meridian', () => {
    // 0.045 degrees of latitude
    expect(calculateDistance(40.0, -105.0, 40.045, -105.0)).toBeCloseTo(5.004, 2);
  });

  it('should be symmetric', () => {
    const there = calculateDistance(51.5, -0.12, 48.85, 2.35);
    const back = calculateDistance(48.85, 2.35, 51.5, -0.12);
    expect(there).toBeCloseTo(back, 9);
  });
});

describe('formatDistance', () => {
  it('should use meters below one kilometer', () => {
    expect(formatDistance(0.5)).toBe('500 m');
  });

  it('should use kilometers with two decimals otherwise', () => {
    expect(formatDistance(12.3456)).toBe('12.35 km');
  });

  it('should report missing distances as unknown', () => {
    expect(formatDistance(null)).toBe('Unknown');
    expect(formatDistance(undefined)).toBe('Unknown');
  });
});
