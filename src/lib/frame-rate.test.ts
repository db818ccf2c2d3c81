import { describe, expect, it } from 'vitest';
import { ConfigurationError } from './errors';
import { formatFrameRate, frameRateEquals, frameRateToNumber, toFrameRate } from './frame-rate';

describe('toFrameRate', () => {
  it('keeps integer rates as whole fractions', () => {
    expect(toFrameRate(25)).toEqual({ numerator: 25, denominator: 1 });
  });

  it('maps NTSC decimals to their exact fractions', () => {
    expect(toFrameRate(29.97)).toEqual({ numerator: 30000, denominator: 1001 });
    expect(toFrameRate(23.976)).toEqual({ numerator: 24000, denominator: 1001 });
  });

  it('parses and reduces fraction strings', () => {
    expect(toFrameRate('60/2')).toEqual({ numerator: 30, denominator: 1 });
    expect(toFrameRate(' 30000 / 1001 ')).toEqual({ numerator: 30000, denominator: 1001 });
  });

  it('parses decimal strings', () => {
    expect(toFrameRate('12.5')).toEqual({ numerator: 25, denominator: 2 });
  });

  it('rejects zero, negative and malformed rates', () => {
    expect(() => toFrameRate(0)).toThrow(ConfigurationError);
    expect(() => toFrameRate(-30)).toThrow(ConfigurationError);
    expect(() => toFrameRate('fast')).toThrow(ConfigurationError);
    expect(() => toFrameRate({ numerator: 30, denominator: 0 })).toThrow('Invalid frame rate 30/0');
  });

  it('rejects positive rates that round to zero', () => {
    expect(() => toFrameRate(0.0004)).toThrow('Frame rate 0.0004 is below the 1/1000 fps resolution');
    expect(() => toFrameRate('0.0004')).toThrow(ConfigurationError);
    expect(toFrameRate(0.001)).toEqual({ numerator: 1, denominator: 1000 });
  });
});

describe('formatFrameRate', () => {
  it('omits a denominator of one', () => {
    expect(formatFrameRate({ numerator: 30, denominator: 1 })).toBe('30');
    expect(formatFrameRate({ numerator: 30000, denominator: 1001 })).toBe('30000/1001');
  });
});

describe('frameRateEquals', () => {
  it('compares by value', () => {
    expect(frameRateEquals({ numerator: 60, denominator: 2 }, { numerator: 30, denominator: 1 })).toBe(true);
    expect(frameRateEquals({ numerator: 30000, denominator: 1001 }, { numerator: 30, denominator: 1 })).toBe(false);
  });
});

describe('frameRateToNumber', () => {
  it('divides', () => {
    expect(frameRateToNumber({ numerator: 25, denominator: 2 })).toBe(12.5);
  });
});
