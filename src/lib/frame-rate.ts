import type { FrameRate } from '@/types/scene';
import { ConfigurationError } from './errors';

export type FrameRateInput = number | string | FrameRate;

/** NTSC rates written as decimals, mapped to their exact fractions */
const NTSC_RATES: ReadonlyArray<[number, FrameRate]> = [
  [23.976, { numerator: 24000, denominator: 1001 }],
  [29.97, { numerator: 30000, denominator: 1001 }],
  [47.952, { numerator: 48000, denominator: 1001 }],
  [59.94, { numerator: 60000, denominator: 1001 }],
  [119.88, { numerator: 120000, denominator: 1001 }],
];

function gcd(a: number, b: number): number {
  let x = Math.abs(a);
  let y = Math.abs(b);
  while (y !== 0) {
    [x, y] = [y, x % y];
  }
  return x;
}

function reduce(numerator: number, denominator: number): FrameRate {
  const divisor = gcd(numerator, denominator);
  return { numerator: numerator / divisor, denominator: denominator / divisor };
}

/**
 * Build an exact frame rate from a number (`30`, `29.97`) or a fraction
 * string (`"30000/1001"`).
 */
export function toFrameRate(value: FrameRateInput): FrameRate {
  if (typeof value === 'object') {
    const { numerator, denominator } = value;
    if (!Number.isInteger(numerator) || !Number.isInteger(denominator) || numerator <= 0 || denominator <= 0) {
      throw new ConfigurationError(`Invalid frame rate ${numerator}/${denominator}`, 'frameRate');
    }
    return reduce(numerator, denominator);
  }

  if (typeof value === 'string') {
    const match = /^\s*(\d+)\s*\/\s*(\d+)\s*$/.exec(value);
    if (match) {
      return toFrameRate({ numerator: Number(match[1]), denominator: Number(match[2]) });
    }
    return toFrameRate(Number(value));
  }

  if (!Number.isFinite(value) || value <= 0) {
    throw new ConfigurationError(`Frame rate must be a positive number, got ${value}`, 'frameRate');
  }
  if (Number.isInteger(value)) {
    return { numerator: value, denominator: 1 };
  }
  for (const [approx, exact] of NTSC_RATES) {
    if (Math.abs(value - approx) < 0.001) return { ...exact };
  }
  const millis = Math.round(value * 1000);
  if (millis === 0) {
    throw new ConfigurationError(`Frame rate ${value} is below the 1/1000 fps resolution`, 'frameRate');
  }
  return reduce(millis, 1000);
}

export function formatFrameRate(rate: FrameRate): string {
  return rate.denominator === 1 ? String(rate.numerator) : `${rate.numerator}/${rate.denominator}`;
}

export function frameRateEquals(a: FrameRate, b: FrameRate): boolean {
  return a.numerator * b.denominator === b.numerator * a.denominator;
}

export function frameRateToNumber(rate: FrameRate): number {
  return rate.numerator / rate.denominator;
}
