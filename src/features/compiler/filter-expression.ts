/**
 * Helpers for ffmpeg expression strings embedded in filter parameters.
 */

import { ConfigurationError } from '@/lib/errors';

/** Variables the overlay filter defines for its x/y/enable expressions */
export const OVERLAY_VARIABLES: ReadonlySet<string> = new Set([
  'W', 'H', 'w', 'h',
  'main_w', 'main_h', 'overlay_w', 'overlay_h',
  'x', 'y', 'n', 't', 'pos', 'hsub', 'vsub',
  'PI', 'E', 'PHI',
]);

/** Functions of ffmpeg's expression evaluator */
export const EXPRESSION_FUNCTIONS: ReadonlySet<string> = new Set([
  'abs', 'acos', 'asin', 'atan', 'atan2', 'between', 'bitand', 'bitor',
  'ceil', 'clip', 'cos', 'cosh', 'eq', 'exp', 'floor', 'gauss', 'gcd',
  'gt', 'gte', 'hypot', 'if', 'ifnot', 'isinf', 'isnan', 'ld', 'lerp',
  'log', 'lt', 'lte', 'max', 'min', 'mod', 'not', 'pow', 'random', 'root',
  'round', 'sgn', 'sin', 'sinh', 'sqrt', 'squish', 'st', 'tan', 'tanh',
  'trunc', 'while',
]);

const ALLOWED_CHARACTERS = /^[A-Za-z0-9_\s.+\-*/%^(),<>=!]+$/;
const TOKEN = /\d*\.?\d+(?:[eE][+-]?\d+)?|[A-Za-z_][A-Za-z0-9_]*/g;

/**
 * Validate a caller-supplied overlay expression.
 * Every identifier must be an overlay variable, or a known function that is called.
 */
export function validateOverlayExpression(expression: string, field: string): string {
  const trimmed = expression.trim();
  if (trimmed === '') {
    throw new ConfigurationError(`${field} expression is empty`, field);
  }
  if (!ALLOWED_CHARACTERS.test(trimmed)) {
    throw new ConfigurationError(
      `${field} expression "${trimmed}" contains characters that cannot appear in a filter graph`,
      field
    );
  }

  for (const match of trimmed.matchAll(TOKEN)) {
    const token = match[0];
    if (/^[\d.]/.test(token)) continue;

    const rest = trimmed.slice((match.index ?? 0) + token.length).trimStart();
    const called = rest.startsWith('(');

    if (called) {
      if (!EXPRESSION_FUNCTIONS.has(token)) {
        throw new ConfigurationError(`${field} expression calls unknown function "${token}"`, field);
      }
    } else if (!OVERLAY_VARIABLES.has(token)) {
      throw new ConfigurationError(
        `${field} expression references "${token}", which is not defined for overlay positions`,
        field
      );
    }
  }

  return trimmed;
}

/**
 * Render a number for a filter parameter without float noise or exponents.
 */
export function formatNumber(value: number): string {
  const rounded = Math.round(value * 1e6) / 1e6;
  return Object.is(rounded, -0) ? '0' : String(rounded);
}

/**
 * `base+dx` / `base-dx`, or just `base` for a zero offset
 */
export function withOffset(base: string, offset: number): string {
  if (offset === 0) return base;
  return offset > 0 ? `${base}+${formatNumber(offset)}` : `${base}-${formatNumber(-offset)}`;
}

/**
 * Quote an expression for use as an option value inside a filter graph.
 */
export function quoteExpression(expression: string): string {
  return `'${expression}'`;
}
