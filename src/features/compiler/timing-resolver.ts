/**
 * Timing Resolver
 *
 * Canonicalizes start/end/duration into a half-open `[start, end)` window on
 * the output timeline and the overlay enable predicate for it.
 */

import type { TimingDeclaration } from '@/types/scene';
import { ConfigurationError } from '@/lib/errors';
import { formatNumber } from './filter-expression';

export interface TimeWindow {
  start: number;
  /** null: visible until the output ends */
  end: number | null;
  duration: number | null;
  /** null: always true, the overlay gets no enable option */
  enable: string | null;
}

export const UNBOUNDED_TIMING: TimingDeclaration = Object.freeze({
  start: null,
  end: null,
  duration: null,
});

function checkSeconds(value: number | null, field: keyof TimingDeclaration): void {
  if (value === null) return;
  if (!Number.isFinite(value) || value < 0) {
    throw new ConfigurationError(`${field} must be a non-negative number of seconds, got ${value}`, field);
  }
}

/**
 * Enable predicate that is true exactly on `[start, end)`.
 */
export function enablePredicate(start: number, end: number | null): string | null {
  const from = start > 0 ? `gte(t,${formatNumber(start)})` : null;
  const until = end !== null ? `lt(t,${formatNumber(end)})` : null;

  if (from && until) return `${from}*${until}`;
  return from ?? until;
}

/**
 * Derive the missing one of start/end/duration and the enable predicate.
 */
export function resolveTiming(timing: TimingDeclaration): TimeWindow {
  const { start, end, duration } = timing;
  checkSeconds(start, 'start');
  checkSeconds(end, 'end');
  checkSeconds(duration, 'duration');

  if (duration !== null && duration <= 0) {
    throw new ConfigurationError(`duration must be greater than 0, got ${duration}`, 'duration');
  }

  let resolvedStart: number;
  let resolvedEnd: number | null;

  if (start !== null && end !== null && duration !== null) {
    if (start + duration !== end) {
      throw new ConfigurationError(
        `start ${start} + duration ${duration} does not equal end ${end}`,
        'duration'
      );
    }
    resolvedStart = start;
    resolvedEnd = end;
  } else if (start !== null && end !== null) {
    resolvedStart = start;
    resolvedEnd = end;
  } else if (start !== null && duration !== null) {
    resolvedStart = start;
    resolvedEnd = start + duration;
  } else if (end !== null && duration !== null) {
    resolvedStart = end - duration;
    resolvedEnd = end;
    if (resolvedStart < 0) {
      throw new ConfigurationError(
        `end ${end} minus duration ${duration} starts before 0`,
        'start'
      );
    }
  } else if (end !== null) {
    resolvedStart = 0;
    resolvedEnd = end;
  } else if (duration !== null) {
    resolvedStart = 0;
    resolvedEnd = duration;
  } else {
    resolvedStart = start ?? 0;
    resolvedEnd = null;
  }

  if (resolvedEnd !== null && resolvedEnd < resolvedStart) {
    throw new ConfigurationError(`end ${resolvedEnd} is before start ${resolvedStart}`, 'end');
  }

  const resolvedDuration = resolvedEnd === null ? null : duration ?? resolvedEnd - resolvedStart;
  if (resolvedDuration !== null && resolvedDuration <= 0) {
    throw new ConfigurationError(
      `layer window [${resolvedStart}, ${resolvedEnd}) is empty`,
      'duration'
    );
  }

  return {
    start: resolvedStart,
    end: resolvedEnd,
    duration: resolvedDuration,
    enable: enablePredicate(resolvedStart, resolvedEnd),
  };
}
