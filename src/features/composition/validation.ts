import type { AudioSettings, SourceTrim } from '@/types/scene';
import { ConfigurationError } from '@/lib/errors';

export function requirePositiveInteger(value: number, field: string): number {
  if (!Number.isInteger(value) || value <= 0) {
    throw new ConfigurationError(`${field} must be a positive integer, got ${value}`, field);
  }
  return value;
}

export function requireNonNegativeInteger(value: number, field: string): number {
  if (!Number.isInteger(value) || value < 0) {
    throw new ConfigurationError(`${field} must be a non-negative integer, got ${value}`, field);
  }
  return value;
}

export function requirePath(path: string, field = 'path'): string {
  if (typeof path !== 'string' || path.trim() === '') {
    throw new ConfigurationError(`${field} must be a non-empty path`, field);
  }
  return path;
}

export function requireDuration(value: number | null | undefined, field = 'duration'): number | null {
  if (value === null || value === undefined) return null;
  if (!Number.isFinite(value) || value <= 0) {
    throw new ConfigurationError(`${field} must be a positive number of seconds, got ${value}`, field);
  }
  return value;
}

export function resolveAudio(
  settings: Partial<AudioSettings> | undefined,
  base: AudioSettings = { enabled: true, volume: 1 }
): AudioSettings {
  const audio: AudioSettings = { ...base, ...settings };
  if (!Number.isFinite(audio.volume) || audio.volume < 0 || audio.volume > 1) {
    throw new ConfigurationError(`volume must be between 0 and 1, got ${audio.volume}`, 'volume');
  }
  return audio;
}

/**
 * Validate a source trim against the source's duration, when known.
 */
export function resolveTrim(start: number, end: number | null | undefined, sourceDuration: number | null): SourceTrim {
  if (!Number.isFinite(start) || start < 0) {
    throw new ConfigurationError(`subclip start must be a non-negative number, got ${start}`, 'trim');
  }
  const trimEnd = end ?? null;
  if (trimEnd !== null && (!Number.isFinite(trimEnd) || trimEnd <= start)) {
    throw new ConfigurationError(`subclip end ${trimEnd} must be after start ${start}`, 'trim');
  }
  if (sourceDuration !== null) {
    if (start >= sourceDuration) {
      throw new ConfigurationError(
        `subclip start ${start} is past the end of a ${sourceDuration}s source`,
        'trim'
      );
    }
    if (trimEnd !== null && trimEnd > sourceDuration) {
      throw new ConfigurationError(
        `subclip end ${trimEnd} is past the end of a ${sourceDuration}s source`,
        'trim'
      );
    }
  }
  return { start, end: trimEnd };
}
