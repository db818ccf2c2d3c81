/**
 * Error taxonomy
 *
 * - ConfigurationError: an invalid declaration (timing, size mode, stacked
 *   layout, encoder pairing). Raised where the value is declared whenever
 *   possible, otherwise during the build. No program is produced.
 * - ResolutionError: the build cannot settle an implicit value (canvas size).
 * - EngineError: ffmpeg exited non-zero. Carries its stderr verbatim.
 */

export type ErrorKind = 'configuration' | 'resolution' | 'engine';

export class ScenecastError extends Error {
  constructor(
    message: string,
    public readonly kind: ErrorKind
  ) {
    super(message);
    this.name = 'ScenecastError';
  }
}

export class ConfigurationError extends ScenecastError {
  constructor(
    message: string,
    public readonly field?: string
  ) {
    super(message, 'configuration');
    this.name = 'ConfigurationError';
  }
}

export class ResolutionError extends ScenecastError {
  constructor(message: string) {
    super(message, 'resolution');
    this.name = 'ResolutionError';
  }
}

export class EngineError extends ScenecastError {
  constructor(
    message: string,
    public readonly exitCode: number | null,
    public readonly stderr: string,
    public readonly signal: NodeJS.Signals | null = null
  ) {
    super(message, 'engine');
    this.name = 'EngineError';
  }
}

export function isScenecastError(error: unknown): error is ScenecastError {
  return error instanceof ScenecastError;
}
