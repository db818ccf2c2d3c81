/**
 * Process-wide configuration
 *
 * Defaults live in DEFAULTS; the environment may override them once, when the
 * table is first read. Callers override per call through resolveConfig().
 * The resolved table is frozen and never changes during a run.
 *
 * Usage:
 *   import { getConfig, resolveConfig } from '@/lib/config';
 *   const { ffmpegPath } = getConfig();
 *   const config = resolveConfig({ maskThreshold: null });
 */

export type PreferredEncoding = 'auto' | 'native-alpha' | 'stacked' | 'frame-sequence' | 'video-and-mask';
export type ModelSize = 'standard' | 'light';

export interface ScenecastConfig {
  /** ffmpeg executable used by the engine runner */
  ffmpegPath: string;
  /** Frame rate used when nothing in the scene declares one */
  defaultFrameRate: number;
  /** Luminance cut (0-255) that turns mask pictures into binary alpha; null keeps soft edges */
  maskThreshold: number | null;
  /** Engine timeout in milliseconds; 0 disables it */
  engineTimeoutMs: number;
  removal: {
    prefer: PreferredEncoding;
    modelSize: ModelSize;
    acceleration: boolean;
  };
  server: {
    port: number;
    host: string;
    corsOrigins: string[];
  };
}

export type ConfigOverrides = Partial<Omit<ScenecastConfig, 'removal' | 'server'>> & {
  removal?: Partial<ScenecastConfig['removal']>;
  server?: Partial<ScenecastConfig['server']>;
};

export const DEFAULTS: Readonly<ScenecastConfig> = Object.freeze({
  ffmpegPath: 'ffmpeg',
  defaultFrameRate: 30,
  maskThreshold: 128,
  engineTimeoutMs: 0,
  removal: Object.freeze({
    prefer: 'auto' as const,
    modelSize: 'standard' as const,
    acceleration: false,
  }),
  server: Object.freeze({
    port: 3001,
    host: '0.0.0.0',
    corsOrigins: ['http://localhost:5173'],
  }),
});

function getEnvVar(key: string): string | undefined {
  const value = process.env[key];
  return typeof value === 'string' && value.trim() !== '' ? value.trim() : undefined;
}

function getEnvNumber(key: string, defaultValue: number): number {
  const raw = getEnvVar(key);
  if (raw === undefined) return defaultValue;
  const value = Number(raw);
  return Number.isFinite(value) ? value : defaultValue;
}

function getMaskThreshold(defaultValue: number | null): number | null {
  const raw = getEnvVar('SCENECAST_MASK_THRESHOLD');
  if (raw === undefined) return defaultValue;
  if (raw === 'off' || raw === 'none') return null;
  const value = Number(raw);
  return Number.isInteger(value) && value >= 0 && value <= 255 ? value : defaultValue;
}

function isModelSize(value: string | undefined): value is ModelSize {
  return value === 'standard' || value === 'light';
}

export function loadConfigFromEnv(): ScenecastConfig {
  const modelSize = getEnvVar('SCENECAST_REMOVAL_MODEL');
  const corsOrigin = getEnvVar('CORS_ORIGIN');

  return {
    ffmpegPath: getEnvVar('SCENECAST_FFMPEG_PATH') ?? DEFAULTS.ffmpegPath,
    defaultFrameRate: getEnvNumber('SCENECAST_DEFAULT_FPS', DEFAULTS.defaultFrameRate),
    maskThreshold: getMaskThreshold(DEFAULTS.maskThreshold),
    engineTimeoutMs: getEnvNumber('SCENECAST_ENGINE_TIMEOUT_MS', DEFAULTS.engineTimeoutMs),
    removal: {
      ...DEFAULTS.removal,
      modelSize: isModelSize(modelSize) ? modelSize : DEFAULTS.removal.modelSize,
    },
    server: {
      port: getEnvNumber('PORT', DEFAULTS.server.port),
      host: getEnvVar('HOST') ?? DEFAULTS.server.host,
      corsOrigins: corsOrigin
        ? corsOrigin.split(',').map((origin) => origin.trim())
        : [...DEFAULTS.server.corsOrigins],
    },
  };
}

function freezeConfig(config: ScenecastConfig): Readonly<ScenecastConfig> {
  Object.freeze(config.removal);
  Object.freeze(config.server.corsOrigins);
  Object.freeze(config.server);
  return Object.freeze(config);
}

let processConfig: Readonly<ScenecastConfig> | null = null;

/**
 * The process-wide table, read from the environment on first use.
 */
export function getConfig(): Readonly<ScenecastConfig> {
  if (!processConfig) {
    processConfig = freezeConfig(loadConfigFromEnv());
  }
  return processConfig;
}

/**
 * Process-wide table with per-call overrides applied on top.
 */
export function resolveConfig(overrides?: ConfigOverrides): Readonly<ScenecastConfig> {
  const base = getConfig();
  if (!overrides) return base;

  return freezeConfig({
    ...base,
    ...overrides,
    removal: { ...base.removal, ...overrides.removal },
    server: {
      ...base.server,
      ...overrides.server,
      corsOrigins: [...(overrides.server?.corsOrigins ?? base.server.corsOrigins)],
    },
  });
}
