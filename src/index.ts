export type * from './types/scene';
export type * from './types/program';
export type * from './types/encoder';

export { ScenecastError, ConfigurationError, ResolutionError, EngineError, isScenecastError } from './lib/errors';
export type { ErrorKind } from './lib/errors';
export { getConfig, resolveConfig, DEFAULTS } from './lib/config';
export type { ScenecastConfig, ConfigOverrides, PreferredEncoding, ModelSize } from './lib/config';
export { createLogger, Logger, LogLevel } from './lib/logger';
export { toFrameRate, formatFrameRate } from './lib/frame-rate';
export type { FrameRateInput } from './lib/frame-rate';

export { Composition } from './features/composition/composition';
export type { CompositionOptions } from './features/composition/composition';
export { LayerHandle } from './features/composition/layer-handle';
export {
  colorBackground,
  imageBackground,
  videoBackground,
  transparentBackground,
  subclipVideo,
  withVideoAudio,
} from './features/composition/backgrounds';
export {
  nativeAlphaForeground,
  webmForeground,
  proresForeground,
  stackedForeground,
  frameSequenceForeground,
  videoAndMaskForeground,
  subclipForeground,
} from './features/composition/foregrounds';
export {
  foregroundDescriptorSchema,
  foregroundFromDescriptor,
} from './features/composition/foreground-descriptor';
export type { ForegroundDescriptor } from './features/composition/foreground-descriptor';
export {
  sceneDocumentSchema,
  parseSceneDocument,
  compositionFromScene,
} from './features/composition/scene-schema';
export type { SceneDocument, SceneDocumentInput, SceneFromDocument } from './features/composition/scene-schema';

export { compileScene } from './features/compiler/compile';
export { EncoderProfile, PROFILE_NAMES, profileByName } from './features/compiler/encoder-profile';
export type { ProfileName } from './features/compiler/encoder-profile';
export { inspectProgram, toCommandLine } from './features/compiler/program-emitter';
export type { ProgramInspection } from './features/compiler/program-emitter';

export { runProgram, setSpawnFactory } from './features/engine/engine-runner';
export type { EngineResult, RunOptions, SpawnFunction, EngineProcess } from './features/engine/engine-runner';

export {
  removeBackground,
  buildRemovalRequest,
  parseRemovalResponse,
  removalResponseSchema,
} from './features/removal/remove-background';
export type {
  BackgroundRemovalService,
  RemovalOptions,
  RemovalRequest,
} from './features/removal/remove-background';
