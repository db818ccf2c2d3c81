/**
 * Scene model types: what a caller declares before compilation.
 */

/**
 * Frame rate as an exact fraction (30000/1001 rather than 29.97)
 */
export interface FrameRate {
  numerator: number;
  denominator: number;
}

export interface Canvas {
  width: number;
  height: number;
  frameRate: FrameRate;
}

/**
 * Source trim: which part of the source media is used.
 * `end` null means until the source ends.
 */
export interface SourceTrim {
  start: number;
  end: number | null;
}

export interface AudioSettings {
  enabled: boolean;
  /** Linear gain, 0..1 */
  volume: number;
}

// ============================================================================
// Backgrounds
// ============================================================================

export interface ColorBackground {
  kind: 'color';
  /** `#RRGGBB`, `#RRGGBBAA` or an ffmpeg color name */
  color: string;
}

export interface ImageBackground {
  kind: 'image';
  path: string;
  width: number;
  height: number;
  frameRate: FrameRate | null;
}

export interface VideoBackground {
  kind: 'video';
  path: string;
  width: number;
  height: number;
  frameRate: FrameRate;
  duration: number | null;
  hasAudio: boolean;
  audio: AudioSettings;
  trim: SourceTrim | null;
}

export interface TransparentBackground {
  kind: 'transparent';
}

export type Background =
  | ColorBackground
  | ImageBackground
  | VideoBackground
  | TransparentBackground;

// ============================================================================
// Foregrounds
// ============================================================================

export type NativeAlphaCodec = 'vp9' | 'prores' | 'other';
export type StackOrientation = 'side-by-side' | 'top-bottom';
export type StackOrder = 'color-first' | 'alpha-first';

export interface NativeAlphaEncoding {
  kind: 'native-alpha';
  codec: NativeAlphaCodec;
}

/** Color and alpha share one carrier frame */
export interface StackedEncoding {
  kind: 'stacked';
  orientation: StackOrientation;
  order: StackOrder;
}

/** Color and alpha are two parallel still-image sequences */
export interface FrameSequenceEncoding {
  kind: 'frame-sequence';
  colorPattern: string;
  alphaPattern: string;
  frameRate: FrameRate;
  startNumber: number;
}

/** Color video plus a separate grayscale mask video of the same size and rate */
export interface VideoAndMaskEncoding {
  kind: 'video-and-mask';
  maskPath: string;
}

export type TransparencyEncoding =
  | NativeAlphaEncoding
  | StackedEncoding
  | FrameSequenceEncoding
  | VideoAndMaskEncoding;

export interface Foreground {
  /** Carrier file for native-alpha and stacked encodings, color video or color pattern otherwise */
  path: string;
  encoding: TransparencyEncoding;
  /** Size of the color picture (half the carrier for stacked encodings) */
  width: number;
  height: number;
  frameRate: FrameRate;
  duration: number | null;
  hasAudio: boolean;
  /** Separate audio track for frame sequences and video-and-mask pairs */
  audioPath: string | null;
  trim: SourceTrim | null;
}

// ============================================================================
// Layers
// ============================================================================

export type Anchor =
  | 'top-left'
  | 'top-center'
  | 'top-right'
  | 'center-left'
  | 'center'
  | 'center-right'
  | 'bottom-left'
  | 'bottom-center'
  | 'bottom-right';

export type Position =
  | { kind: 'anchor'; anchor: Anchor; dx: number; dy: number }
  | { kind: 'expression'; x: string; y: string };

export type SizeMode =
  | { mode: 'contain' }
  | { mode: 'cover' }
  | { mode: 'fixed-pixels'; width: number; height: number }
  | { mode: 'canvas-percentage'; percent: number }
  | { mode: 'scale'; factor: number }
  | { mode: 'fit-width' }
  | { mode: 'fit-height' };

export interface CropRect {
  x: number;
  y: number;
  width: number;
  height: number;
}

/** At most two of the three are set */
export interface TimingDeclaration {
  start: number | null;
  end: number | null;
  duration: number | null;
}

export type LayerSource =
  | { kind: 'foreground'; foreground: Foreground }
  | { kind: 'video'; video: VideoBackground };

export interface LayerState {
  id: string;
  source: LayerSource;
  position: Position;
  size: SizeMode;
  opacity: number;
  rotation: number;
  crop: CropRect | null;
  /** False flattens the source to opaque RGB and ignores its transparency */
  alpha: boolean;
  timing: TimingDeclaration;
  audio: AudioSettings;
  trim: SourceTrim | null;
}

/**
 * Read-only copy of a composition taken at the start of a build
 */
export interface SceneSnapshot {
  canvas: Canvas | null;
  duration: number | null;
  background: Background;
  /** True when no background was set and the transparent default applies */
  backgroundImplicit: boolean;
  layers: readonly LayerState[];
}
