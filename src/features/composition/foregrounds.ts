/**
 * Foreground factories, one per transparency encoding.
 *
 * A stacked foreground must say how its carrier frame is laid out: the
 * halves cannot be told apart reliably from the pixels, so orientation and
 * order are required rather than guessed.
 */

import type {
  Foreground,
  NativeAlphaCodec,
  StackOrder,
  StackOrientation,
  TransparencyEncoding,
} from '@/types/scene';
import { ConfigurationError } from '@/lib/errors';
import { toFrameRate, type FrameRateInput } from '@/lib/frame-rate';
import {
  requireDuration,
  requireNonNegativeInteger,
  requirePath,
  requirePositiveInteger,
  resolveTrim,
} from './validation';

const SEQUENCE_PATTERN = /%0?\d*d/;
const ORIENTATIONS: readonly StackOrientation[] = ['side-by-side', 'top-bottom'];
const ORDERS: readonly StackOrder[] = ['color-first', 'alpha-first'];
const CODECS: readonly NativeAlphaCodec[] = ['vp9', 'prores', 'other'];

interface MediaOptions {
  width: number;
  height: number;
  frameRate: FrameRateInput;
  duration?: number | null;
  hasAudio?: boolean;
}

export interface NativeAlphaOptions extends MediaOptions {
  codec: NativeAlphaCodec;
}

export interface StackedOptions extends MediaOptions {
  orientation: StackOrientation;
  order: StackOrder;
  /** Size of the whole carrier frame instead of the color picture */
  carrier?: boolean;
}

export interface VideoAndMaskOptions extends MediaOptions {
  maskPath: string;
  /** Audio file used instead of the color video's own track */
  audioPath?: string | null;
}

export interface FrameSequenceOptions extends Omit<MediaOptions, 'hasAudio'> {
  colorPattern: string;
  alphaPattern: string;
  startNumber?: number;
  audioPath?: string | null;
}

function freezeForeground(foreground: Foreground): Foreground {
  if (foreground.encoding.kind === 'frame-sequence') {
    Object.freeze(foreground.encoding.frameRate);
  }
  Object.freeze(foreground.encoding);
  Object.freeze(foreground.frameRate);
  if (foreground.trim) Object.freeze(foreground.trim);
  return Object.freeze(foreground);
}

function mediaFields(
  path: string,
  encoding: TransparencyEncoding,
  options: MediaOptions,
  width: number,
  height: number
): Foreground {
  return {
    path: requirePath(path),
    encoding,
    width: requirePositiveInteger(width, 'width'),
    height: requirePositiveInteger(height, 'height'),
    frameRate: toFrameRate(options.frameRate),
    duration: requireDuration(options.duration),
    hasAudio: options.hasAudio ?? false,
    audioPath: null,
    trim: null,
  };
}

export function nativeAlphaForeground(path: string, options: NativeAlphaOptions): Foreground {
  if (!CODECS.includes(options.codec)) {
    throw new ConfigurationError(`Unknown alpha codec "${options.codec}"`, 'codec');
  }
  return freezeForeground(
    mediaFields(path, { kind: 'native-alpha', codec: options.codec }, options, options.width, options.height)
  );
}

/** VP9 WebM with an alpha plane */
export function webmForeground(path: string, options: MediaOptions): Foreground {
  return nativeAlphaForeground(path, { ...options, codec: 'vp9' });
}

/** ProRes 4444 MOV */
export function proresForeground(path: string, options: MediaOptions): Foreground {
  return nativeAlphaForeground(path, { ...options, codec: 'prores' });
}

export function stackedForeground(path: string, options: StackedOptions): Foreground {
  if (!ORIENTATIONS.includes(options.orientation)) {
    throw new ConfigurationError(
      'A stacked foreground needs an orientation: side-by-side or top-bottom',
      'orientation'
    );
  }
  if (!ORDERS.includes(options.order)) {
    throw new ConfigurationError(
      'A stacked foreground needs an order: color-first or alpha-first',
      'order'
    );
  }

  let { width, height } = options;
  if (options.carrier) {
    const halved = options.orientation === 'side-by-side' ? width : height;
    if (!Number.isInteger(halved) || halved % 2 !== 0) {
      throw new ConfigurationError(
        `A ${options.orientation} carrier frame must split evenly, got ${options.width}x${options.height}`,
        options.orientation === 'side-by-side' ? 'width' : 'height'
      );
    }
    if (options.orientation === 'side-by-side') width /= 2;
    else height /= 2;
  }

  return freezeForeground(
    mediaFields(
      path,
      { kind: 'stacked', orientation: options.orientation, order: options.order },
      options,
      width,
      height
    )
  );
}

export function frameSequenceForeground(options: FrameSequenceOptions): Foreground {
  for (const field of ['colorPattern', 'alphaPattern'] as const) {
    const pattern = requirePath(options[field], field);
    if (!SEQUENCE_PATTERN.test(pattern)) {
      throw new ConfigurationError(
        `${field} "${pattern}" needs a frame number placeholder such as %05d`,
        field
      );
    }
  }
  if (options.colorPattern === options.alphaPattern) {
    throw new ConfigurationError('colorPattern and alphaPattern must differ', 'alphaPattern');
  }

  const frameRate = toFrameRate(options.frameRate);
  const audioPath = options.audioPath ?? null;
  const foreground = mediaFields(
    options.colorPattern,
    {
      kind: 'frame-sequence',
      colorPattern: options.colorPattern,
      alphaPattern: options.alphaPattern,
      frameRate,
      startNumber: requireNonNegativeInteger(options.startNumber ?? 0, 'startNumber'),
    },
    { ...options, hasAudio: audioPath !== null },
    options.width,
    options.height
  );

  return freezeForeground({
    ...foreground,
    audioPath: audioPath === null ? null : requirePath(audioPath, 'audioPath'),
  });
}

/**
 * Color video plus a grayscale mask video, decoded as two inputs and merged
 */
export function videoAndMaskForeground(videoPath: string, options: VideoAndMaskOptions): Foreground {
  const maskPath = requirePath(options.maskPath, 'maskPath');
  if (maskPath === videoPath) {
    throw new ConfigurationError('The mask video must be a different file from the color video', 'maskPath');
  }

  const audioPath = options.audioPath ?? null;
  const foreground = mediaFields(
    videoPath,
    { kind: 'video-and-mask', maskPath },
    { ...options, hasAudio: audioPath !== null || (options.hasAudio ?? false) },
    options.width,
    options.height
  );

  return freezeForeground({
    ...foreground,
    audioPath: audioPath === null ? null : requirePath(audioPath, 'audioPath'),
  });
}

/**
 * Copy of a foreground with only part of it used
 */
export function subclipForeground(foreground: Foreground, start: number, end?: number | null): Foreground {
  return freezeForeground({
    ...foreground,
    trim: resolveTrim(start, end, foreground.duration),
  });
}
