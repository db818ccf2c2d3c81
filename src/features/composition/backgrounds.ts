/**
 * Background factories. Every background is validated and frozen here.
 */

import type {
  AudioSettings,
  ColorBackground,
  ImageBackground,
  TransparentBackground,
  VideoBackground,
} from '@/types/scene';
import { ConfigurationError } from '@/lib/errors';
import { toFrameRate, type FrameRateInput } from '@/lib/frame-rate';
import {
  requireDuration,
  requirePath,
  requirePositiveInteger,
  resolveAudio,
  resolveTrim,
} from './validation';

const HEX_COLOR = /^#([0-9A-Fa-f]{6}|[0-9A-Fa-f]{8})$/;
const NAMED_COLOR = /^[A-Za-z]+(@(0|1|0?\.\d+|1\.0+))?$/;

export interface ImageBackgroundOptions {
  width: number;
  height: number;
  frameRate?: FrameRateInput;
}

export interface VideoBackgroundOptions {
  width: number;
  height: number;
  frameRate: FrameRateInput;
  duration?: number | null;
  hasAudio?: boolean;
  audio?: Partial<AudioSettings>;
}

export function isColor(value: string): boolean {
  return HEX_COLOR.test(value) || NAMED_COLOR.test(value);
}

/**
 * Whether a valid color is less than fully opaque (`#RRGGBBAA` with AA below
 * ff, or `name@alpha` with alpha below 1)
 */
export function colorHasAlpha(color: string): boolean {
  if (HEX_COLOR.test(color)) {
    return color.length === 9 && color.slice(7).toLowerCase() !== 'ff';
  }
  const at = color.indexOf('@');
  return at !== -1 && Number(color.slice(at + 1)) < 1;
}

export function colorBackground(color: string): ColorBackground {
  if (typeof color !== 'string' || !isColor(color)) {
    throw new ConfigurationError(
      `Invalid color "${color}": use #RRGGBB, #RRGGBBAA or a color name`,
      'color'
    );
  }
  return Object.freeze({ kind: 'color', color });
}

export function imageBackground(path: string, options: ImageBackgroundOptions): ImageBackground {
  return Object.freeze({
    kind: 'image',
    path: requirePath(path),
    width: requirePositiveInteger(options.width, 'width'),
    height: requirePositiveInteger(options.height, 'height'),
    frameRate: options.frameRate === undefined ? null : Object.freeze(toFrameRate(options.frameRate)),
  });
}

export function videoBackground(path: string, options: VideoBackgroundOptions): VideoBackground {
  return Object.freeze({
    kind: 'video',
    path: requirePath(path),
    width: requirePositiveInteger(options.width, 'width'),
    height: requirePositiveInteger(options.height, 'height'),
    frameRate: Object.freeze(toFrameRate(options.frameRate)),
    duration: requireDuration(options.duration),
    hasAudio: options.hasAudio ?? false,
    audio: Object.freeze(resolveAudio(options.audio)),
    trim: null,
  });
}

export function transparentBackground(): TransparentBackground {
  return Object.freeze({ kind: 'transparent' });
}

/**
 * Copy of a video with only part of it used
 */
export function subclipVideo(video: VideoBackground, start: number, end?: number | null): VideoBackground {
  return Object.freeze({
    ...video,
    trim: Object.freeze(resolveTrim(start, end, video.duration)),
  });
}

/**
 * Copy of a video with different audio settings
 */
export function withVideoAudio(video: VideoBackground, audio: Partial<AudioSettings>): VideoBackground {
  return Object.freeze({
    ...video,
    audio: Object.freeze(resolveAudio(audio, video.audio)),
  });
}
