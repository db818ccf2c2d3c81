/**
 * Encoder Profile Applier
 *
 * Output codec/container/pixel-format profiles. Each profile is validated
 * and frozen when it is created; the compiler only checks that a scene's
 * alpha requirement fits the profile and asks it for its argument list.
 */

import type {
  AudioCodec,
  Container,
  EncoderProfileData,
  EncoderProfileOptions,
  VideoCodec,
} from '@/types/encoder';
import type { OutputTarget, StreamFormat } from '@/types/program';
import { ConfigurationError } from '@/lib/errors';
import { formatNumber } from './filter-expression';

/** Codecs each container can hold */
const CONTAINER_CODECS: Record<Container, readonly VideoCodec[]> = {
  mp4: ['libx264', 'libx265'],
  mov: ['libx264', 'libx265', 'prores_ks', 'png'],
  webm: ['libvpx-vp9'],
  mkv: ['libx264', 'libx265', 'libvpx-vp9', 'prores_ks', 'png'],
  image2: ['png'],
  y4m: ['rawvideo'],
};

const CONTAINER_AUDIO: Record<Container, readonly AudioCodec[]> = {
  mp4: ['aac'],
  mov: ['aac'],
  webm: ['libopus'],
  mkv: ['aac', 'libopus'],
  image2: [],
  y4m: [],
};

/** Pixel formats with an alpha plane, per codec that can encode one */
const ALPHA_PIXEL_FORMATS: Partial<Record<VideoCodec, readonly string[]>> = {
  'libvpx-vp9': ['yuva420p'],
  prores_ks: ['yuva444p10le'],
  png: ['rgba', 'rgba64be', 'ya8', 'ya16be'],
};

const CRF_RANGE: Partial<Record<VideoCodec, { min: number; max: number }>> = {
  libx264: { min: 0, max: 51 },
  libx265: { min: 0, max: 51 },
  'libvpx-vp9': { min: 0, max: 63 },
};

const X26X_PRESETS = [
  'ultrafast', 'superfast', 'veryfast', 'faster', 'fast',
  'medium', 'slow', 'slower', 'veryslow', 'placebo',
];

const BITRATE = /^\d+(\.\d+)?[kKmM]?$/;
const PIXEL_FORMAT = /^[a-z0-9]+$/;

/** Stream formats and the containers whose codecs they can mux */
const STREAM_CONTAINERS: Record<StreamFormat, readonly Container[]> = {
  webm: ['webm'],
  matroska: ['webm', 'mkv', 'mp4', 'mov'],
  'mp4-fragmented': ['mp4'],
  y4m: ['y4m'],
};

/** Whether a pixel format name has an alpha plane */
export function isAlphaPixelFormat(pixelFormat: string): boolean {
  return /^(yuva|rgba|bgra|argb|abgr|ya\d|gbrap)/.test(pixelFormat);
}

function defaultAudioCodec(container: Container): AudioCodec | null {
  return CONTAINER_AUDIO[container][0] ?? null;
}

function validateOptions(options: EncoderProfileOptions): EncoderProfileData {
  const { container, codec, pixelFormat } = options;

  if (!CONTAINER_CODECS[container].includes(codec)) {
    throw new ConfigurationError(`Container ${container} cannot hold ${codec} video`, 'codec');
  }
  if (!PIXEL_FORMAT.test(pixelFormat)) {
    throw new ConfigurationError(`Invalid pixel format "${pixelFormat}"`, 'pixelFormat');
  }

  const alpha = isAlphaPixelFormat(pixelFormat);
  if (alpha && !(ALPHA_PIXEL_FORMATS[codec] ?? []).includes(pixelFormat)) {
    throw new ConfigurationError(
      `${codec} in ${container} cannot carry alpha pixel format ${pixelFormat}`,
      'pixelFormat'
    );
  }

  const crf = options.crf ?? null;
  if (crf !== null) {
    const range = CRF_RANGE[codec];
    if (!range) {
      throw new ConfigurationError(`${codec} has no crf setting`, 'crf');
    }
    if (!Number.isInteger(crf) || crf < range.min || crf > range.max) {
      throw new ConfigurationError(`crf for ${codec} must be ${range.min}-${range.max}, got ${crf}`, 'crf');
    }
  }

  const bitrate = options.bitrate ?? null;
  if (bitrate !== null) {
    if (crf !== null) {
      throw new ConfigurationError('crf and bitrate cannot both be set', 'bitrate');
    }
    if (!BITRATE.test(bitrate)) {
      throw new ConfigurationError(`Invalid bitrate "${bitrate}"`, 'bitrate');
    }
  }

  const preset = options.preset ?? null;
  if (preset !== null) {
    if (codec !== 'libx264' && codec !== 'libx265') {
      throw new ConfigurationError(`${codec} has no preset setting`, 'preset');
    }
    if (!X26X_PRESETS.includes(preset)) {
      throw new ConfigurationError(`Unknown preset "${preset}"`, 'preset');
    }
  }

  const frameRate = options.frameRate ?? null;
  if (frameRate !== null && (!Number.isFinite(frameRate) || frameRate <= 0)) {
    throw new ConfigurationError(`Output frame rate must be positive, got ${frameRate}`, 'frameRate');
  }

  const audioCodec = options.audioCodec ?? defaultAudioCodec(container);
  if (options.audioCodec !== undefined && !CONTAINER_AUDIO[container].includes(options.audioCodec)) {
    throw new ConfigurationError(
      `Container ${container} cannot hold ${options.audioCodec} audio`,
      'audioCodec'
    );
  }
  const audioBitrate = options.audioBitrate ?? null;
  if (audioBitrate !== null) {
    if (!BITRATE.test(audioBitrate)) {
      throw new ConfigurationError(`Invalid audio bitrate "${audioBitrate}"`, 'audioBitrate');
    }
    if (audioCodec === null) {
      throw new ConfigurationError(`Container ${container} carries no audio`, 'audioBitrate');
    }
  }

  return {
    name: options.name ?? `${container}-${codec}`,
    container,
    codec,
    pixelFormat,
    alpha,
    crf,
    preset,
    bitrate,
    frameRate,
    audioCodec,
    audioBitrate,
    extraArgs: Object.freeze([...(options.extraArgs ?? [])]),
  };
}

export class EncoderProfile {
  readonly name: string;
  readonly container: Container;
  readonly codec: VideoCodec;
  readonly pixelFormat: string;
  readonly alpha: boolean;
  readonly crf: number | null;
  readonly preset: string | null;
  readonly bitrate: string | null;
  readonly frameRate: number | null;
  readonly audioCodec: AudioCodec | null;
  readonly audioBitrate: string | null;
  readonly extraArgs: readonly string[];

  private constructor(data: EncoderProfileData) {
    this.name = data.name;
    this.container = data.container;
    this.codec = data.codec;
    this.pixelFormat = data.pixelFormat;
    this.alpha = data.alpha;
    this.crf = data.crf;
    this.preset = data.preset;
    this.bitrate = data.bitrate;
    this.frameRate = data.frameRate;
    this.audioCodec = data.audioCodec;
    this.audioBitrate = data.audioBitrate;
    this.extraArgs = data.extraArgs;
    Object.freeze(this);
  }

  static custom(options: EncoderProfileOptions): EncoderProfile {
    return new EncoderProfile(validateOptions(options));
  }

  /** H.264 MP4, opaque */
  static h264(overrides: Partial<EncoderProfileOptions> = {}): EncoderProfile {
    return fromDefaults({
      name: 'h264',
      container: 'mp4',
      codec: 'libx264',
      pixelFormat: 'yuv420p',
      crf: 18,
      preset: 'medium',
    }, overrides);
  }

  /** H.265 MP4, tagged hvc1 for Apple players */
  static h265(overrides: Partial<EncoderProfileOptions> = {}): EncoderProfile {
    return fromDefaults({
      name: 'h265',
      container: 'mp4',
      codec: 'libx265',
      pixelFormat: 'yuv420p',
      crf: 28,
      preset: 'medium',
    }, overrides);
  }

  static vp9(overrides: Partial<EncoderProfileOptions> = {}): EncoderProfile {
    return fromDefaults({
      name: 'vp9',
      container: 'webm',
      codec: 'libvpx-vp9',
      pixelFormat: 'yuv420p',
      crf: 32,
    }, overrides);
  }

  /** VP9 WebM with alpha */
  static transparentWebm(overrides: Partial<EncoderProfileOptions> = {}): EncoderProfile {
    return fromDefaults({
      name: 'transparent-webm',
      container: 'webm',
      codec: 'libvpx-vp9',
      pixelFormat: 'yuva420p',
      crf: 28,
    }, overrides);
  }

  /** ProRes 4444 MOV with alpha */
  static prores4444(overrides: Partial<EncoderProfileOptions> = {}): EncoderProfile {
    return fromDefaults({
      name: 'prores-4444',
      container: 'mov',
      codec: 'prores_ks',
      pixelFormat: 'yuva444p10le',
    }, overrides);
  }

  /** Numbered RGBA PNG files; the output path is a pattern such as `frame_%05d.png` */
  static pngSequence(overrides: Partial<EncoderProfileOptions> = {}): EncoderProfile {
    return fromDefaults({
      name: 'png-sequence',
      container: 'image2',
      codec: 'png',
      pixelFormat: 'rgba',
    }, overrides);
  }

  /** Uncompressed YUV4MPEG, for piping into another process */
  static yuv4mpeg(overrides: Partial<EncoderProfileOptions> = {}): EncoderProfile {
    return fromDefaults({
      name: 'yuv4mpeg',
      container: 'y4m',
      codec: 'rawvideo',
      pixelFormat: 'yuv420p',
    }, overrides);
  }

  get carriesAudio(): boolean {
    return this.audioCodec !== null;
  }

  videoArgs(): string[] {
    const args = ['-c:v', this.codec];

    if (this.codec === 'prores_ks') {
      // profile 4 is 4444, the only ProRes profile with alpha
      args.push('-profile:v', this.alpha ? '4' : '3');
    }

    args.push('-pix_fmt', this.pixelFormat);

    if (this.crf !== null) args.push('-crf', String(this.crf));
    if (this.preset !== null) args.push('-preset', this.preset);

    if (this.bitrate !== null) {
      args.push('-b:v', this.bitrate);
    } else if (this.codec === 'libvpx-vp9' && this.crf !== null) {
      // constant quality mode
      args.push('-b:v', '0');
    }

    if (this.codec === 'libvpx-vp9' && this.alpha) {
      args.push('-auto-alt-ref', '0');
    }
    if (this.codec === 'libx265') {
      args.push('-tag:v', 'hvc1');
    }
    if (this.frameRate !== null) {
      args.push('-r', formatNumber(this.frameRate));
    }

    return [...args, ...this.extraArgs];
  }

  audioArgs(): string[] {
    if (this.audioCodec === null) return [];
    const args = ['-c:a', this.audioCodec];
    if (this.audioBitrate !== null) args.push('-b:a', this.audioBitrate);
    return args;
  }

  toJSON(): EncoderProfileData {
    return {
      name: this.name,
      container: this.container,
      codec: this.codec,
      pixelFormat: this.pixelFormat,
      alpha: this.alpha,
      crf: this.crf,
      preset: this.preset,
      bitrate: this.bitrate,
      frameRate: this.frameRate,
      audioCodec: this.audioCodec,
      audioBitrate: this.audioBitrate,
      extraArgs: [...this.extraArgs],
    };
  }
}

/**
 * Preset defaults with caller overrides; an explicit bitrate replaces the default crf.
 */
function fromDefaults(
  defaults: EncoderProfileOptions,
  overrides: Partial<EncoderProfileOptions>
): EncoderProfile {
  const options: EncoderProfileOptions = { ...defaults, ...overrides };
  if (overrides.bitrate !== undefined && overrides.crf === undefined) {
    delete options.crf;
  }
  return EncoderProfile.custom(options);
}

/**
 * Check that a profile can encode a scene and write to the target.
 * Throws instead of dropping alpha.
 */
export function applyEncoderProfile(
  profile: EncoderProfile,
  requiresAlpha: boolean,
  output: OutputTarget
): EncoderProfile {
  if (requiresAlpha && !profile.alpha) {
    throw new ConfigurationError(
      `The scene has a transparent background but profile "${profile.name}" (${profile.codec}, ${profile.pixelFormat}) cannot keep alpha. ` +
        'Use an alpha profile such as transparentWebm(), prores4444() or pngSequence(), or set an opaque background.',
      'encoder'
    );
  }

  if (output.kind === 'pipe' && !STREAM_CONTAINERS[output.format].includes(profile.container)) {
    throw new ConfigurationError(
      `Profile "${profile.name}" (${profile.container}) cannot be streamed as ${output.format}`,
      'output'
    );
  }
  if (output.kind === 'file' && output.path.trim() === '') {
    throw new ConfigurationError('Output path is empty', 'output');
  }

  return profile;
}

export const PROFILE_NAMES = [
  'h264',
  'h265',
  'vp9',
  'transparent-webm',
  'prores-4444',
  'png-sequence',
  'yuv4mpeg',
] as const;

export type ProfileName = (typeof PROFILE_NAMES)[number];

const PROFILE_FACTORIES: Record<ProfileName, (overrides: Partial<EncoderProfileOptions>) => EncoderProfile> = {
  h264: (overrides) => EncoderProfile.h264(overrides),
  h265: (overrides) => EncoderProfile.h265(overrides),
  vp9: (overrides) => EncoderProfile.vp9(overrides),
  'transparent-webm': (overrides) => EncoderProfile.transparentWebm(overrides),
  'prores-4444': (overrides) => EncoderProfile.prores4444(overrides),
  'png-sequence': (overrides) => EncoderProfile.pngSequence(overrides),
  yuv4mpeg: (overrides) => EncoderProfile.yuv4mpeg(overrides),
};

/**
 * Look up a built-in profile by name
 */
export function profileByName(name: ProfileName, overrides: Partial<EncoderProfileOptions> = {}): EncoderProfile {
  return PROFILE_FACTORIES[name](overrides);
}
