/**
 * Scene Documents
 *
 * JSON form of a composition plus its encoder and output. Documents are
 * checked with zod, then replayed through the regular builder, so a scene
 * written as JSON compiles exactly like the same scene written in code.
 */

import { z } from 'zod';
import type { Anchor, Background, TimingDeclaration, VideoBackground } from '@/types/scene';
import type { OutputTarget } from '@/types/program';
import type { ConfigOverrides } from '@/lib/config';
import { ANCHORS } from '@/features/compiler/geometry-resolver';
import {
  EncoderProfile,
  PROFILE_NAMES,
  profileByName,
} from '@/features/compiler/encoder-profile';
import {
  colorBackground,
  imageBackground,
  subclipVideo,
  transparentBackground,
  videoBackground,
} from './backgrounds';
import { Composition } from './composition';
import {
  foregroundDescriptorSchema,
  foregroundFromDescriptor,
  frameRateSchema,
  trimSchema,
} from './foreground-descriptor';

// ============================================================================
// Sources
// ============================================================================

const dimension = z.number().int('Must be an integer').positive('Must be positive');

const audioSchema = z.object({
  enabled: z.boolean().optional(),
  volume: z.number().min(0).max(1).optional(),
});

const videoSchema = z.object({
  path: z.string().min(1),
  width: dimension,
  height: dimension,
  frameRate: frameRateSchema,
  duration: z.number().positive().nullable().optional(),
  hasAudio: z.boolean().optional(),
  audio: audioSchema.optional(),
  trim: trimSchema.optional(),
});

const backgroundSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('color'), color: z.string().min(1) }),
  z.object({
    kind: z.literal('image'),
    path: z.string().min(1),
    width: dimension,
    height: dimension,
    frameRate: frameRateSchema.optional(),
  }),
  videoSchema.extend({ kind: z.literal('video') }),
  z.object({ kind: z.literal('transparent') }),
]);

// ============================================================================
// Layers
// ============================================================================

const anchorSchema = z.custom<Anchor>(
  (value) => typeof value === 'string' && ANCHORS.some((anchor) => anchor === value),
  { message: `Anchor must be one of: ${ANCHORS.join(', ')}` }
);

const positionSchema = z.union([
  z.object({
    anchor: anchorSchema,
    dx: z.number().int().optional(),
    dy: z.number().int().optional(),
  }),
  z.object({
    x: z.union([z.string().min(1), z.number()]),
    y: z.union([z.string().min(1), z.number()]),
  }),
]);

const sizeSchema = z.discriminatedUnion('mode', [
  z.object({ mode: z.literal('contain') }),
  z.object({ mode: z.literal('cover') }),
  z.object({ mode: z.literal('fixed-pixels'), width: dimension, height: dimension }),
  z.object({ mode: z.literal('canvas-percentage'), percent: z.number().gt(0).max(100) }),
  z.object({ mode: z.literal('scale'), factor: z.number().positive() }),
  z.object({ mode: z.literal('fit-width') }),
  z.object({ mode: z.literal('fit-height') }),
]);

const cropSchema = z.object({
  x: z.number().int().min(0),
  y: z.number().int().min(0),
  width: dimension,
  height: dimension,
});

const seconds = z.number().min(0).nullable().optional();

const layerSchema = z.object({
  name: z.string().min(1).optional(),
  source: z.union([
    z.object({ foreground: foregroundDescriptorSchema }),
    z.object({ video: videoSchema }),
  ]),
  position: positionSchema.optional(),
  size: sizeSchema.optional(),
  opacity: z.number().min(0).max(1).optional(),
  rotation: z.number().optional(),
  crop: cropSchema.optional(),
  alpha: z.boolean().optional(),
  start: seconds,
  end: seconds,
  duration: seconds,
  audio: audioSchema.optional(),
  trim: trimSchema.optional(),
});

// ============================================================================
// Encoder & output
// ============================================================================

const encoderOverridesSchema = z.object({
  crf: z.number().int().optional(),
  preset: z.string().optional(),
  bitrate: z.string().optional(),
  frameRate: z.number().positive().optional(),
  audioCodec: z.enum(['aac', 'libopus']).optional(),
  audioBitrate: z.string().optional(),
  extraArgs: z.array(z.string()).optional(),
});

const encoderSchema = z.union([
  z.enum(PROFILE_NAMES),
  encoderOverridesSchema.extend({ profile: z.enum(PROFILE_NAMES) }),
  encoderOverridesSchema.extend({
    name: z.string().optional(),
    container: z.enum(['mp4', 'mov', 'webm', 'mkv', 'image2', 'y4m']),
    codec: z.enum(['libx264', 'libx265', 'libvpx-vp9', 'prores_ks', 'png', 'rawvideo']),
    pixelFormat: z.string().min(1),
  }),
]);

const outputSchema = z.union([
  z.object({ path: z.string().min(1) }),
  z.object({ stream: z.enum(['webm', 'matroska', 'mp4-fragmented', 'y4m']) }),
]);

export const sceneDocumentSchema = z.object({
  canvas: z
    .object({
      width: dimension,
      height: dimension,
      frameRate: frameRateSchema.optional(),
    })
    .optional(),
  duration: z.number().positive().nullable().optional(),
  background: backgroundSchema.optional(),
  layers: z.array(layerSchema).default([]),
  encoder: encoderSchema,
  output: outputSchema,
  options: z
    .object({
      maskThreshold: z.number().int().min(0).max(255).nullable().optional(),
      defaultFrameRate: z.number().positive().optional(),
    })
    .optional(),
});

export type SceneDocument = z.infer<typeof sceneDocumentSchema>;
export type SceneDocumentInput = z.input<typeof sceneDocumentSchema>;

export interface SceneFromDocument {
  composition: Composition;
  profile: EncoderProfile;
  output: OutputTarget;
  overrides: ConfigOverrides;
}

function videoFromDocument(video: z.infer<typeof videoSchema>): VideoBackground {
  const source = videoBackground(video.path, video);
  return video.trim ? subclipVideo(source, video.trim.start, video.trim.end) : source;
}

function backgroundFromDocument(background: z.infer<typeof backgroundSchema>): Background {
  switch (background.kind) {
    case 'color':
      return colorBackground(background.color);
    case 'image':
      return imageBackground(background.path, background);
    case 'video':
      return videoFromDocument(background);
    case 'transparent':
      return transparentBackground();
  }
}

function profileFromDocument(encoder: SceneDocument['encoder']): EncoderProfile {
  if (typeof encoder === 'string') return profileByName(encoder);
  if ('profile' in encoder) {
    const { profile, ...overrides } = encoder;
    return profileByName(profile, overrides);
  }
  return EncoderProfile.custom(encoder);
}

function outputFromDocument(output: SceneDocument['output']): OutputTarget {
  return 'path' in output ? { kind: 'file', path: output.path } : { kind: 'pipe', format: output.stream };
}

function overridesFromDocument(options: SceneDocument['options']): ConfigOverrides {
  const overrides: ConfigOverrides = {};
  if (options?.maskThreshold !== undefined) overrides.maskThreshold = options.maskThreshold;
  if (options?.defaultFrameRate !== undefined) overrides.defaultFrameRate = options.defaultFrameRate;
  return overrides;
}

/**
 * Validate raw JSON; throws a ZodError listing every problem
 */
export function parseSceneDocument(input: unknown): SceneDocument {
  return sceneDocumentSchema.parse(input);
}

/**
 * Build the composition, encoder profile and output target a document describes
 */
export function compositionFromScene(document: SceneDocument): SceneFromDocument {
  const overrides = overridesFromDocument(document.options);
  const composition = new Composition();

  if (document.canvas) {
    const { width, height, frameRate } = document.canvas;
    composition.setCanvas(width, height, frameRate ?? overrides.defaultFrameRate);
  }
  if (document.duration !== undefined) composition.setDuration(document.duration);
  if (document.background) composition.setBackground(backgroundFromDocument(document.background));

  for (const layer of document.layers) {
    const source =
      'foreground' in layer.source
        ? foregroundFromDescriptor(layer.source.foreground)
        : videoFromDocument(layer.source.video);
    const handle = composition.add(source, layer.name);

    if (layer.position) {
      if ('anchor' in layer.position) {
        handle.at(layer.position.anchor, layer.position.dx ?? 0, layer.position.dy ?? 0);
      } else {
        handle.xy(layer.position.x, layer.position.y);
      }
    }
    if (layer.size) handle.size(layer.size);
    if (layer.opacity !== undefined) handle.opacity(layer.opacity);
    if (layer.rotation !== undefined) handle.rotate(layer.rotation);
    if (layer.crop) handle.crop(layer.crop.x, layer.crop.y, layer.crop.width, layer.crop.height);
    if (layer.alpha !== undefined) handle.alpha(layer.alpha);
    const timing: TimingDeclaration = {
      start: layer.start ?? null,
      end: layer.end ?? null,
      duration: layer.duration ?? null,
    };
    if (timing.start !== null || timing.end !== null || timing.duration !== null) {
      handle.timing(timing);
    }
    if (layer.audio) handle.audio(layer.audio);
    if (layer.trim) handle.subclip(layer.trim.start, layer.trim.end);
  }

  return {
    composition,
    profile: profileFromDocument(document.encoder),
    output: outputFromDocument(document.output),
    overrides,
  };
}
