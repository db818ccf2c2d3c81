import { z } from 'zod';
import type { Foreground } from '@/types/scene';
import {
  frameSequenceForeground,
  nativeAlphaForeground,
  stackedForeground,
  subclipForeground,
  videoAndMaskForeground,
} from './foregrounds';

/**
 * Frame rate as a number (`30`, `29.97`) or a fraction string (`"30000/1001"`)
 */
export const frameRateSchema = z.union([
  z.number().positive('Frame rate must be positive'),
  z.string().regex(/^\s*\d+(\.\d+)?\s*(\/\s*\d+\s*)?$/, 'Frame rate must look like 30, 29.97 or 30000/1001'),
]);

export const trimSchema = z.object({
  start: z.number().min(0),
  end: z.number().positive().nullable().optional(),
});

const dimension = z.number().int('Must be an integer').positive('Must be positive');

const mediaFields = {
  width: dimension,
  height: dimension,
  frameRate: frameRateSchema,
  duration: z.number().positive().nullable().optional(),
  trim: trimSchema.optional(),
};

/**
 * Description of a transparent foreground as delivered by a removal service
 * or written in a scene document
 */
export const foregroundDescriptorSchema = z.discriminatedUnion('encoding', [
  z.object({
    encoding: z.literal('native-alpha'),
    path: z.string().min(1),
    codec: z.enum(['vp9', 'prores', 'other']),
    hasAudio: z.boolean().optional(),
    ...mediaFields,
  }),
  z.object({
    encoding: z.literal('stacked'),
    path: z.string().min(1),
    orientation: z.enum(['side-by-side', 'top-bottom']),
    order: z.enum(['color-first', 'alpha-first']),
    /** width/height describe the whole carrier frame */
    carrier: z.boolean().optional(),
    hasAudio: z.boolean().optional(),
    ...mediaFields,
  }),
  z.object({
    encoding: z.literal('frame-sequence'),
    colorPattern: z.string().min(1),
    alphaPattern: z.string().min(1),
    startNumber: z.number().int().min(0).optional(),
    audioPath: z.string().min(1).nullable().optional(),
    ...mediaFields,
  }),
  z.object({
    encoding: z.literal('video-and-mask'),
    path: z.string().min(1),
    maskPath: z.string().min(1),
    audioPath: z.string().min(1).nullable().optional(),
    hasAudio: z.boolean().optional(),
    ...mediaFields,
  }),
]);

export type ForegroundDescriptor = z.infer<typeof foregroundDescriptorSchema>;

function buildForeground(descriptor: ForegroundDescriptor): Foreground {
  switch (descriptor.encoding) {
    case 'native-alpha':
      return nativeAlphaForeground(descriptor.path, descriptor);
    case 'stacked':
      return stackedForeground(descriptor.path, descriptor);
    case 'frame-sequence':
      return frameSequenceForeground(descriptor);
    case 'video-and-mask':
      return videoAndMaskForeground(descriptor.path, descriptor);
  }
}

/**
 * Build a Foreground through the regular factories, so descriptors get the
 * same validation as code
 */
export function foregroundFromDescriptor(descriptor: ForegroundDescriptor): Foreground {
  const foreground = buildForeground(descriptor);
  return descriptor.trim
    ? subclipForeground(foreground, descriptor.trim.start, descriptor.trim.end)
    : foreground;
}
