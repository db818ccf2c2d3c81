import { describe, expect, it } from 'vitest';
import { ConfigurationError } from '@/lib/errors';
import {
  frameSequenceForeground,
  nativeAlphaForeground,
  proresForeground,
  stackedForeground,
  subclipForeground,
  videoAndMaskForeground,
  webmForeground,
  type StackedOptions,
} from './foregrounds';

const media = { width: 1280, height: 720, frameRate: 30 };

describe('native alpha foregrounds', () => {
  it('records the codec and media facts', () => {
    const foreground = webmForeground('talent.webm', { ...media, duration: 12, hasAudio: true });
    expect(foreground).toEqual({
      path: 'talent.webm',
      encoding: { kind: 'native-alpha', codec: 'vp9' },
      width: 1280,
      height: 720,
      frameRate: { numerator: 30, denominator: 1 },
      duration: 12,
      hasAudio: true,
      audioPath: null,
      trim: null,
    });
    expect(proresForeground('talent.mov', media).encoding).toEqual({ kind: 'native-alpha', codec: 'prores' });
  });

  it('is frozen', () => {
    const foreground = webmForeground('talent.webm', media);
    expect(Object.isFrozen(foreground)).toBe(true);
    expect(Object.isFrozen(foreground.encoding)).toBe(true);
    expect(Object.isFrozen(foreground.frameRate)).toBe(true);
  });

  it('rejects bad media facts', () => {
    expect(() => webmForeground('', media)).toThrow('path must be a non-empty path');
    expect(() => webmForeground('talent.webm', { ...media, width: 0 })).toThrow('width must be a positive integer, got 0');
    expect(() => webmForeground('talent.webm', { ...media, duration: -2 })).toThrow(ConfigurationError);
    expect(() => nativeAlphaForeground('talent.webm', { ...media, frameRate: 0, codec: 'vp9' })).toThrow(
      ConfigurationError
    );
  });
});

describe('stackedForeground', () => {
  const layout: StackedOptions = { ...media, orientation: 'side-by-side', order: 'color-first' };

  it('requires an orientation', () => {
    const options: StackedOptions = { ...layout };
    Reflect.deleteProperty(options, 'orientation');
    expect(() => stackedForeground('stacked.mp4', options)).toThrow(
      'A stacked foreground needs an orientation: side-by-side or top-bottom'
    );
  });

  it('requires an order', () => {
    const options: StackedOptions = { ...layout };
    Reflect.deleteProperty(options, 'order');
    expect(() => stackedForeground('stacked.mp4', options)).toThrow(
      'A stacked foreground needs an order: color-first or alpha-first'
    );
  });

  it('halves a carrier frame along the stacking axis', () => {
    const sideBySide = stackedForeground('stacked.mp4', { ...layout, width: 2560, carrier: true });
    expect([sideBySide.width, sideBySide.height]).toEqual([1280, 720]);

    const topBottom = stackedForeground('stacked.mp4', {
      ...layout,
      orientation: 'top-bottom',
      height: 1440,
      carrier: true,
    });
    expect([topBottom.width, topBottom.height]).toEqual([1280, 720]);
  });

  it('rejects carriers that do not split evenly', () => {
    expect(() => stackedForeground('stacked.mp4', { ...layout, width: 1281, carrier: true })).toThrow(
      'A side-by-side carrier frame must split evenly, got 1281x720'
    );
  });
});

describe('frameSequenceForeground', () => {
  const sequence = {
    colorPattern: 'color/%05d.png',
    alphaPattern: 'alpha/%05d.png',
    frameRate: 24,
    width: 1080,
    height: 1920,
  };

  it('keeps both patterns and defaults to frame 0 without audio', () => {
    const foreground = frameSequenceForeground(sequence);
    expect(foreground.path).toBe('color/%05d.png');
    expect(foreground.encoding).toEqual({
      kind: 'frame-sequence',
      colorPattern: 'color/%05d.png',
      alphaPattern: 'alpha/%05d.png',
      frameRate: { numerator: 24, denominator: 1 },
      startNumber: 0,
    });
    expect(foreground.hasAudio).toBe(false);
    expect(foreground.audioPath).toBeNull();
  });

  it('marks a separate audio track', () => {
    const foreground = frameSequenceForeground({ ...sequence, audioPath: 'voice.wav' });
    expect(foreground.hasAudio).toBe(true);
    expect(foreground.audioPath).toBe('voice.wav');
  });

  it('needs a frame number placeholder in each pattern', () => {
    expect(() => frameSequenceForeground({ ...sequence, colorPattern: 'color.png' })).toThrow(
      'colorPattern "color.png" needs a frame number placeholder such as %05d'
    );
  });

  it('needs distinct patterns', () => {
    expect(() => frameSequenceForeground({ ...sequence, alphaPattern: 'color/%05d.png' })).toThrow(
      'colorPattern and alphaPattern must differ'
    );
  });

  it('rejects a negative start number', () => {
    expect(() => frameSequenceForeground({ ...sequence, startNumber: -1 })).toThrow(
      'startNumber must be a non-negative integer, got -1'
    );
  });
});

describe('video-and-mask foregrounds', () => {
  it('records the mask and the separate audio file', () => {
    const foreground = videoAndMaskForeground('talent.mp4', {
      ...media,
      maskPath: 'talent_mask.mp4',
      audioPath: 'voice.wav',
    });
    expect(foreground.encoding).toEqual({ kind: 'video-and-mask', maskPath: 'talent_mask.mp4' });
    expect(foreground.path).toBe('talent.mp4');
    expect(foreground.audioPath).toBe('voice.wav');
    expect(foreground.hasAudio).toBe(true);
    expect(Object.isFrozen(foreground.encoding)).toBe(true);
  });

  it('uses the color video audio flag without an audio file', () => {
    const foreground = videoAndMaskForeground('talent.mp4', { ...media, maskPath: 'talent_mask.mp4' });
    expect(foreground.hasAudio).toBe(false);
    expect(foreground.audioPath).toBeNull();
  });

  it('needs a separate mask file', () => {
    expect(() => videoAndMaskForeground('talent.mp4', { ...media, maskPath: '' })).toThrow(
      'maskPath must be a non-empty path'
    );
    expect(() => videoAndMaskForeground('talent.mp4', { ...media, maskPath: 'talent.mp4' })).toThrow(
      ConfigurationError
    );
  });
});

describe('subclipForeground', () => {
  const foreground = webmForeground('talent.webm', { ...media, duration: 10 });

  it('returns a trimmed copy', () => {
    const clip = subclipForeground(foreground, 2, 6);
    expect(clip.trim).toEqual({ start: 2, end: 6 });
    expect(foreground.trim).toBeNull();
  });

  it('keeps the trim inside the source', () => {
    expect(() => subclipForeground(foreground, 12)).toThrow('subclip start 12 is past the end of a 10s source');
    expect(() => subclipForeground(foreground, 2, 11)).toThrow('subclip end 11 is past the end of a 10s source');
    expect(() => subclipForeground(foreground, 4, 3)).toThrow('subclip end 3 must be after start 4');
  });
});
