import { describe, expect, it } from 'vitest';
import { ZodError } from 'zod';
import { renderNode } from '@/features/compiler/filter-graph';
import { compositionFromScene, parseSceneDocument, type SceneDocumentInput } from './scene-schema';

const document: SceneDocumentInput = {
  canvas: { width: 1920, height: 1080, frameRate: 30 },
  duration: 10,
  background: { kind: 'color', color: '#112233' },
  layers: [
    {
      name: 'talent',
      source: {
        foreground: {
          encoding: 'native-alpha',
          path: 'talent.webm',
          codec: 'vp9',
          width: 1280,
          height: 720,
          frameRate: 30,
        },
      },
      position: { anchor: 'bottom-right', dx: -40, dy: -40 },
      size: { mode: 'canvas-percentage', percent: 50 },
      start: 2,
      duration: 4,
    },
  ],
  encoder: { profile: 'h264', crf: 20 },
  output: { path: 'out.mp4' },
};

describe('parseSceneDocument', () => {
  it('defaults the layer list', () => {
    const parsed = parseSceneDocument({ encoder: 'h264', output: { path: 'out.mp4' } });
    expect(parsed.layers).toEqual([]);
  });

  it('rejects unknown anchors and profiles', () => {
    expect(() =>
      parseSceneDocument({
        ...document,
        layers: [{ ...document.layers?.[0], position: { anchor: 'middle' } }],
      })
    ).toThrow(ZodError);
    expect(() => parseSceneDocument({ ...document, encoder: 'mpeg2' })).toThrow(ZodError);
  });
});

describe('compositionFromScene', () => {
  it('replays the document through the builder', () => {
    const { composition, profile, output, overrides } = compositionFromScene(parseSceneDocument(document));

    expect(profile.name).toBe('h264');
    expect(profile.crf).toBe(20);
    expect(output).toEqual({ kind: 'file', path: 'out.mp4' });
    expect(overrides).toEqual({});

    const layer = composition.layer('talent').toState();
    expect(layer.position).toEqual({ kind: 'anchor', anchor: 'bottom-right', dx: -40, dy: -40 });
    expect(layer.timing).toEqual({ start: 2, end: null, duration: 4 });

    const program = composition.compile(profile, output, overrides);
    expect(program.nodes.map(renderNode).at(-1)).toBe(
      "[0:v][l0_scale]overlay=x='920+960-w':y='500+540-h':eof_action=pass:enable='gte(t,2)*lt(t,6)'[vout]"
    );
    expect(program.duration).toBe(10);
  });

  it('maps stream outputs, custom encoders and options', () => {
    const { profile, output, overrides } = compositionFromScene(
      parseSceneDocument({
        encoder: { container: 'mkv', codec: 'libx264', pixelFormat: 'yuv444p', crf: 16 },
        output: { stream: 'matroska' },
        options: { maskThreshold: null, defaultFrameRate: 25 },
      })
    );
    expect(profile.name).toBe('mkv-libx264');
    expect(output).toEqual({ kind: 'pipe', format: 'matroska' });
    expect(overrides).toEqual({ maskThreshold: null, defaultFrameRate: 25 });
  });

  it('builds video layers and backgrounds with trims and audio', () => {
    const { composition } = compositionFromScene(
      parseSceneDocument({
        background: {
          kind: 'video',
          path: 'bg.mp4',
          width: 1920,
          height: 1080,
          frameRate: 30,
          duration: 30,
          hasAudio: true,
          audio: { volume: 0.4 },
          trim: { start: 5, end: 15 },
        },
        layers: [
          {
            source: { video: { path: 'broll.mp4', width: 640, height: 360, frameRate: 30 } },
            position: { x: 'W-w-20', y: 20 },
            crop: { x: 0, y: 0, width: 320, height: 180 },
            opacity: 0.5,
            audio: { enabled: false },
          },
        ],
        encoder: 'h264',
        output: { path: 'out.mp4' },
      })
    );

    const snapshot = composition.snapshot();
    expect(snapshot.background).toMatchObject({ kind: 'video', trim: { start: 5, end: 15 }, audio: { volume: 0.4 } });
    expect(snapshot.layers[0]).toMatchObject({
      id: 'layer1',
      position: { kind: 'expression', x: 'W-w-20', y: '20' },
      crop: { x: 0, y: 0, width: 320, height: 180 },
      opacity: 0.5,
      audio: { enabled: false, volume: 1 },
    });
  });

  it('builds video-and-mask layers with alpha turned off', () => {
    const { composition } = compositionFromScene(
      parseSceneDocument({
        canvas: { width: 1280, height: 720 },
        layers: [
          {
            name: 'talent',
            source: {
              foreground: {
                encoding: 'video-and-mask',
                path: 'talent.mp4',
                maskPath: 'talent_mask.mp4',
                width: 1280,
                height: 720,
                frameRate: 30,
              },
            },
            alpha: false,
          },
        ],
        encoder: 'h264',
        output: { path: 'out.mp4' },
      })
    );

    const layer = composition.snapshot().layers[0];
    expect(layer.alpha).toBe(false);
    expect(layer.source).toMatchObject({
      kind: 'foreground',
      foreground: { path: 'talent.mp4', encoding: { kind: 'video-and-mask', maskPath: 'talent_mask.mp4' } },
    });
  });
});
