import { describe, expect, it } from 'vitest';
import type { Canvas } from '@/types/scene';
import { Composition } from '@/features/composition/composition';
import {
  colorBackground,
  imageBackground,
  transparentBackground,
  videoBackground,
} from '@/features/composition/backgrounds';
import { webmForeground } from '@/features/composition/foregrounds';
import { renderNode } from './filter-graph';
import { buildFilterGraph, resolveDuration, trimmedDuration, type BuildOptions } from './filter-graph-builder';

const canvas: Canvas = { width: 1920, height: 1080, frameRate: { numerator: 30, denominator: 1 } };
const options: BuildOptions = { canvas, maskThreshold: 128, alpha: false, audio: true };

const talent = (extra: { hasAudio?: boolean; duration?: number } = {}) =>
  webmForeground('talent.webm', { width: 1280, height: 720, frameRate: 30, ...extra });

function rendered(composition: Composition, buildOptions: BuildOptions = options): string[] {
  return buildFilterGraph(composition.snapshot(), buildOptions).nodes.map(renderNode);
}

describe('buildFilterGraph', () => {
  it('overlays a single layer centered on a color background', () => {
    const composition = new Composition({ background: colorBackground('#000000') });
    composition.add(talent(), 'talent');

    const build = buildFilterGraph(composition.snapshot(), options);

    expect(build.inputs.map((input) => input.args)).toEqual([
      ['-f', 'lavfi', '-i', 'color=c=#000000:size=1920x1080:rate=30'],
      ['-c:v', 'libvpx-vp9', '-i', 'talent.webm'],
    ]);
    expect(build.nodes.map(renderNode)).toEqual([
      '[1:v]setpts=PTS-STARTPTS[l0_shift]',
      '[l0_shift]scale=1920:1080:force_original_aspect_ratio=decrease[l0_scale]',
      "[0:v][l0_scale]overlay=x='(1920-w)/2':y='(1080-h)/2':eof_action=pass[vout]",
    ]);
    expect(build.videoOutput).toBe('vout');
    expect(build.audioOutput).toBeNull();
    expect(build.layers).toEqual([
      { id: 'talent', inputIndexes: [1], videoLabel: 'l0_scale', start: 0, end: null, enable: null },
    ]);
    expect(build.diagnostics.map((diagnostic) => diagnostic.code)).toEqual(['silent-output', 'unbounded-duration']);
    expect(build.diagnostics[1].message).toBe(
      'The color background never ends and no duration is known; set one explicitly'
    );
  });

  it('stacks layers in insertion order and gates them by their windows', () => {
    const composition = new Composition({ background: colorBackground('black') });
    composition.add(talent(), 'first').duration(5);
    composition.add(talent(), 'second').start(5).end(10);

    const build = buildFilterGraph(composition.snapshot(), options);

    expect(build.nodes.map(renderNode)).toEqual([
      '[1:v]setpts=PTS-STARTPTS[l0_shift]',
      '[l0_shift]scale=1920:1080:force_original_aspect_ratio=decrease[l0_scale]',
      "[0:v][l0_scale]overlay=x='(1920-w)/2':y='(1080-h)/2':eof_action=pass:enable='lt(t,5)'[ov0]",
      '[2:v]setpts=PTS-STARTPTS+5/TB[l1_shift]',
      '[l1_shift]scale=1920:1080:force_original_aspect_ratio=decrease[l1_scale]',
      "[ov0][l1_scale]overlay=x='(1920-w)/2':y='(1080-h)/2':eof_action=pass:enable='gte(t,5)*lt(t,10)'[vout]",
    ]);
    expect(build.duration).toBe(10);
    expect(build.diagnostics.map((diagnostic) => diagnostic.code)).toEqual(['silent-output']);
  });

  it('keeps alpha through the overlays on a transparent background', () => {
    const composition = new Composition({ background: transparentBackground() });
    composition.add(talent()).duration(4);

    const build = buildFilterGraph(composition.snapshot(), { ...options, alpha: true });

    expect(build.inputs[0].args).toEqual(['-f', 'lavfi', '-i', 'color=c=black@0.0:size=1920x1080:rate=30']);
    expect(build.nodes.map(renderNode)).toEqual([
      '[0:v]format=rgba[bg]',
      '[1:v]setpts=PTS-STARTPTS[l0_shift]',
      '[l0_shift]scale=1920:1080:force_original_aspect_ratio=decrease[l0_scale]',
      "[bg][l0_scale]overlay=x='(1920-w)/2':y='(1080-h)/2':eof_action=pass:format=auto:enable='lt(t,4)'[vout]",
    ]);
  });

  it('crops, scales, rotates and fades an opaque video layer in order', () => {
    const composition = new Composition({ background: colorBackground('black') });
    composition
      .add(videoBackground('broll.mp4', { width: 1280, height: 720, frameRate: 30, duration: 8 }), 'broll')
      .crop(10, 20, 300, 200)
      .size({ mode: 'fixed-pixels', width: 600, height: 400 })
      .rotate(45)
      .opacity(0.5)
      .at('top-left', 100, 50);

    expect(rendered(composition)).toEqual([
      '[1:v]setpts=PTS-STARTPTS[l0_shift]',
      '[l0_shift]crop=300:200:10:20[l0_crop]',
      '[l0_crop]scale=600:400[l0_scale]',
      '[l0_scale]format=rgba[l0_rgba]',
      '[l0_rgba]rotate=a=45*PI/180:ow=rotw(45*PI/180):oh=roth(45*PI/180):c=none[l0_rotate]',
      '[l0_rotate]colorchannelmixer=aa=0.5[l0_opacity]',
      "[0:v][l0_opacity]overlay=x='0+100':y='0+50':eof_action=pass[vout]",
    ]);
  });

  it('does not convert foreground layers that already carry alpha', () => {
    const composition = new Composition({ background: colorBackground('black') });
    composition.add(talent()).opacity(0.25);

    expect(rendered(composition)).toEqual([
      '[1:v]setpts=PTS-STARTPTS[l0_shift]',
      '[l0_shift]scale=1920:1080:force_original_aspect_ratio=decrease[l0_scale]',
      '[l0_scale]colorchannelmixer=aa=0.25[l0_opacity]',
      "[0:v][l0_opacity]overlay=x='(1920-w)/2':y='(1080-h)/2':eof_action=pass[vout]",
    ]);
  });

  it('flattens a foreground with alpha off and gives it a new alpha plane to fade', () => {
    const composition = new Composition({ background: colorBackground('black') });
    composition.add(talent()).alpha(false).opacity(0.25);

    expect(rendered(composition)).toEqual([
      '[1:v]format=rgb24[l0_opaque]',
      '[l0_opaque]setpts=PTS-STARTPTS[l0_shift]',
      '[l0_shift]scale=1920:1080:force_original_aspect_ratio=decrease[l0_scale]',
      '[l0_scale]format=rgba[l0_rgba]',
      '[l0_rgba]colorchannelmixer=aa=0.25[l0_opacity]',
      "[0:v][l0_opacity]overlay=x='(1920-w)/2':y='(1080-h)/2':eof_action=pass[vout]",
    ]);
  });

  it('converts a translucent color background to rgba in alpha scenes', () => {
    const composition = new Composition({ background: colorBackground('#00000080') });
    composition.add(talent());

    const build = buildFilterGraph(composition.snapshot(), { ...options, alpha: true });
    expect(build.inputs[0].source).toBe('color=c=#00000080:size=1920x1080:rate=30');
    expect(build.nodes.map(renderNode).slice(0, 1)).toEqual(['[0:v]format=rgba[bg]']);
    expect(build.nodes.map(renderNode).at(-1)).toBe(
      "[bg][l0_scale]overlay=x='(1920-w)/2':y='(1080-h)/2':eof_action=pass:format=auto[vout]"
    );
  });

  it('scales an image background and resamples a video background', () => {
    const image = new Composition({ background: imageBackground('still.png', { width: 800, height: 600 }) });
    const imageBuild = buildFilterGraph(image.snapshot(), options);
    expect(imageBuild.inputs[0].args).toEqual(['-loop', '1', '-framerate', '30', '-i', 'still.png']);
    expect(imageBuild.nodes.map(renderNode)).toEqual(['[0:v]scale=1920:1080[bg_scale]', '[bg_scale]null[vout]']);

    const video = new Composition({
      background: videoBackground('bg.mp4', { width: 1920, height: 1080, frameRate: 25, duration: 6 }),
    });
    const videoBuild = buildFilterGraph(video.snapshot(), options);
    expect(videoBuild.nodes.map(renderNode)).toEqual(['[0:v]fps=30[bg_fps]', '[bg_fps]null[vout]']);
    expect(videoBuild.duration).toBe(6);
  });

  it('passes the background through when there are no layers', () => {
    const composition = new Composition({ background: colorBackground('white') }).setDuration(3);
    expect(rendered(composition)).toEqual(['[0:v]null[vout]']);
  });

  it('routes a single untouched audio stream through anull', () => {
    const composition = new Composition({
      background: videoBackground('bg.mp4', { width: 1920, height: 1080, frameRate: 30, hasAudio: true }),
    });
    const build = buildFilterGraph(composition.snapshot(), options);

    expect(build.audioOutput).toBe('aout');
    expect(build.nodes.map(renderNode)).toEqual(['[0:v]null[vout]', '[0:a]anull[aout]']);
    expect(build.diagnostics).toEqual([]);
  });

  it('delays, trims and mixes layer audio with the background audio', () => {
    const composition = new Composition({
      background: videoBackground('bg.mp4', {
        width: 1920,
        height: 1080,
        frameRate: 30,
        duration: 12,
        hasAudio: true,
      }),
    });
    composition.add(talent({ hasAudio: true }), 'talent').start(2).duration(3).audio({ volume: 0.5 });

    const build = buildFilterGraph(composition.snapshot(), options);

    expect(build.nodes.map(renderNode)).toEqual([
      '[1:v]setpts=PTS-STARTPTS+2/TB[l0_shift]',
      '[l0_shift]scale=1920:1080:force_original_aspect_ratio=decrease[l0_scale]',
      "[0:v][l0_scale]overlay=x='(1920-w)/2':y='(1080-h)/2':eof_action=pass:enable='gte(t,2)*lt(t,5)'[vout]",
      '[1:a]atrim=duration=3[a0_atrim]',
      '[a0_atrim]adelay=delays=2000:all=1[a0_adelay]',
      '[a0_adelay]volume=0.5[a0_volume]',
      '[0:a][a0_volume]amix=inputs=2:duration=longest:normalize=0[aout]',
    ]);
    expect(build.duration).toBe(12);
  });

  it('leaves muted layers out of the mix', () => {
    const composition = new Composition({ background: colorBackground('black') }).setDuration(5);
    composition.add(talent({ hasAudio: true })).mute();

    const build = buildFilterGraph(composition.snapshot(), options);
    expect(build.audioOutput).toBeNull();
    expect(build.diagnostics).toEqual([
      {
        level: 'info',
        code: 'silent-output',
        message: 'No enabled audio source; the output has no audio stream',
      },
    ]);
  });

  it('drops audio with a warning when the container has none', () => {
    const composition = new Composition({ background: colorBackground('black') }).setDuration(5);
    composition.add(talent({ hasAudio: true }));

    const build = buildFilterGraph(composition.snapshot(), { ...options, audio: false });
    expect(build.audioOutput).toBeNull();
    expect(build.diagnostics).toEqual([
      {
        level: 'warn',
        code: 'audio-unsupported',
        message: '1 audio stream(s) dropped: the output container carries no audio',
      },
    ]);
  });
});

describe('resolveDuration', () => {
  it('prefers the explicit duration', () => {
    const composition = new Composition({
      background: videoBackground('bg.mp4', { width: 1920, height: 1080, frameRate: 30, duration: 20 }),
    }).setDuration(7);
    expect(resolveDuration(composition.snapshot(), [])).toBe(7);
  });

  it('uses the trimmed layer length when a layer has no end', () => {
    const composition = new Composition({ background: colorBackground('black') });
    composition.add(talent({ duration: 10 })).start(1).subclip(2, 6);
    const build = buildFilterGraph(composition.snapshot(), options);
    expect(build.duration).toBe(5);
    expect(build.diagnostics.map((diagnostic) => diagnostic.code)).toEqual(['silent-output']);
  });
});

describe('trimmedDuration', () => {
  it('subtracts the trim from the source', () => {
    expect(trimmedDuration(10, null)).toBe(10);
    expect(trimmedDuration(10, { start: 2, end: 6 })).toBe(4);
    expect(trimmedDuration(10, { start: 4, end: null })).toBe(6);
    expect(trimmedDuration(null, { start: 4, end: null })).toBeNull();
  });
});
