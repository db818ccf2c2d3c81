/**
 * Filter Graph Builder
 *
 * Builds the background stream, then one chain per layer in z-order:
 *
 *   ingestion → setpts → crop → scale → rotate → opacity → overlay
 *
 * Each overlay takes the previous composite as its base, so the first layer
 * ends up lowest. Audio from the background and the layers is delayed to each
 * layer's window and mixed into one stream.
 */

import type { Background, Canvas, LayerState, SceneSnapshot, SourceTrim } from '@/types/scene';
import type { CompiledLayer, Diagnostic, FilterNode, ProgramInput } from '@/types/program';
import { formatFrameRate, frameRateEquals } from '@/lib/frame-rate';
import { FilterGraph } from './filter-graph';
import { formatNumber, quoteExpression } from './filter-expression';
import { resolveGeometry, scaleParams } from './geometry-resolver';
import { planIngestion, trimArgs } from './ingestion-planner';
import { resolveTiming, type TimeWindow } from './timing-resolver';

export const VIDEO_OUTPUT = 'vout';
export const AUDIO_OUTPUT = 'aout';

export interface BuildOptions {
  canvas: Canvas;
  maskThreshold: number | null;
  /** Keep an alpha plane through the overlays */
  alpha: boolean;
  /** Whether the output container can carry audio */
  audio: boolean;
}

export interface GraphBuild {
  inputs: ProgramInput[];
  nodes: FilterNode[];
  videoOutput: string;
  audioOutput: string | null;
  layers: CompiledLayer[];
  duration: number | null;
  diagnostics: Diagnostic[];
}

type AudioStep = [filter: string, params: string];

interface AudioStream {
  owner: string;
  prefix: string;
  pad: string;
  steps: AudioStep[];
}

interface BackgroundPlan {
  input: ProgramInput;
  video: string;
  audio: AudioStream | null;
}

/**
 * Seconds of source media left after a trim
 */
export function trimmedDuration(duration: number | null, trim: SourceTrim | null): number | null {
  if (!trim) return duration;
  if (trim.end !== null) return trim.end - trim.start;
  return duration === null ? null : Math.max(0, duration - trim.start);
}

function colorSource(color: string, canvas: Canvas): string {
  return `color=c=${color}:size=${canvas.width}x${canvas.height}:rate=${formatFrameRate(canvas.frameRate)}`;
}

function planBackground(
  background: Background,
  canvas: Canvas,
  alpha: boolean,
  graph: FilterGraph
): BackgroundPlan {
  const owner = 'background';
  const input = (args: string[], source: string): ProgramInput => ({
    index: 0,
    role: 'background',
    owner,
    source,
    args: [...args, '-i', source],
  });
  const sizeDiffers = (width: number, height: number): boolean =>
    width !== canvas.width || height !== canvas.height;
  const size = `${canvas.width}:${canvas.height}`;

  switch (background.kind) {
    case 'color': {
      const source = colorSource(background.color, canvas);
      // lavfi color sources are yuv420p unless told otherwise
      const video = alpha ? graph.chain(owner, '0:v', 'format', 'rgba', 'bg') : '0:v';
      return { input: input(['-f', 'lavfi'], source), video, audio: null };
    }

    case 'transparent': {
      const source = colorSource('black@0.0', canvas);
      const video = graph.chain(owner, '0:v', 'format', 'rgba', 'bg');
      return { input: input(['-f', 'lavfi'], source), video, audio: null };
    }

    case 'image': {
      let video = '0:v';
      if (sizeDiffers(background.width, background.height)) {
        video = graph.chain(owner, video, 'scale', size, 'bg_scale');
      }
      return {
        input: input(['-loop', '1', '-framerate', formatFrameRate(canvas.frameRate)], background.path),
        video,
        audio: null,
      };
    }

    case 'video': {
      let video = '0:v';
      if (sizeDiffers(background.width, background.height)) {
        video = graph.chain(owner, video, 'scale', size, 'bg_scale');
      }
      if (!frameRateEquals(background.frameRate, canvas.frameRate)) {
        video = graph.chain(owner, video, 'fps', formatFrameRate(canvas.frameRate), 'bg_fps');
      }

      let audio: AudioStream | null = null;
      if (background.hasAudio && background.audio.enabled) {
        const steps: AudioStep[] =
          background.audio.volume === 1 ? [] : [['volume', formatNumber(background.audio.volume)]];
        audio = { owner, prefix: 'abg', pad: '0:a', steps };
      }
      return { input: input(trimArgs(background.trim), background.path), video, audio };
    }
  }
}

function rotateParams(degrees: number): string {
  const angle = `${formatNumber(degrees)}*PI/180`;
  return `a=${angle}:ow=rotw(${angle}):oh=roth(${angle}):c=none`;
}

function overlayParams(x: string, y: string, window: TimeWindow, alpha: boolean): string {
  const params = [`x=${quoteExpression(x)}`, `y=${quoteExpression(y)}`, 'eof_action=pass'];
  if (alpha) params.push('format=auto');
  if (window.enable !== null) params.push(`enable=${quoteExpression(window.enable)}`);
  return params.join(':');
}

function layerAudioSteps(layer: LayerState, window: TimeWindow): AudioStep[] {
  const steps: AudioStep[] = [];
  if (window.duration !== null) {
    steps.push(['atrim', `duration=${formatNumber(window.duration)}`]);
  }
  if (window.start > 0) {
    steps.push(['adelay', `delays=${Math.round(window.start * 1000)}:all=1`]);
  }
  if (layer.audio.volume !== 1) {
    steps.push(['volume', formatNumber(layer.audio.volume)]);
  }
  return steps;
}

/**
 * Add an audio chain to the graph; the last step writes to `output` when given.
 */
function materializeAudio(graph: FilterGraph, stream: AudioStream, output: string | null): string {
  const { owner, prefix, steps } = stream;
  if (steps.length === 0) {
    return output ? graph.chain(owner, stream.pad, 'anull', '', output) : stream.pad;
  }

  let label = stream.pad;
  steps.forEach(([filter, params], index) => {
    const isLast = index === steps.length - 1;
    label = graph.chain(owner, label, filter, params, isLast && output ? output : `${prefix}_${filter}`);
  });
  return label;
}

function layerSourceDuration(layer: LayerState): number | null {
  const source = layer.source.kind === 'video' ? layer.source.video : layer.source.foreground;
  return trimmedDuration(source.duration, layer.trim ?? source.trim);
}

/**
 * Output duration: explicit, then a video background, then the latest layer end.
 * Null when any of those is open-ended.
 */
export function resolveDuration(
  scene: Pick<SceneSnapshot, 'duration' | 'background' | 'layers'>,
  windows: readonly TimeWindow[]
): number | null {
  if (scene.duration !== null) return scene.duration;

  if (scene.background.kind === 'video') {
    return trimmedDuration(scene.background.duration, scene.background.trim);
  }

  if (scene.layers.length === 0) return null;

  let latest = 0;
  for (const [index, layer] of scene.layers.entries()) {
    const window = windows[index];
    const sourceDuration = layerSourceDuration(layer);
    const end = window.end ?? (sourceDuration === null ? null : window.start + sourceDuration);
    if (end === null) return null;
    latest = Math.max(latest, end);
  }
  return latest;
}

/**
 * Build the complete, validated filter graph for a scene.
 */
export function buildFilterGraph(scene: SceneSnapshot, options: BuildOptions): GraphBuild {
  const { canvas } = options;
  const graph = new FilterGraph();
  const diagnostics: Diagnostic[] = [];

  const windows = scene.layers.map((layer) => resolveTiming(layer.timing));

  const background = planBackground(scene.background, canvas, options.alpha, graph);
  const inputs: ProgramInput[] = [background.input];
  const audioStreams: AudioStream[] = background.audio ? [background.audio] : [];
  const layers: CompiledLayer[] = [];

  let base = background.video;

  scene.layers.forEach((layer, z) => {
    const owner = layer.id;
    const prefix = `l${z}`;
    const window = windows[z];

    const ingestion = planIngestion(
      layer.source,
      {
        owner,
        prefix,
        firstInput: inputs.length,
        trim: layer.trim,
        maskThreshold: options.maskThreshold,
        alpha: layer.alpha,
      },
      graph
    );
    inputs.push(...ingestion.inputs);

    const shift = window.start > 0 ? `PTS-STARTPTS+${formatNumber(window.start)}/TB` : 'PTS-STARTPTS';
    let label = graph.chain(owner, ingestion.video, 'setpts', shift, `${prefix}_shift`);

    if (layer.crop) {
      const { width, height, x, y } = layer.crop;
      label = graph.chain(owner, label, 'crop', `${width}:${height}:${x}:${y}`, `${prefix}_crop`);
    }

    const geometry = resolveGeometry(layer, canvas);
    label = graph.chain(owner, label, 'scale', scaleParams(geometry.scale), `${prefix}_scale`);

    // opaque streams get an alpha plane before anything that needs one
    const opaque = layer.source.kind === 'video' || !layer.alpha;
    if (opaque && (layer.rotation !== 0 || layer.opacity < 1)) {
      label = graph.chain(owner, label, 'format', 'rgba', `${prefix}_rgba`);
    }
    if (layer.rotation !== 0) {
      label = graph.chain(owner, label, 'rotate', rotateParams(layer.rotation), `${prefix}_rotate`);
    }
    if (layer.opacity < 1) {
      label = graph.chain(
        owner,
        label,
        'colorchannelmixer',
        `aa=${formatNumber(layer.opacity)}`,
        `${prefix}_opacity`
      );
    }

    const isTop = z === scene.layers.length - 1;
    base = graph.add({
      filter: 'overlay',
      params: overlayParams(geometry.placement.x, geometry.placement.y, window, options.alpha),
      inputs: [base, label],
      outputs: [isTop ? VIDEO_OUTPUT : `ov${z}`],
      owner,
    });

    layers.push({
      id: layer.id,
      inputIndexes: ingestion.inputs.map((input) => input.index),
      videoLabel: label,
      start: window.start,
      end: window.end,
      enable: window.enable,
    });

    if (ingestion.audio !== null && layer.audio.enabled) {
      audioStreams.push({
        owner,
        prefix: `a${z}`,
        pad: ingestion.audio,
        steps: layerAudioSteps(layer, window),
      });
    }
  });

  if (scene.layers.length === 0) {
    graph.chain('background', base, 'null', '', VIDEO_OUTPUT);
  }

  let audioOutput: string | null = null;
  if (audioStreams.length > 0 && !options.audio) {
    diagnostics.push({
      level: 'warn',
      code: 'audio-unsupported',
      message: `${audioStreams.length} audio stream(s) dropped: the output container carries no audio`,
    });
  } else if (audioStreams.length === 1) {
    audioOutput = materializeAudio(graph, audioStreams[0], AUDIO_OUTPUT);
  } else if (audioStreams.length > 1) {
    const labels = audioStreams.map((stream) => materializeAudio(graph, stream, null));
    audioOutput = graph.add({
      filter: 'amix',
      params: `inputs=${labels.length}:duration=longest:normalize=0`,
      inputs: labels,
      outputs: [AUDIO_OUTPUT],
      owner: 'audio',
    });
  } else {
    diagnostics.push({
      level: 'info',
      code: 'silent-output',
      message: 'No enabled audio source; the output has no audio stream',
    });
  }

  const duration = resolveDuration(scene, windows);
  if (duration === null && scene.background.kind !== 'video') {
    diagnostics.push({
      level: 'warn',
      code: 'unbounded-duration',
      message: `The ${scene.background.kind} background never ends and no duration is known; set one explicitly`,
    });
  }

  const outputs = audioOutput ? [VIDEO_OUTPUT, audioOutput] : [VIDEO_OUTPUT];
  const nodes = graph.validate(inputs.length, outputs);

  return {
    inputs,
    nodes,
    videoOutput: VIDEO_OUTPUT,
    audioOutput,
    layers,
    duration,
    diagnostics,
  };
}
