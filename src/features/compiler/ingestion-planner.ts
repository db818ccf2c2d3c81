/**
 * Format Ingestion Planner
 *
 * Turns a layer source into engine inputs plus the sub-graph that yields one
 * alpha-bearing video stream. This is the only place that looks at the
 * transparency encoding; everything downstream works on the returned label.
 *
 * A layer with alpha turned off gets an opaque rgb24 stream instead: only the
 * color picture is read and no mask is merged.
 */

import type {
  Foreground,
  FrameSequenceEncoding,
  LayerSource,
  SourceTrim,
  StackedEncoding,
  TransparencyEncoding,
} from '@/types/scene';
import type { InputRole, ProgramInput } from '@/types/program';
import { formatFrameRate } from '@/lib/frame-rate';
import { FilterGraph } from './filter-graph';
import { formatNumber, quoteExpression } from './filter-expression';

export interface IngestionContext {
  /** Layer id, recorded as node and input owner */
  owner: string;
  /** Label prefix unique to the layer, e.g. `l0` */
  prefix: string;
  /** Engine input index the first input of this layer gets */
  firstInput: number;
  /** Trim declared on the layer; wins over a trim on the source */
  trim: SourceTrim | null;
  /** Binary mask cut, or null for soft masks */
  maskThreshold: number | null;
  /** Keep the source's transparency */
  alpha: boolean;
}

export interface IngestionResult {
  inputs: ProgramInput[];
  /** Label of the alpha-bearing (or, with alpha off, rgb24) video stream */
  video: string;
  /** Audio pad of the source, when it carries audio */
  audio: string | null;
}

/** crop parameters for the first and second region of a stacked frame */
const STACK_REGIONS: Record<StackedEncoding['orientation'], { first: string; second: string }> = {
  'top-bottom': { first: 'iw:ih/2:0:0', second: 'iw:ih/2:0:ih/2' },
  'side-by-side': { first: 'iw/2:ih:0:0', second: 'iw/2:ih:iw/2:0' },
};

export function trimArgs(trim: SourceTrim | null): string[] {
  if (!trim) return [];
  const args = ['-ss', formatNumber(trim.start)];
  if (trim.end !== null) {
    args.push('-t', formatNumber(trim.end - trim.start));
  }
  return args;
}

/**
 * Which crop region holds color and which holds alpha
 */
export function stackedCrops(encoding: StackedEncoding): { color: string; alpha: string } {
  const regions = STACK_REGIONS[encoding.orientation];
  return encoding.order === 'color-first'
    ? { color: regions.first, alpha: regions.second }
    : { color: regions.second, alpha: regions.first };
}

function makeInput(
  index: number,
  role: InputRole,
  owner: string,
  source: string,
  options: string[]
): ProgramInput {
  return { index, role, owner, source, args: [...options, '-i', source] };
}

/**
 * color + luminance mask → one RGBA stream
 */
function mergeAlpha(
  graph: FilterGraph,
  ctx: IngestionContext,
  colorLabel: string,
  alphaLabel: string
): string {
  const { owner, prefix } = ctx;
  const color = graph.chain(owner, colorLabel, 'format', 'rgba', `${prefix}_color`);
  let mask = graph.chain(owner, alphaLabel, 'format', 'gray', `${prefix}_gray`);

  if (ctx.maskThreshold !== null) {
    mask = graph.chain(
      owner,
      mask,
      'geq',
      `lum=${quoteExpression(`if(gte(lum(X,Y),${ctx.maskThreshold}),255,0)`)}`,
      `${prefix}_mask`
    );
  }

  return graph.add({
    filter: 'alphamerge',
    params: '',
    inputs: [color, mask],
    outputs: [`${prefix}_rgba`],
    owner,
  });
}

function dropAlpha(graph: FilterGraph, ctx: IngestionContext, label: string): string {
  return graph.chain(ctx.owner, label, 'format', 'rgb24', `${ctx.prefix}_opaque`);
}

function planStacked(
  graph: FilterGraph,
  ctx: IngestionContext,
  encoding: StackedEncoding,
  pad: string
): string {
  const { owner, prefix } = ctx;
  const crops = stackedCrops(encoding);

  if (!ctx.alpha) {
    return dropAlpha(graph, ctx, graph.chain(owner, pad, 'crop', crops.color, `${prefix}_color_crop`));
  }

  graph.add({
    filter: 'split',
    params: '2',
    inputs: [pad],
    outputs: [`${prefix}_color_src`, `${prefix}_alpha_src`],
    owner,
  });
  const color = graph.chain(owner, `${prefix}_color_src`, 'crop', crops.color, `${prefix}_color_crop`);
  const alpha = graph.chain(owner, `${prefix}_alpha_src`, 'crop', crops.alpha, `${prefix}_alpha_crop`);

  return mergeAlpha(graph, ctx, color, alpha);
}

function sequenceOptions(encoding: FrameSequenceEncoding, trim: string[]): string[] {
  return [
    '-framerate',
    formatFrameRate(encoding.frameRate),
    '-start_number',
    String(encoding.startNumber),
    ...trim,
  ];
}

interface SourceInput {
  source: string;
  options: string[];
}

/**
 * Color and mask read as two inputs, plus an optional separate audio input
 */
function planSeparateMask(
  graph: FilterGraph,
  ctx: IngestionContext,
  foreground: Foreground,
  color: SourceInput,
  mask: SourceInput,
  audioOptions: string[]
): IngestionResult {
  const { owner, firstInput } = ctx;
  const inputs = [makeInput(firstInput, 'layer-color', owner, color.source, color.options)];
  if (ctx.alpha) {
    inputs.push(makeInput(firstInput + 1, 'layer-alpha', owner, mask.source, mask.options));
  }

  let audio: string | null = foreground.hasAudio ? `${firstInput}:a` : null;
  if (foreground.audioPath !== null) {
    const audioIndex = firstInput + inputs.length;
    inputs.push(makeInput(audioIndex, 'layer-audio', owner, foreground.audioPath, audioOptions));
    audio = `${audioIndex}:a`;
  }

  const video = ctx.alpha
    ? mergeAlpha(graph, ctx, `${firstInput}:v`, `${firstInput + 1}:v`)
    : dropAlpha(graph, ctx, `${firstInput}:v`);
  return { inputs, video, audio };
}

function assertNever(value: never): never {
  throw new Error(`Unhandled transparency encoding: ${JSON.stringify(value)}`);
}

/**
 * Plan inputs and ingestion nodes for one layer source.
 */
export function planIngestion(
  source: LayerSource,
  ctx: IngestionContext,
  graph: FilterGraph
): IngestionResult {
  const { owner, firstInput } = ctx;

  if (source.kind === 'video') {
    const video = source.video;
    const input = makeInput(firstInput, 'layer', owner, video.path, trimArgs(ctx.trim ?? video.trim));
    return {
      inputs: [input],
      video: `${firstInput}:v`,
      audio: video.hasAudio ? `${firstInput}:a` : null,
    };
  }

  const foreground = source.foreground;
  const trim = trimArgs(ctx.trim ?? foreground.trim);
  const encoding: TransparencyEncoding = foreground.encoding;

  switch (encoding.kind) {
    case 'native-alpha': {
      // libvpx decodes the VP9 alpha side channel; the native decoder drops it
      const decoder = encoding.codec === 'vp9' ? ['-c:v', 'libvpx-vp9'] : [];
      const input = makeInput(firstInput, 'layer', owner, foreground.path, [...decoder, ...trim]);
      return {
        inputs: [input],
        video: ctx.alpha ? `${firstInput}:v` : dropAlpha(graph, ctx, `${firstInput}:v`),
        audio: foreground.hasAudio ? `${firstInput}:a` : null,
      };
    }

    case 'stacked': {
      const input = makeInput(firstInput, 'layer', owner, foreground.path, trim);
      return {
        inputs: [input],
        video: planStacked(graph, ctx, encoding, `${firstInput}:v`),
        audio: foreground.hasAudio ? `${firstInput}:a` : null,
      };
    }

    case 'frame-sequence': {
      const options = sequenceOptions(encoding, trim);
      return planSeparateMask(
        graph,
        ctx,
        foreground,
        { source: encoding.colorPattern, options },
        { source: encoding.alphaPattern, options },
        trim
      );
    }

    case 'video-and-mask':
      return planSeparateMask(
        graph,
        ctx,
        foreground,
        { source: foreground.path, options: trim },
        { source: encoding.maskPath, options: trim },
        trim
      );

    default:
      return assertNever(encoding);
  }
}
