/**
 * Program Emitter
 *
 * Renders a built graph into the filter-graph text and the full ffmpeg
 * argument list, and provides the non-executing inspection form.
 */

import type { Canvas } from '@/types/scene';
import type {
  CompiledProgram,
  Diagnostic,
  OutputTarget,
  ProgramInput,
  StreamFormat,
} from '@/types/program';
import type { EncoderProfileData } from '@/types/encoder';
import { formatFrameRate } from '@/lib/frame-rate';
import { deepFreeze } from '@/lib/freeze';
import type { EncoderProfile } from './encoder-profile';
import type { GraphBuild } from './filter-graph-builder';
import { renderFilterGraph } from './filter-graph';
import { formatNumber } from './filter-expression';

/** `-f` muxer and extra muxer flags per stream format */
const STREAM_MUXERS: Record<StreamFormat, string[]> = {
  webm: ['-f', 'webm'],
  matroska: ['-f', 'matroska'],
  'mp4-fragmented': ['-f', 'mp4', '-movflags', 'frag_keyframe+empty_moov'],
  y4m: ['-f', 'yuv4mpegpipe'],
};

export const PIPE_TARGET = 'pipe:1';

function outputArgs(output: OutputTarget): string[] {
  if (output.kind === 'pipe') {
    return [...STREAM_MUXERS[output.format], PIPE_TARGET];
  }
  return [output.path];
}

/**
 * Assemble the program: inputs, `-filter_complex`, stream maps, duration,
 * encoder options, then the output.
 */
export function emitProgram(
  build: GraphBuild,
  canvas: Canvas,
  profile: EncoderProfile,
  output: OutputTarget,
  extraDiagnostics: Diagnostic[] = []
): CompiledProgram {
  const filterGraph = renderFilterGraph(build.nodes);
  const args: string[] = [];

  if (output.kind === 'file') args.push('-y');
  for (const input of build.inputs) {
    args.push(...input.args);
  }

  args.push('-filter_complex', filterGraph, '-map', `[${build.videoOutput}]`);
  if (build.audioOutput !== null) {
    args.push('-map', `[${build.audioOutput}]`);
  } else {
    args.push('-an');
  }

  if (build.duration !== null) {
    args.push('-t', formatNumber(build.duration));
  }

  args.push(...profile.videoArgs());
  if (build.audioOutput !== null) {
    args.push(...profile.audioArgs());
  }
  args.push(...outputArgs(output));

  const program: CompiledProgram = {
    canvas: { ...canvas, frameRate: { ...canvas.frameRate } },
    duration: build.duration,
    inputs: build.inputs.map((input) => ({ ...input, args: [...input.args] })),
    nodes: build.nodes.map((node) => ({ ...node, inputs: [...node.inputs], outputs: [...node.outputs] })),
    filterGraph,
    videoOutput: build.videoOutput,
    audioOutput: build.audioOutput,
    layers: build.layers.map((layer) => ({ ...layer, inputIndexes: [...layer.inputIndexes] })),
    output: { ...output },
    encoder: profile.toJSON(),
    args,
    diagnostics: [...extraDiagnostics, ...build.diagnostics].map((diagnostic) => ({ ...diagnostic })),
  };

  return deepFreeze(program);
}

const SAFE_ARG = /^[A-Za-z0-9_\-./:=@%+,]+$/;

export function shellQuote(arg: string): string {
  if (SAFE_ARG.test(arg)) return arg;
  return `'${arg.replace(/'/g, `'\\''`)}'`;
}

/**
 * Single shell line for logs and copy-paste; not used for execution.
 */
export function toCommandLine(program: CompiledProgram, ffmpegPath = 'ffmpeg'): string {
  return [ffmpegPath, ...program.args].map(shellQuote).join(' ');
}

export interface ProgramInspection {
  canvas: { width: number; height: number; frameRate: string };
  duration: number | null;
  inputs: ProgramInput[];
  filterGraph: string;
  nodes: Array<{ filter: string; params: string; inputs: string[]; outputs: string[]; owner: string }>;
  maps: { video: string; audio: string | null };
  output: OutputTarget;
  encoder: EncoderProfileData;
  args: string[];
  commandLine: string;
  diagnostics: Diagnostic[];
}

/**
 * Plain JSON form of a compiled program
 */
export function inspectProgram(program: CompiledProgram, ffmpegPath = 'ffmpeg'): ProgramInspection {
  return {
    canvas: {
      width: program.canvas.width,
      height: program.canvas.height,
      frameRate: formatFrameRate(program.canvas.frameRate),
    },
    duration: program.duration,
    inputs: program.inputs.map((input) => ({ ...input, args: [...input.args] })),
    filterGraph: program.filterGraph,
    nodes: program.nodes.map((node) => ({
      filter: node.filter,
      params: node.params,
      inputs: [...node.inputs],
      outputs: [...node.outputs],
      owner: node.owner,
    })),
    maps: { video: program.videoOutput, audio: program.audioOutput },
    output: { ...program.output },
    encoder: { ...program.encoder, extraArgs: [...program.encoder.extraArgs] },
    args: [...program.args],
    commandLine: toCommandLine(program, ffmpegPath),
    diagnostics: program.diagnostics.map((diagnostic) => ({ ...diagnostic })),
  };
}
