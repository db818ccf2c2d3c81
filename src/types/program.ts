/**
 * Compiled program types: what the compiler hands to the media engine.
 */

import type { Canvas } from './scene';
import type { EncoderProfileData } from './encoder';

/**
 * One filter invocation in the graph.
 * Rendered as `[in0][in1]filter=params[out0]`.
 */
export interface FilterNode {
  filter: string;
  /** Parameter string after `=`, empty when the filter takes none */
  params: string;
  inputs: string[];
  outputs: string[];
  /** Layer that owns the node, 'background' or 'audio' */
  owner: string;
}

export type InputRole =
  | 'background'
  | 'layer'
  | 'layer-color'
  | 'layer-alpha'
  | 'layer-audio';

export interface ProgramInput {
  index: number;
  role: InputRole;
  /** Layer id, or 'background' */
  owner: string;
  /** Options placed before `-i`, followed by `-i <source>` */
  args: string[];
  source: string;
}

export type StreamFormat = 'webm' | 'matroska' | 'mp4-fragmented' | 'y4m';

export type OutputTarget =
  | { kind: 'file'; path: string }
  | { kind: 'pipe'; format: StreamFormat };

export type DiagnosticLevel = 'info' | 'warn';

export type DiagnosticCode =
  | 'canvas-from-layers'
  | 'silent-output'
  | 'unbounded-duration'
  | 'audio-unsupported';

export interface Diagnostic {
  level: DiagnosticLevel;
  code: DiagnosticCode;
  message: string;
}

export interface CompiledLayer {
  id: string;
  inputIndexes: number[];
  /** Label of the layer's stream right before its overlay */
  videoLabel: string;
  start: number;
  end: number | null;
  enable: string | null;
}

export interface CompiledProgram {
  canvas: Canvas;
  /** Output duration in seconds, null when the scene leaves it open */
  duration: number | null;
  inputs: ProgramInput[];
  nodes: FilterNode[];
  filterGraph: string;
  videoOutput: string;
  audioOutput: string | null;
  layers: CompiledLayer[];
  output: OutputTarget;
  encoder: EncoderProfileData;
  args: string[];
  diagnostics: Diagnostic[];
}
