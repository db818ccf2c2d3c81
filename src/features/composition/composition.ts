/**
 * Composition
 *
 * Owns the background and the ordered layers (first added = lowest).
 * Compiling always works on a frozen snapshot, so later edits never leak
 * into a program that was already built.
 */

import type {
  Background,
  Canvas,
  Foreground,
  LayerSource,
  SceneSnapshot,
  VideoBackground,
} from '@/types/scene';
import type { CompiledProgram, OutputTarget, StreamFormat } from '@/types/program';
import { getConfig, type ConfigOverrides } from '@/lib/config';
import { ConfigurationError } from '@/lib/errors';
import { toFrameRate, type FrameRateInput } from '@/lib/frame-rate';
import { deepFreeze } from '@/lib/freeze';
import { compileScene } from '@/features/compiler/compile';
import type { EncoderProfile } from '@/features/compiler/encoder-profile';
import { inspectProgram, type ProgramInspection } from '@/features/compiler/program-emitter';
import { runProgram, type EngineResult, type RunOptions } from '@/features/engine/engine-runner';
import { transparentBackground } from './backgrounds';
import { defaultLayerState, LayerHandle, type LayerStack } from './layer-handle';
import { requireDuration, requirePositiveInteger } from './validation';

const LAYER_NAME = /^[A-Za-z0-9_-]+$/;

export interface CompositionOptions {
  canvas?: { width: number; height: number; frameRate?: FrameRateInput };
  duration?: number | null;
  background?: Background;
}

function toLayerSource(source: Foreground | VideoBackground): LayerSource {
  if ('encoding' in source) {
    return { kind: 'foreground', foreground: source };
  }
  return { kind: 'video', video: source };
}

export class Composition implements LayerStack {
  private canvasValue: Canvas | null = null;
  private durationValue: number | null = null;
  private backgroundValue: Background = transparentBackground();
  private backgroundSet = false;
  private handles: LayerHandle[] = [];
  private nextLayerNumber = 1;

  constructor(options: CompositionOptions = {}) {
    if (options.canvas) {
      this.setCanvas(options.canvas.width, options.canvas.height, options.canvas.frameRate);
    }
    if (options.duration !== undefined) this.setDuration(options.duration);
    if (options.background) this.setBackground(options.background);
  }

  /**
   * Fix the output size; wins over any background or layer size
   */
  setCanvas(width: number, height: number, frameRate: FrameRateInput = getConfig().defaultFrameRate): this {
    this.canvasValue = {
      width: requirePositiveInteger(width, 'canvas.width'),
      height: requirePositiveInteger(height, 'canvas.height'),
      frameRate: toFrameRate(frameRate),
    };
    return this;
  }

  setDuration(seconds: number | null): this {
    this.durationValue = requireDuration(seconds);
    return this;
  }

  setBackground(background: Background): this {
    this.backgroundValue = background;
    this.backgroundSet = true;
    return this;
  }

  get canvas(): Canvas | null {
    return this.canvasValue ? { ...this.canvasValue, frameRate: { ...this.canvasValue.frameRate } } : null;
  }

  get background(): Background {
    return this.backgroundValue;
  }

  /** Handles in z-order, lowest first */
  get layers(): LayerHandle[] {
    return [...this.handles];
  }

  /**
   * Add a layer on top of the existing ones.
   * Names must be unique; unnamed layers get `layer1`, `layer2`, …
   */
  add(source: Foreground | VideoBackground, name?: string): LayerHandle {
    const id = name ?? this.nextLayerName();
    if (!LAYER_NAME.test(id)) {
      throw new ConfigurationError(`Layer name "${id}" may only use letters, digits, _ and -`, 'name');
    }
    if (this.handles.some((handle) => handle.id === id)) {
      throw new ConfigurationError(`A layer named "${id}" already exists`, 'name');
    }

    const handle = new LayerHandle(defaultLayerState(id, toLayerSource(source)), this);
    this.handles.push(handle);
    return handle;
  }

  layer(id: string): LayerHandle {
    const handle = this.handles.find((candidate) => candidate.id === id);
    if (!handle) {
      throw new ConfigurationError(`No layer named "${id}"`, 'name');
    }
    return handle;
  }

  remove(id: string): this {
    const handle = this.layer(id);
    this.handles = this.handles.filter((candidate) => candidate !== handle);
    return this;
  }

  /**
   * Set the z-order; `ids` must name every layer exactly once, lowest first
   */
  reorder(ids: string[]): this {
    const unique = new Set(ids);
    if (unique.size !== ids.length || ids.length !== this.handles.length) {
      throw new ConfigurationError('reorder needs every layer id exactly once', 'layers');
    }
    this.handles = ids.map((id) => this.layer(id));
    return this;
  }

  /**
   * Move one layer to `index` in the z-order, keeping the others in their order
   */
  moveLayer(id: string, index: number): void {
    const handle = this.layer(id);
    if (!Number.isInteger(index) || index < 0 || index >= this.handles.length) {
      throw new ConfigurationError(
        `z index must be a whole number from 0 to ${this.handles.length - 1}, got ${index}`,
        'z'
      );
    }
    const rest = this.handles.filter((candidate) => candidate !== handle);
    this.handles = [...rest.slice(0, index), handle, ...rest.slice(index)];
  }

  /**
   * Frozen copy of the scene as it is now
   */
  snapshot(): SceneSnapshot {
    return deepFreeze({
      canvas: this.canvas,
      duration: this.durationValue,
      background: structuredClone(this.backgroundValue),
      backgroundImplicit: !this.backgroundSet,
      layers: this.handles.map((handle) => handle.toState()),
    });
  }

  compile(profile: EncoderProfile, output: OutputTarget, overrides?: ConfigOverrides): CompiledProgram {
    return compileScene(this.snapshot(), profile, output, overrides);
  }

  toFile(path: string, profile: EncoderProfile, overrides?: ConfigOverrides): CompiledProgram {
    return this.compile(profile, { kind: 'file', path }, overrides);
  }

  toStream(format: StreamFormat, profile: EncoderProfile, overrides?: ConfigOverrides): CompiledProgram {
    return this.compile(profile, { kind: 'pipe', format }, overrides);
  }

  /**
   * Compile without running; returns the inspection form
   */
  dryRun(profile: EncoderProfile, output: OutputTarget, overrides?: ConfigOverrides): ProgramInspection {
    return inspectProgram(this.compile(profile, output, overrides));
  }

  /**
   * Compile and run ffmpeg
   */
  async render(
    profile: EncoderProfile,
    output: OutputTarget,
    options: RunOptions = {}
  ): Promise<EngineResult> {
    const program = this.compile(profile, output, options.config);
    return runProgram(program, options);
  }

  private nextLayerName(): string {
    let name = `layer${this.nextLayerNumber++}`;
    while (this.handles.some((handle) => handle.id === name)) {
      name = `layer${this.nextLayerNumber++}`;
    }
    return name;
  }
}
