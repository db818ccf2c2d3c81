/**
 * Layer builder
 *
 * A LayerHandle is the only way to change a layer. Every setter validates its
 * argument before anything is stored and returns the same handle, so calls
 * chain:
 *
 *   composition.add(fg, 'presenter').at('bottom-right', -40, -40).size({ mode: 'canvas-percentage', percent: 30 });
 */

import type {
  Anchor,
  AudioSettings,
  CropRect,
  LayerSource,
  LayerState,
  Position,
  SizeMode,
  TimingDeclaration,
} from '@/types/scene';
import { ConfigurationError } from '@/lib/errors';
import { validatePosition, validateSizeMode } from '@/features/compiler/geometry-resolver';
import { resolveTiming, UNBOUNDED_TIMING } from '@/features/compiler/timing-resolver';
import { sourceBox } from '@/features/compiler/canvas-resolver';
import { requireNonNegativeInteger, requirePositiveInteger, resolveAudio, resolveTrim } from './validation';

export function defaultLayerState(id: string, source: LayerSource): LayerState {
  return {
    id,
    source,
    position: { kind: 'anchor', anchor: 'center', dx: 0, dy: 0 },
    size: { mode: 'contain' },
    opacity: 1,
    rotation: 0,
    crop: null,
    alpha: true,
    timing: { ...UNBOUNDED_TIMING },
    audio: { enabled: true, volume: 1 },
    trim: null,
  };
}

/**
 * Deep copy of a layer's state
 */
export function copyLayerState(state: LayerState): LayerState {
  return {
    ...state,
    position: { ...state.position },
    size: { ...state.size },
    crop: state.crop ? { ...state.crop } : null,
    timing: { ...state.timing },
    audio: { ...state.audio },
    trim: state.trim ? { ...state.trim } : null,
  };
}

/**
 * Z-order owner of a layer, normally its Composition
 */
export interface LayerStack {
  moveLayer(id: string, index: number): void;
}

export class LayerHandle {
  constructor(
    private readonly state: LayerState,
    private readonly stack: LayerStack | null = null
  ) {}

  get id(): string {
    return this.state.id;
  }

  /**
   * Place the layer by anchor, shifted by whole-pixel offsets
   */
  at(anchor: Anchor, dx = 0, dy = 0): this {
    requireInteger(dx, 'dx');
    requireInteger(dy, 'dy');
    this.state.position = validatePosition({ kind: 'anchor', anchor, dx, dy });
    return this;
  }

  /**
   * Place the layer with overlay expressions such as `W-w-20` or plain pixel values
   */
  xy(x: string | number, y: string | number): this {
    this.state.position = validatePosition({ kind: 'expression', x: String(x), y: String(y) });
    return this;
  }

  position(position: Position): this {
    if (position.kind === 'anchor') {
      return this.at(position.anchor, position.dx, position.dy);
    }
    return this.xy(position.x, position.y);
  }

  size(size: SizeMode): this {
    this.state.size = { ...validateSizeMode(size) };
    return this;
  }

  /** Exact pixel size, ignoring the source aspect ratio */
  resize(width: number, height: number): this {
    return this.size({ mode: 'fixed-pixels', width, height });
  }

  opacity(value: number): this {
    if (!Number.isFinite(value) || value < 0 || value > 1) {
      throw new ConfigurationError(`opacity must be between 0 and 1, got ${value}`, 'opacity');
    }
    this.state.opacity = value;
    return this;
  }

  /** Clockwise rotation in degrees */
  rotate(degrees: number): this {
    if (!Number.isFinite(degrees)) {
      throw new ConfigurationError(`rotation must be a finite number of degrees, got ${degrees}`, 'rotation');
    }
    this.state.rotation = degrees;
    return this;
  }

  /**
   * Keep only a rectangle of the source picture, in source pixels
   */
  crop(x: number, y: number, width: number, height: number): this {
    const rect: CropRect = {
      x: requireNonNegativeInteger(x, 'crop.x'),
      y: requireNonNegativeInteger(y, 'crop.y'),
      width: requirePositiveInteger(width, 'crop.width'),
      height: requirePositiveInteger(height, 'crop.height'),
    };
    const box = sourceBox(this.state.source);
    if (rect.x + rect.width > box.width || rect.y + rect.height > box.height) {
      throw new ConfigurationError(
        `crop ${rect.width}x${rect.height}+${rect.x}+${rect.y} exceeds the ${box.width}x${box.height} source`,
        'crop'
      );
    }
    this.state.crop = rect;
    return this;
  }

  start(seconds: number | null): this {
    return this.timing({ ...this.state.timing, start: seconds });
  }

  end(seconds: number | null): this {
    return this.timing({ ...this.state.timing, end: seconds });
  }

  duration(seconds: number | null): this {
    return this.timing({ ...this.state.timing, duration: seconds });
  }

  /**
   * Replace the whole timing declaration; at most two of the three should be set
   */
  timing(timing: TimingDeclaration): this {
    resolveTiming(timing);
    this.state.timing = { ...timing };
    return this;
  }

  /**
   * Use only `[start, end)` of the source media
   */
  subclip(start: number, end?: number | null): this {
    const source = this.state.source.kind === 'video' ? this.state.source.video : this.state.source.foreground;
    this.state.trim = resolveTrim(start, end, source.duration);
    return this;
  }

  /**
   * Use the source's transparency (the default), or flatten it to opaque RGB
   */
  alpha(enabled = true): this {
    if (typeof enabled !== 'boolean') {
      throw new ConfigurationError(`alpha must be true or false, got ${String(enabled)}`, 'alpha');
    }
    this.state.alpha = enabled;
    return this;
  }

  /**
   * Move the layer to position `index` in the z-order, 0 being the lowest
   */
  z(index: number): this {
    if (!this.stack) {
      throw new ConfigurationError(`Layer "${this.state.id}" does not belong to a composition`, 'z');
    }
    this.stack.moveLayer(this.state.id, index);
    return this;
  }

  audio(settings: Partial<AudioSettings>): this {
    this.state.audio = resolveAudio(settings, this.state.audio);
    return this;
  }

  mute(): this {
    return this.audio({ enabled: false });
  }

  /**
   * Copy of the current state
   */
  toState(): LayerState {
    return copyLayerState(this.state);
  }
}

function requireInteger(value: number, field: string): void {
  if (!Number.isInteger(value)) {
    throw new ConfigurationError(`${field} must be a whole number of pixels, got ${value}`, field);
  }
}
