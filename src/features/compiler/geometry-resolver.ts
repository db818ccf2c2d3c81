/**
 * Geometry Resolver
 *
 * Turns anchor/offset/size-mode declarations into the scale and overlay
 * position expressions the filter graph embeds unevaluated. Canvas numbers are
 * substituted directly; `w`/`h` stay symbolic and are evaluated by the overlay
 * filter against the incoming picture, which is already rotated by then.
 */

import type { Anchor, Canvas, CropRect, Position, SizeMode } from '@/types/scene';
import { ConfigurationError } from '@/lib/errors';
import { formatNumber, validateOverlayExpression, withOffset } from './filter-expression';

type Align = 'start' | 'middle' | 'end';

const ANCHOR_ALIGNMENT: Record<Anchor, { x: Align; y: Align }> = {
  'top-left': { x: 'start', y: 'start' },
  'top-center': { x: 'middle', y: 'start' },
  'top-right': { x: 'end', y: 'start' },
  'center-left': { x: 'start', y: 'middle' },
  center: { x: 'middle', y: 'middle' },
  'center-right': { x: 'end', y: 'middle' },
  'bottom-left': { x: 'start', y: 'end' },
  'bottom-center': { x: 'middle', y: 'end' },
  'bottom-right': { x: 'end', y: 'end' },
};

export const ANCHORS: readonly Anchor[] = [
  'top-left',
  'top-center',
  'top-right',
  'center-left',
  'center',
  'center-right',
  'bottom-left',
  'bottom-center',
  'bottom-right',
];

export interface ScalePlan {
  width: string;
  height: string;
  aspect: 'decrease' | 'increase' | null;
}

export interface Placement {
  x: string;
  y: string;
}

export interface Box {
  width: number;
  height: number;
}

export interface Rect extends Box {
  x: number;
  y: number;
}

export interface GeometryPlan {
  scale: ScalePlan;
  placement: Placement;
  /** Target box for canvas-percentage sizing */
  targetBox: Box | null;
}

function isPositiveInteger(value: number): boolean {
  return Number.isInteger(value) && value > 0;
}

export function isAnchor(value: string): value is Anchor {
  return Object.prototype.hasOwnProperty.call(ANCHOR_ALIGNMENT, value);
}

/**
 * Check that a size mode's parameters are jointly consistent.
 */
export function validateSizeMode(size: SizeMode): SizeMode {
  switch (size.mode) {
    case 'contain':
    case 'cover':
    case 'fit-width':
    case 'fit-height':
      return size;
    case 'fixed-pixels':
      if (!isPositiveInteger(size.width) || !isPositiveInteger(size.height)) {
        throw new ConfigurationError(
          'fixed-pixels sizing needs both width and height as positive integers',
          'size'
        );
      }
      return size;
    case 'canvas-percentage':
      if (!Number.isFinite(size.percent) || size.percent <= 0 || size.percent > 100) {
        throw new ConfigurationError(
          `canvas-percentage must be in (0, 100], got ${size.percent}`,
          'size'
        );
      }
      return size;
    case 'scale':
      if (!Number.isFinite(size.factor) || size.factor <= 0) {
        throw new ConfigurationError(`scale factor must be positive, got ${size.factor}`, 'size');
      }
      return size;
  }
}

/**
 * Check a position declaration; custom expressions must only use overlay variables.
 */
export function validatePosition(position: Position): Position {
  if (position.kind === 'expression') {
    return {
      kind: 'expression',
      x: validateOverlayExpression(position.x, 'x'),
      y: validateOverlayExpression(position.y, 'y'),
    };
  }
  if (!isAnchor(position.anchor)) {
    throw new ConfigurationError(`Unknown anchor "${position.anchor}"`, 'anchor');
  }
  if (!Number.isFinite(position.dx) || !Number.isFinite(position.dy)) {
    throw new ConfigurationError('Anchor offsets must be finite numbers', 'offset');
  }
  return position;
}

export function targetBoxFor(size: SizeMode, canvas: Canvas): Box | null {
  if (size.mode !== 'canvas-percentage') return null;
  return {
    width: Math.floor((canvas.width * size.percent) / 100),
    height: Math.floor((canvas.height * size.percent) / 100),
  };
}

export function resolveScale(size: SizeMode, canvas: Canvas): ScalePlan {
  const W = String(canvas.width);
  const H = String(canvas.height);

  switch (size.mode) {
    case 'contain':
      return { width: W, height: H, aspect: 'decrease' };
    case 'cover':
      return { width: W, height: H, aspect: 'increase' };
    case 'fixed-pixels':
      return { width: String(size.width), height: String(size.height), aspect: null };
    case 'canvas-percentage': {
      const box = targetBoxFor(size, canvas);
      if (!box || box.width < 1 || box.height < 1) {
        throw new ConfigurationError(
          `canvas-percentage ${size.percent} leaves no pixels on a ${canvas.width}x${canvas.height} canvas`,
          'size'
        );
      }
      return { width: String(box.width), height: String(box.height), aspect: 'decrease' };
    }
    case 'scale': {
      const factor = formatNumber(size.factor);
      return { width: `iw*${factor}`, height: `ih*${factor}`, aspect: null };
    }
    case 'fit-width':
      return { width: W, height: '-2', aspect: null };
    case 'fit-height':
      return { width: '-2', height: H, aspect: null };
  }
}

export function scaleParams(plan: ScalePlan): string {
  const base = `${plan.width}:${plan.height}`;
  return plan.aspect ? `${base}:force_original_aspect_ratio=${plan.aspect}` : base;
}

function axisExpression(
  align: Align,
  canvasSize: number,
  offset: number,
  sizeVariable: 'w' | 'h',
  box: number | null
): string {
  if (box === null) {
    const base = {
      start: '0',
      middle: `(${canvasSize}-${sizeVariable})/2`,
      end: `${canvasSize}-${sizeVariable}`,
    }[align];
    return withOffset(base, offset);
  }

  // Place the target box on the canvas, then align the picture inside it
  const origin =
    align === 'start' ? 0 : align === 'middle' ? (canvasSize - box) / 2 : canvasSize - box;
  const boxOrigin = formatNumber(origin + offset);
  if (align === 'start') return boxOrigin;
  if (align === 'middle') return `${boxOrigin}+(${box}-${sizeVariable})/2`;
  return `${boxOrigin}+${box}-${sizeVariable}`;
}

export function resolvePlacement(position: Position, size: SizeMode, canvas: Canvas): Placement {
  if (position.kind === 'expression') {
    return { x: position.x, y: position.y };
  }

  const alignment = ANCHOR_ALIGNMENT[position.anchor];
  const box = targetBoxFor(size, canvas);

  return {
    x: axisExpression(alignment.x, canvas.width, position.dx, 'w', box ? box.width : null),
    y: axisExpression(alignment.y, canvas.height, position.dy, 'h', box ? box.height : null),
  };
}

export function resolveGeometry(
  layer: { position: Position; size: SizeMode },
  canvas: Canvas
): GeometryPlan {
  return {
    scale: resolveScale(layer.size, canvas),
    placement: resolvePlacement(layer.position, layer.size, canvas),
    targetBox: targetBoxFor(layer.size, canvas),
  };
}

/**
 * Rectangle a layer would occupy before any canvas exists. Used only to
 * derive a canvas from layer bounds: modes relative to the canvas fall back
 * to the source's own (cropped) size, and anchors collapse to the origin
 * shifted by positive offsets. A rotated layer takes the bounding box of the
 * rotated picture, as `rotate` with `rotw`/`roth` outputs it.
 */
export function estimateLayerRect(
  layer: { position: Position; size: SizeMode; crop: CropRect | null; rotation: number },
  source: Box
): Rect {
  const base: Box = layer.crop
    ? { width: layer.crop.width, height: layer.crop.height }
    : { width: source.width, height: source.height };

  let box: Box;
  switch (layer.size.mode) {
    case 'fixed-pixels':
      box = { width: layer.size.width, height: layer.size.height };
      break;
    case 'scale':
      box = {
        width: Math.round(base.width * layer.size.factor),
        height: Math.round(base.height * layer.size.factor),
      };
      break;
    default:
      box = base;
  }

  if (layer.rotation % 360 !== 0) box = rotatedBounds(box, layer.rotation);

  const x = layer.position.kind === 'anchor' ? Math.max(0, layer.position.dx) : 0;
  const y = layer.position.kind === 'anchor' ? Math.max(0, layer.position.dy) : 0;
  return { x, y, ...box };
}

export function rotatedBounds(box: Box, degrees: number): Box {
  const radians = (degrees * Math.PI) / 180;
  const cos = Math.abs(Math.cos(radians));
  const sin = Math.abs(Math.sin(radians));
  // float noise at right angles must not add a pixel
  const extent = (value: number): number => Math.ceil(value - 1e-6);
  return {
    width: extent(box.width * cos + box.height * sin),
    height: extent(box.width * sin + box.height * cos),
  };
}
