/**
 * Canvas Resolver
 *
 * Precedence: explicit canvas, then an image or video background's intrinsic
 * size, then the bounding box of the layers. The last one is a best-effort
 * guess and always comes with a diagnostic.
 */

import type { Background, Canvas, FrameRate, LayerSource, SceneSnapshot } from '@/types/scene';
import type { Diagnostic } from '@/types/program';
import { ResolutionError } from '@/lib/errors';
import { toFrameRate } from '@/lib/frame-rate';
import { createLogger } from '@/lib/logger';
import { estimateLayerRect, type Box } from './geometry-resolver';

const log = createLogger('CanvasResolver');

export type CanvasSource = 'explicit' | 'background' | 'layers';

export interface CanvasResolution {
  canvas: Canvas;
  source: CanvasSource;
  diagnostics: Diagnostic[];
}

export function sourceBox(source: LayerSource): Box {
  return source.kind === 'video'
    ? { width: source.video.width, height: source.video.height }
    : { width: source.foreground.width, height: source.foreground.height };
}

function roundUpToEven(value: number): number {
  return Math.ceil(value / 2) * 2;
}

function backgroundCanvas(background: Background, defaultRate: FrameRate): Canvas | null {
  switch (background.kind) {
    case 'image':
      return {
        width: background.width,
        height: background.height,
        frameRate: background.frameRate ?? defaultRate,
      };
    case 'video':
      return {
        width: background.width,
        height: background.height,
        frameRate: background.frameRate,
      };
    case 'color':
    case 'transparent':
      return null;
  }
}

export function resolveCanvas(
  scene: Pick<SceneSnapshot, 'canvas' | 'background' | 'layers'>,
  defaultFrameRate: number
): CanvasResolution {
  const defaultRate = toFrameRate(defaultFrameRate);

  if (scene.canvas) {
    return { canvas: { ...scene.canvas }, source: 'explicit', diagnostics: [] };
  }

  const fromBackground = backgroundCanvas(scene.background, defaultRate);
  if (fromBackground) {
    log.debug('Canvas taken from background', fromBackground);
    return { canvas: fromBackground, source: 'background', diagnostics: [] };
  }

  if (scene.layers.length === 0) {
    throw new ResolutionError(
      `Cannot determine the canvas: no explicit canvas, a ${scene.background.kind} background has no size, and there are no layers`
    );
  }

  let right = 0;
  let bottom = 0;
  for (const layer of scene.layers) {
    const rect = estimateLayerRect(layer, sourceBox(layer.source));
    right = Math.max(right, rect.x + rect.width);
    bottom = Math.max(bottom, rect.y + rect.height);
  }

  const canvas: Canvas = {
    width: roundUpToEven(right),
    height: roundUpToEven(bottom),
    frameRate: defaultRate,
  };
  if (canvas.width < 2 || canvas.height < 2) {
    throw new ResolutionError(`Layer bounds give an empty canvas (${canvas.width}x${canvas.height})`);
  }

  const diagnostic: Diagnostic = {
    level: 'warn',
    code: 'canvas-from-layers',
    message: `No canvas or sized background; using layer bounds ${canvas.width}x${canvas.height} at ${defaultFrameRate} fps`,
  };
  return { canvas, source: 'layers', diagnostics: [diagnostic] };
}
