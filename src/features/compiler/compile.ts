/**
 * Compile a scene snapshot into a CompiledProgram.
 *
 * Pure apart from logging: the same snapshot, profile and target always
 * give an identical program.
 */

import type { SceneSnapshot } from '@/types/scene';
import type { CompiledProgram, OutputTarget } from '@/types/program';
import { resolveConfig, type ConfigOverrides } from '@/lib/config';
import { createLogger } from '@/lib/logger';
import { colorHasAlpha } from '@/features/composition/backgrounds';
import { resolveCanvas } from './canvas-resolver';
import { applyEncoderProfile, type EncoderProfile } from './encoder-profile';
import { buildFilterGraph } from './filter-graph-builder';
import { emitProgram, toCommandLine } from './program-emitter';

const log = createLogger('Compiler');

/**
 * Whether the output must keep an alpha plane: a transparent background, or
 * a color background that is not fully opaque
 */
export function sceneRequiresAlpha(scene: Pick<SceneSnapshot, 'background'>): boolean {
  const { background } = scene;
  if (background.kind === 'transparent') return true;
  return background.kind === 'color' && colorHasAlpha(background.color);
}

export function compileScene(
  scene: SceneSnapshot,
  profile: EncoderProfile,
  output: OutputTarget,
  overrides?: ConfigOverrides
): CompiledProgram {
  const config = resolveConfig(overrides);
  const snapshot: SceneSnapshot = structuredClone(scene);
  const requiresAlpha = sceneRequiresAlpha(snapshot);

  applyEncoderProfile(profile, requiresAlpha, output);

  const { canvas, source, diagnostics } = resolveCanvas(snapshot, config.defaultFrameRate);
  log.debug(`Canvas ${canvas.width}x${canvas.height} from ${source}`);

  const build = buildFilterGraph(snapshot, {
    canvas,
    maskThreshold: config.maskThreshold,
    alpha: requiresAlpha,
    audio: profile.carriesAudio,
  });

  const program = emitProgram(build, canvas, profile, output, diagnostics);

  for (const diagnostic of program.diagnostics) {
    if (diagnostic.level === 'warn') {
      log.warn(`${diagnostic.code}: ${diagnostic.message}`);
    } else {
      log.info(`${diagnostic.code}: ${diagnostic.message}`);
    }
  }
  log.debug('Compiled program', {
    layers: program.layers.length,
    nodes: program.nodes.length,
    command: toCommandLine(program, config.ffmpegPath),
  });

  return program;
}
