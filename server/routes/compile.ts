import { Router, type Request, type Response } from 'express';
import {
  compositionFromScene,
  sceneDocumentSchema,
} from '../../src/features/composition/scene-schema';
import { PROFILE_NAMES, profileByName } from '../../src/features/compiler/encoder-profile';
import { inspectProgram } from '../../src/features/compiler/program-emitter';
import { resolveConfig } from '../../src/lib/config';
import { isScenecastError } from '../../src/lib/errors';
import { createLogger } from '../../src/lib/logger';

const log = createLogger('API');

const router = Router();

/**
 * POST /api/compile
 * Compile a scene document and return the program without running it
 */
router.post('/compile', (req: Request, res: Response) => {
  const parsed = sceneDocumentSchema.safeParse(req.body);
  if (!parsed.success) {
    res.status(400).json({
      success: false,
      error: 'Invalid scene document',
      issues: parsed.error.issues.map((issue) => ({
        path: issue.path.join('.'),
        message: issue.message,
      })),
    });
    return;
  }

  try {
    const { composition, profile, output, overrides } = compositionFromScene(parsed.data);
    const program = composition.compile(profile, output, overrides);
    res.json({
      success: true,
      program: inspectProgram(program, resolveConfig(overrides).ffmpegPath),
    });
  } catch (error) {
    if (isScenecastError(error) && error.kind !== 'engine') {
      res.status(422).json({ success: false, error: error.message, kind: error.kind });
      return;
    }
    log.error('Error in /compile:', error);
    res.status(500).json({
      success: false,
      error: error instanceof Error ? error.message : 'Failed to compile scene',
    });
  }
});

/**
 * GET /api/profiles
 * Built-in encoder profiles
 */
router.get('/profiles', (_req: Request, res: Response) => {
  res.json({
    success: true,
    profiles: PROFILE_NAMES.map((name) => profileByName(name).toJSON()),
  });
});

export default router;
