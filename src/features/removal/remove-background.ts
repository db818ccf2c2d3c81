/**
 * Background removal
 *
 * The removal model itself runs elsewhere. This module only defines what is
 * sent to such a service and turns the foreground descriptor it answers with
 * into a validated Foreground. Job status, webhooks and polling stay on the
 * service's side.
 */

import { z } from 'zod';
import type { Foreground } from '@/types/scene';
import { resolveConfig, type ConfigOverrides, type ModelSize, type PreferredEncoding } from '@/lib/config';
import { ConfigurationError } from '@/lib/errors';
import { createLogger } from '@/lib/logger';
import {
  foregroundDescriptorSchema,
  foregroundFromDescriptor,
} from '@/features/composition/foreground-descriptor';
import { requirePath } from '@/features/composition/validation';

const log = createLogger('BackgroundRemoval');

export interface RemovalOptions {
  /** Transparency encoding to ask for; `auto` lets the service choose */
  prefer: PreferredEncoding;
  model: ModelSize;
  /** Ask for hardware acceleration where the service has it */
  acceleration: boolean;
}

export interface RemovalRequest {
  /** Path or URL of the source video */
  source: string;
  options: RemovalOptions;
}

export interface BackgroundRemovalService {
  submit(request: RemovalRequest): Promise<unknown>;
}

/**
 * Service answer. Anything besides the descriptor is ignored.
 */
export const removalResponseSchema = z
  .object({
    foreground: foregroundDescriptorSchema,
  })
  .passthrough();

export type RemovalResponse = z.infer<typeof removalResponseSchema>;

export function buildRemovalRequest(
  source: string,
  options: Partial<RemovalOptions> = {},
  overrides?: ConfigOverrides
): RemovalRequest {
  const { removal } = resolveConfig(overrides);
  return {
    source: requirePath(source, 'source'),
    options: {
      prefer: options.prefer ?? removal.prefer,
      model: options.model ?? removal.modelSize,
      acceleration: options.acceleration ?? removal.acceleration,
    },
  };
}

export function parseRemovalResponse(response: unknown): Foreground {
  const result = removalResponseSchema.safeParse(response);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ConfigurationError(`Invalid foreground descriptor from removal service: ${issues}`, 'foreground');
  }
  return foregroundFromDescriptor(result.data.foreground);
}

/**
 * Send a video to a removal service and return the transparent foreground it produced.
 */
export async function removeBackground(
  source: string,
  service: BackgroundRemovalService,
  options: Partial<RemovalOptions> = {},
  overrides?: ConfigOverrides
): Promise<Foreground> {
  const request = buildRemovalRequest(source, options, overrides);
  log.info(`Requesting background removal for ${request.source}`, request.options);

  const response = await service.submit(request);
  const foreground = parseRemovalResponse(response);

  const prefer = request.options.prefer;
  if (prefer !== 'auto' && prefer !== foreground.encoding.kind) {
    log.warn(`Asked for ${prefer} but the service returned ${foreground.encoding.kind}`);
  }
  return foreground;
}
