// Behavior configuration parsing

import { z } from 'zod';
import type { BehaviorConfig } from '@attachable/protocol';
import { InvalidBehaviorConfigError } from './errors.js';

export const behaviorConfigSchema = z
  .object({
    attachMode: z.enum(['atomic', 'partial']).default('atomic'),
    validateEvents: z.boolean().default(false),
  })
  .strict();

/**
 * Config as callers may pass it: every field optional.
 */
export type BehaviorConfigInput = z.input<typeof behaviorConfigSchema>;

export const defaultBehaviorConfig: Readonly<BehaviorConfig> = Object.freeze({
  attachMode: 'atomic',
  validateEvents: false,
});

/**
 * Parse caller-supplied config, filling in defaults.
 *
 * @throws InvalidBehaviorConfigError if the input has unknown keys or wrong types
 */
export function resolveBehaviorConfig(input?: unknown): BehaviorConfig {
  if (input === undefined) {
    return { ...defaultBehaviorConfig };
  }

  const parsed = behaviorConfigSchema.safeParse(input);
  if (!parsed.success) {
    throw new InvalidBehaviorConfigError(
      parsed.error.issues.map((issue) => ({
        path: issue.path.join('.'),
        message: issue.message,
      }))
    );
  }

  return parsed.data;
}
