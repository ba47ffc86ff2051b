/**
 * Task — pushapk task definition (authorization scopes + publishing payload)
 *
 * Scopes are assumed to be verified upstream; this only checks the shape.
 */

import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import type { PushApkTask } from '../types/index.js';
import { TaskValidationError } from '../errors/PlayPushError.js';

export const PublishingPayloadSchema = z
  .object({
    google_play_track: z.string().min(1).optional(),
    rollout_percentage: z.number().int().min(0).max(100).optional(),
    commit: z.boolean().optional(),
    dry_run: z.boolean().optional(),
    update_gp_strings_from_l10n_store: z.boolean().optional(),
  })
  .passthrough();

export const PushApkTaskSchema = z.object({
  scopes: z.array(z.string()),
  payload: PublishingPayloadSchema,
});

export function parseTask(raw: unknown, source = 'task'): PushApkTask {
  const result = PushApkTaskSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map(i => `${i.path.join('.') || '(root)'}: ${i.message}`);
    throw new TaskValidationError(`Invalid task in ${source}: ${issues.join('; ')}`, { source, issues });
  }
  return result.data;
}

export async function loadTask(filePath: string): Promise<PushApkTask> {
  let raw: string;
  try {
    raw = await readFile(filePath, 'utf-8');
  } catch (err) {
    throw new TaskValidationError(`Cannot read task file ${filePath}`, { path: filePath }, { cause: err });
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (err) {
    throw new TaskValidationError(`Task file ${filePath} is not valid JSON`, { path: filePath }, { cause: err });
  }
  return parseTask(json, filePath);
}
