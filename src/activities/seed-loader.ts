import { readFile } from 'fs/promises';
import { z } from 'zod';
import { SeedFileError } from './errors.js';
import { MERGINGTON_ACTIVITIES } from './seed.js';
import type { ActivityMap } from './types.js';
import { logger } from '../utils/logger.js';

const activitySchema = z
  .object({
    description: z.string().min(1),
    schedule: z.string().min(1),
    max_participants: z.number().int().positive(),
    participants: z.array(z.string()).default([]),
  })
  .refine((a) => new Set(a.participants).size === a.participants.length, {
    message: 'participants must be unique',
    path: ['participants'],
  });

export const activityMapSchema = z.record(z.string().min(1), activitySchema);

export function parseActivities(data: unknown, source: string): ActivityMap {
  const parsed = activityMapSchema.safeParse(data);
  if (!parsed.success) {
    const reason = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new SeedFileError(source, reason);
  }
  return parsed.data;
}

/** Seed activities from `file` when given, otherwise the built-in Mergington list. */
export async function loadSeedActivities(file?: string): Promise<ActivityMap> {
  if (!file) return MERGINGTON_ACTIVITIES;

  let raw: string;
  try {
    raw = await readFile(file, 'utf-8');
  } catch (err) {
    throw new SeedFileError(file, err instanceof Error ? err.message : String(err));
  }

  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch (err) {
    throw new SeedFileError(file, `not valid JSON (${err instanceof Error ? err.message : String(err)})`);
  }

  const activities = parseActivities(data, file);
  logger.info('SEED', `Loaded ${Object.keys(activities).length} activities from ${file}`);
  return activities;
}
