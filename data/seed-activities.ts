// data/seed-activities.ts
import { z } from 'zod';
import seedJson from './activities.json';
import type { Activity } from '../models/activity';

const ActivityRecordSchema = z.object({
  description: z.string().min(1),
  schedule: z.string().min(1),
  max_participants: z.number().int().positive(),
  participants: z
    .array(z.string().min(1))
    .default([])
    .refine(list => new Set(list).size === list.length, {
      message: 'participants must not contain duplicate emails',
    }),
});

const ActivitySeedSchema = z.record(z.string().min(1), ActivityRecordSchema);

/**
 * Validates a name → record object in the wire format and converts it into
 * Activity entries, in the object's key order.
 * @throws Error naming the first offending activity and field
 */
export function parseActivitySeed(input: unknown): Activity[] {
  const result = ActivitySeedSchema.safeParse(input);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue ? issue.path.join('.') : '';
    throw new Error(`Invalid activity seed at "${where}": ${issue?.message ?? 'unknown error'}`);
  }

  return Object.entries(result.data).map(([name, record]) => ({
    name,
    description: record.description,
    schedule: record.schedule,
    maxParticipants: record.max_participants,
    participants: record.participants,
  }));
}

export function loadDefaultActivities(): Activity[] {
  return parseActivitySeed(seedJson);
}
