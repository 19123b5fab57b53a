// routes/activities.ts
import { Router, Request, Response } from 'express';
import { z } from 'zod';
import type { ActivityStore } from '../services/activity-store';
import { ConflictError, NotFoundError, ValidationError } from '../middleware/error-handler';
import { logger } from '../utils/logger';
import { toActivityRecord } from '../models/activity';
import type { ActivityMap, ActivityRecord } from '../models/activity';

const ParticipantQuerySchema = z.object({
  email: z.string({
    required_error: 'email query parameter is required',
    invalid_type_error: 'email query parameter must be a single value',
  }).min(1, 'email query parameter must not be empty'),
});

export type ParticipantQuery = z.infer<typeof ParticipantQuerySchema>;

export function parseParticipantQuery(query: unknown): ParticipantQuery {
  const result = ParticipantQuerySchema.safeParse(query);
  if (!result.success) {
    throw new ValidationError(result.error.issues[0]?.message ?? 'Invalid query parameters');
  }
  return result.data;
}

export function createActivitiesRouter(store: ActivityStore): Router {
  const router = Router({ caseSensitive: true, strict: true });

  // GET /activities - every activity with its current roster
  router.get('/', (_req: Request, res: Response) => {
    const body: ActivityMap = Object.fromEntries(
      [...store.getAll()].map(([name, activity]): [string, ActivityRecord] => [name, toActivityRecord(activity)])
    );
    res.json(body);
  });

  // POST /activities/:activityName/signup?email=
  router.post('/:activityName/signup', (req: Request, res: Response) => {
    const { activityName } = req.params;
    if (!store.contains(activityName)) {
      throw new NotFoundError();
    }
    const { email } = parseParticipantQuery(req.query);

    if (store.hasParticipant(activityName, email)) {
      throw new ConflictError(`${email} is already signed up for this activity`);
    }

    store.addParticipant(activityName, email);
    logger.info(`Signed up ${email} for ${activityName}.`);
    res.json({ message: `Signed up ${email} for ${activityName}` });
  });

  // DELETE /activities/:activityName/unregister?email=
  router.delete('/:activityName/unregister', (req: Request, res: Response) => {
    const { activityName } = req.params;
    if (!store.contains(activityName)) {
      throw new NotFoundError();
    }
    const { email } = parseParticipantQuery(req.query);

    if (!store.hasParticipant(activityName, email)) {
      throw new ConflictError(`${email} is not signed up for this activity`);
    }

    store.removeParticipant(activityName, email);
    logger.info(`Unregistered ${email} from ${activityName}.`);
    res.json({ message: `Unregistered ${email} from ${activityName}` });
  });

  return router;
}
