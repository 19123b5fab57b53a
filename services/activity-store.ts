// services/activity-store.ts
import { logger } from '../utils/logger';
import type { Activity } from '../models/activity';

function copyActivity(activity: Activity): Activity {
  return { ...activity, participants: [...activity.participants] };
}

/**
 * Process-wide set of activities, keyed by name.
 *
 * The store owns its own copies of the seed, so `reset()` always returns to the
 * state it was built with. Mutating calls expect the caller to have checked the
 * preconditions first; a violation is a programming error and throws.
 */
export class ActivityStore {
  private readonly seed: readonly Activity[];
  private activities = new Map<string, Activity>();

  constructor(seed: readonly Activity[]) {
    const names = new Set<string>();
    for (const activity of seed) {
      if (names.has(activity.name)) {
        throw new Error(`Duplicate activity name in seed: ${activity.name}`);
      }
      names.add(activity.name);
    }
    this.seed = seed.map(copyActivity);
    this.reset();
  }

  /** Restores every activity to its seeded roster. */
  reset(): void {
    this.activities = new Map(
      this.seed.map((activity): [string, Activity] => [activity.name, copyActivity(activity)])
    );
    logger.debug(`Activity store reset with ${this.activities.size} activities.`);
  }

  /** Snapshot of every activity, keyed by name in seed order. */
  getAll(): Map<string, Activity> {
    return new Map(
      [...this.activities].map(([name, activity]): [string, Activity] => [name, copyActivity(activity)])
    );
  }

  contains(name: string): boolean {
    return this.activities.has(name);
  }

  hasParticipant(name: string, email: string): boolean {
    return this.activities.get(name)?.participants.includes(email) ?? false;
  }

  addParticipant(name: string, email: string): void {
    const activity = this.require(name);
    if (activity.participants.includes(email)) {
      throw new Error(`${email} is already in the roster of ${name}`);
    }
    activity.participants.push(email);
  }

  removeParticipant(name: string, email: string): void {
    const activity = this.require(name);
    const index = activity.participants.indexOf(email);
    if (index === -1) {
      throw new Error(`${email} is not in the roster of ${name}`);
    }
    activity.participants.splice(index, 1);
  }

  private require(name: string): Activity {
    const activity = this.activities.get(name);
    if (!activity) {
      throw new Error(`Unknown activity: ${name}`);
    }
    return activity;
  }
}
