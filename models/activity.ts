// models/activity.ts
export interface Activity {
  name: string;
  description: string;
  schedule: string;
  // Informational only; signup does not enforce it.
  maxParticipants: number;
  participants: string[];
}

// Shape of one activity on the wire, keyed by name in the enclosing object
export interface ActivityRecord {
  description: string;
  schedule: string;
  max_participants: number;
  participants: string[];
}

export type ActivityMap = Record<string, ActivityRecord>;

export function toActivityRecord(activity: Activity): ActivityRecord {
  return {
    description: activity.description,
    schedule: activity.schedule,
    max_participants: activity.maxParticipants,
    participants: [...activity.participants],
  };
}
