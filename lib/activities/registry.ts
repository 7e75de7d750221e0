/**
 * In-memory registry of extracurricular activities and their rosters.
 *
 * Seeded once at startup; activities are never added or removed afterwards,
 * only their participant lists change.
 */

import type { Activity, ActivityMap, RegistryResult } from "./types";
import { ActivityNotFoundError, ParticipantConflictError } from "./errors";

function copyActivity(activity: Activity): Activity {
  return { ...activity, participants: [...activity.participants] };
}

export class ActivityRegistry {
  private activities: Map<string, Activity> = new Map();

  constructor(seed: ActivityMap) {
    for (const [name, activity] of Object.entries(seed)) {
      this.activities.set(name, copyActivity(activity));
    }
  }

  list(): ActivityMap {
    const snapshot: ActivityMap = {};
    for (const [name, activity] of this.activities) {
      snapshot[name] = copyActivity(activity);
    }
    return snapshot;
  }

  get(activityName: string): Activity | undefined {
    const activity = this.activities.get(activityName);
    return activity ? copyActivity(activity) : undefined;
  }

  signUp(activityName: string, email: string): RegistryResult {
    const activity = this.require(activityName);
    if (activity.participants.includes(email)) {
      throw new ParticipantConflictError(
        "Student is already signed up for this activity",
        activityName,
        email,
      );
    }
    activity.participants.push(email);
    return { message: `Signed up ${email} for ${activityName}` };
  }

  unregister(activityName: string, email: string): RegistryResult {
    const activity = this.require(activityName);
    const index = activity.participants.indexOf(email);
    if (index === -1) {
      throw new ParticipantConflictError(
        "Student is not registered for this activity",
        activityName,
        email,
      );
    }
    activity.participants.splice(index, 1);
    return { message: `Unregistered ${email} from ${activityName}` };
  }

  private require(activityName: string): Activity {
    const activity = this.activities.get(activityName);
    if (!activity) throw new ActivityNotFoundError(activityName);
    return activity;
  }
}

export function createActivityRegistry(seed: ActivityMap): ActivityRegistry {
  return new ActivityRegistry(seed);
}
