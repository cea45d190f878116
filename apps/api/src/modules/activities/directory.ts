/**
 * Activity Directory
 *
 * In-memory catalog of extracurricular activities and their participants.
 * One directory is owned by each server instance and handed to the route
 * handlers through the `activities` decorator.
 *
 * Every operation is synchronous, so a check-then-mutate sequence always
 * completes inside a single turn of the event loop and concurrent requests
 * cannot lose updates.
 */

import { ActivityCatalogSchema, type Activity, type ActivityCatalog } from '@mergington/types';

import {
  ActivityFullError,
  ActivityNotFoundError,
  AlreadySignedUpError,
  NotRegisteredError,
} from './errors';
import { createSeedActivities } from './seed';

export interface ParticipantCount {
  activity: string;
  participants: number;
  capacity: number;
}

export class ActivityDirectory {
  private readonly activities: Map<string, Activity>;

  constructor(catalog: ActivityCatalog) {
    const validated = ActivityCatalogSchema.parse(catalog);
    this.activities = new Map(Object.entries(validated));
  }

  static fromSeed(): ActivityDirectory {
    return new ActivityDirectory(createSeedActivities());
  }

  get size(): number {
    return this.activities.size;
  }

  names(): string[] {
    return Array.from(this.activities.keys());
  }

  has(activityName: string): boolean {
    return this.activities.has(activityName);
  }

  /**
   * Live record for one activity. Changes made to it are visible to every
   * later request.
   */
  get(activityName: string): Activity | undefined {
    return this.activities.get(activityName);
  }

  /**
   * Name → activity mapping in seed order. The records are the live ones,
   * not copies.
   */
  list(): Readonly<Record<string, Activity>> {
    return Object.fromEntries(this.activities);
  }

  signup(activityName: string, email: string): Activity {
    const activity = this.require(activityName);

    if (activity.participants.includes(email)) {
      throw new AlreadySignedUpError(activityName);
    }

    // >= rather than === so a capacity lowered below the current count still rejects
    if (activity.participants.length >= activity.max_participants) {
      throw new ActivityFullError(activityName, activity.max_participants);
    }

    activity.participants.push(email);
    return activity;
  }

  unregister(activityName: string, email: string): Activity {
    const activity = this.require(activityName);

    const index = activity.participants.indexOf(email);
    if (index === -1) {
      throw new NotRegisteredError(activityName);
    }

    activity.participants.splice(index, 1);
    return activity;
  }

  participantCounts(): ParticipantCount[] {
    return Array.from(this.activities, ([activity, record]) => ({
      activity,
      participants: record.participants.length,
      capacity: record.max_participants,
    }));
  }

  private require(activityName: string): Activity {
    const activity = this.activities.get(activityName);
    if (!activity) {
      throw new ActivityNotFoundError(activityName);
    }
    return activity;
  }
}
