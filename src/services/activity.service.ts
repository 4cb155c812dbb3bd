/**
 * In-memory extracurricular activity catalog. State lives for the process
 * lifetime only; each ActivityService instance owns its own copy of the seed.
 */
import type { Activity, ActivityCatalog } from '../types';

const SEED_ACTIVITIES: ActivityCatalog = {
  'Chess Club': {
    description: 'Learn strategies and compete in chess tournaments',
    schedule: 'Fridays, 3:30 PM - 5:00 PM',
    max_participants: 12,
    participants: ['michael@school.example', 'daniel@school.example'],
  },
  'Programming Class': {
    description: 'Learn programming fundamentals and build software projects',
    schedule: 'Tuesdays and Thursdays, 3:30 PM - 4:30 PM',
    max_participants: 20,
    participants: ['emma@school.example', 'sophia@school.example'],
  },
  'Gym Class': {
    description: 'Physical education and sports activities',
    schedule: 'Mondays, Wednesdays, Fridays, 2:00 PM - 3:00 PM',
    max_participants: 30,
    participants: ['john@school.example', 'olivia@school.example'],
  },
};

function cloneCatalog(catalog: ActivityCatalog): ActivityCatalog {
  const copy: ActivityCatalog = {};
  for (const [name, activity] of Object.entries(catalog)) {
    copy[name] = { ...activity, participants: [...activity.participants] };
  }
  return copy;
}

export class ActivityService {
  private readonly activities: ActivityCatalog;

  constructor(seed: ActivityCatalog = SEED_ACTIVITIES) {
    this.activities = cloneCatalog(seed);
  }

  list(): ActivityCatalog {
    return this.activities;
  }

  get(name: string): Activity | undefined {
    return Object.prototype.hasOwnProperty.call(this.activities, name) ? this.activities[name] : undefined;
  }

  /**
   * Append a participant. Returns false when the activity does not exist.
   * Repeat sign-ups append duplicates; capacity is not enforced.
   */
  signup(name: string, email: string): boolean {
    const activity = this.get(name);
    if (!activity) return false;
    activity.participants.push(email);
    return true;
  }
}
