// services/seed.ts
import type { Activity } from '../models/activity';
import type { ActivityStore } from './activity-store';
import { logger } from '../utils/logger';

export const SEED_ACTIVITIES: readonly Activity[] = [
  {
    name: 'Chess Club',
    description: 'Learn strategies and compete in chess tournaments',
    schedule: 'Fridays, 3:30 PM - 5:00 PM',
    maxParticipants: 12,
    participants: ['michael@mergington.edu', 'daniel@mergington.edu'],
  },
  {
    name: 'Programming Class',
    description: 'Learn programming fundamentals and build software projects',
    schedule: 'Tuesdays and Thursdays, 3:30 PM - 4:30 PM',
    maxParticipants: 20,
    participants: ['emma@mergington.edu', 'sophia@mergington.edu'],
  },
  {
    name: 'Gym Class',
    description: 'Physical education and sports activities',
    schedule: 'Mondays, Wednesdays, Fridays, 2:00 PM - 3:00 PM',
    maxParticipants: 30,
    participants: ['john@mergington.edu', 'olivia@mergington.edu'],
  },
];

/**
 * Populates an empty store with the seed activities.
 * @returns the number of activities inserted (0 when the store already has data)
 */
export function seedActivities(store: ActivityStore): number {
  return store.transaction(() => {
    const existing = store.count();
    if (existing > 0) {
      logger.info(`Store already holds ${existing} activities. Skipping seed.`);
      return 0;
    }
    const inserted = store.insertMany(
      SEED_ACTIVITIES.map((a) => ({ ...a, participants: [...a.participants] }))
    );
    logger.info(`Seeded ${inserted.length} activities.`);
    return inserted.length;
  });
}
