/**
 * Shared fixtures: an in-memory database per test, nothing on disk.
 */

import type Database from 'better-sqlite3';
import type { Activity } from '../models/activity';
import { openDatabase, closeDatabase, MEMORY_DATABASE } from '../services/database';
import { ActivityStore } from '../services/activity-store';

export interface TestStore {
  db: Database.Database;
  store: ActivityStore;
  cleanup: () => void;
}

export function createTestStore(): TestStore {
  const db = openDatabase(MEMORY_DATABASE);
  return {
    db,
    store: new ActivityStore(db),
    cleanup: () => closeDatabase(db),
  };
}

export function makeActivity(overrides: Partial<Activity> = {}): Activity {
  return {
    name: 'Art Club',
    description: 'Painting and drawing',
    schedule: 'Thursdays, 3:30 PM - 5:00 PM',
    maxParticipants: 15,
    participants: [],
    ...overrides,
  };
}
