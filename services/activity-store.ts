// services/activity-store.ts
import type Database from 'better-sqlite3';
import { ActivitySchema, mapActivity } from '../models/activity';
import type { Activity, ActivityRow } from '../models/activity';
import { AppError, InfrastructureError, ValidationError } from '../utils/errors';
import { logger } from '../utils/logger';

interface ActivityParams {
  name: string;
  description: string | null;
  schedule: string | null;
  maxParticipants: number | null;
  participants: string;
}

const Q = {
  selectAll: `SELECT id, name, description, schedule, max_participants, participants
              FROM activities ORDER BY id`,
  selectByName: `SELECT id, name, description, schedule, max_participants, participants
                 FROM activities WHERE name = ?`,
  count: 'SELECT COUNT(*) AS count FROM activities',
  upsert: `INSERT INTO activities (name, description, schedule, max_participants, participants)
           VALUES (@name, @description, @schedule, @maxParticipants, @participants)
           ON CONFLICT(name) DO UPDATE SET
             description = excluded.description,
             schedule = excluded.schedule,
             max_participants = excluded.max_participants,
             participants = excluded.participants
           RETURNING id`,
} as const;

/**
 * SQLite-backed store of Activity records, keyed by name.
 * Every public operation runs inside its own transaction, or joins the
 * caller's when invoked from within `transaction()`.
 */
export class ActivityStore {
  constructor(private readonly db: Database.Database) {}

  /**
   * Runs `fn` in a transaction: commit on return, rollback on throw.
   * Nested calls become savepoints of the outer transaction.
   * Driver failures surface as InfrastructureError; AppErrors pass through.
   */
  transaction<T>(fn: () => T): T {
    try {
      return this.db.transaction(fn)();
    } catch (error) {
      if (error instanceof AppError) throw error;
      logger.error('Activity store transaction failed:', error);
      throw new InfrastructureError('Activity store transaction failed', error);
    }
  }

  listAll(): Activity[] {
    return this.transaction(() =>
      this.db.prepare<[], ActivityRow>(Q.selectAll).all().map(mapActivity)
    );
  }

  findByName(name: string): Activity | null {
    return this.transaction(() => {
      const row = this.db.prepare<[string], ActivityRow>(Q.selectByName).get(name);
      return row ? mapActivity(row) : null;
    });
  }

  count(): number {
    return this.transaction(() => {
      const row = this.db.prepare<[], { count: number }>(Q.count).get();
      return row ? row.count : 0;
    });
  }

  /**
   * Upserts the full record by name, participants included.
   * Returns the stored record with its id.
   */
  save(activity: Activity): Activity {
    const data = this.validate(activity);
    return this.transaction(() => this.upsert(data));
  }

  insertMany(activities: Activity[]): Activity[] {
    const validated = activities.map((a) => this.validate(a));
    return this.transaction(() => validated.map((a) => this.upsert(a)));
  }

  private upsert(activity: Activity): Activity {
    const row = this.db.prepare<[ActivityParams], { id: number }>(Q.upsert).get({
      name: activity.name,
      description: activity.description,
      schedule: activity.schedule,
      maxParticipants: activity.maxParticipants,
      participants: JSON.stringify(activity.participants),
    });
    if (!row) {
      throw new InfrastructureError(`Upsert of activity "${activity.name}" returned no row`);
    }
    return { ...activity, id: row.id, participants: [...activity.participants] };
  }

  private validate(activity: Activity): Activity {
    const result = ActivitySchema.safeParse(activity);
    if (!result.success) {
      throw new ValidationError(
        `Invalid activity record: ${result.error.message}`,
        result.error.issues,
      );
    }
    return result.data;
  }
}
