// ./models/activity.ts
import { z } from 'zod';

export interface Activity {
  id?: number;
  name: string;
  description: string | null;
  schedule: string | null;
  maxParticipants: number | null;
  participants: string[];
}

// Shape returned by GET /activities, keyed by activity name
export interface ActivityDetails {
  description: string | null;
  schedule: string | null;
  max_participants: number | null;
  participants: string[];
}

export type ActivityMap = Record<string, ActivityDetails>;

export interface ActivityRow {
  id: number;
  name: string;
  description: string | null;
  schedule: string | null;
  max_participants: number | null;
  participants: string | null;
}

export const ActivitySchema = z.object({
  id: z.number().int().positive().optional(),
  name: z.string().min(1),
  description: z.string().nullable(),
  schedule: z.string().nullable(),
  maxParticipants: z.number().int().nonnegative().nullable(),
  participants: z.array(z.string()),
});

const ParticipantListSchema = z.array(z.string());

/**
 * Decodes the JSON participant column. Anything that is not a list of
 * strings reads as an empty list.
 */
function parseParticipants(raw: string | null): string[] {
  if (!raw) return [];
  let decoded: unknown;
  try {
    decoded = JSON.parse(raw);
  } catch {
    return [];
  }
  const result = ParticipantListSchema.safeParse(decoded);
  return result.success ? result.data : [];
}

export function mapActivity(row: ActivityRow): Activity {
  return {
    id: row.id,
    name: row.name,
    description: row.description,
    schedule: row.schedule,
    maxParticipants: row.max_participants,
    participants: parseParticipants(row.participants),
  };
}

export function toDetails(activity: Activity): ActivityDetails {
  return {
    description: activity.description,
    schedule: activity.schedule,
    max_participants: activity.maxParticipants,
    participants: [...activity.participants],
  };
}
