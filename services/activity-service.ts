// services/activity-service.ts
import { toDetails } from '../models/activity';
import type { Activity, ActivityMap } from '../models/activity';
import type { ActivityStore } from './activity-store';
import { ConflictError, NotFoundError } from '../utils/errors';
import { logger } from '../utils/logger';

export interface MessageResult {
  message: string;
}

/**
 * Read access and signup/unregister rules over the activity store.
 * Each mutation is one read-check-write inside a single store transaction.
 */
export class ActivityService {
  constructor(private readonly store: ActivityStore) {}

  getActivities(): ActivityMap {
    const activities = this.store.listAll();
    const result: ActivityMap = {};
    for (const activity of activities) {
      result[activity.name] = toDetails(activity);
    }
    logger.debug(`Returning ${activities.length} activities.`);
    return result;
  }

  signup(activityName: string, email: string): MessageResult {
    return this.store.transaction(() => {
      const activity = this.requireActivity(activityName);
      if (activity.participants.includes(email)) {
        logger.info(`Rejected signup: ${email} already in ${activityName}.`);
        throw new ConflictError('Student is already signed up');
      }
      this.store.save({ ...activity, participants: [...activity.participants, email] });
      logger.debug(`Signed up ${email} for ${activityName}.`);
      return { message: `Signed up ${email} for ${activityName}` };
    });
  }

  unregister(activityName: string, email: string): MessageResult {
    return this.store.transaction(() => {
      const activity = this.requireActivity(activityName);
      const index = activity.participants.indexOf(email);
      if (index === -1) {
        logger.info(`Rejected unregister: ${email} not in ${activityName}.`);
        throw new ConflictError('Student is not signed up for this activity');
      }
      const participants = [...activity.participants];
      participants.splice(index, 1);
      this.store.save({ ...activity, participants });
      logger.debug(`Unregistered ${email} from ${activityName}.`);
      return { message: `Unregistered ${email} from ${activityName}` };
    });
  }

  private requireActivity(activityName: string): Activity {
    const activity = this.store.findByName(activityName);
    if (!activity) {
      logger.info(`Activity not found: ${activityName}`);
      throw new NotFoundError('Activity not found');
    }
    return activity;
  }
}
