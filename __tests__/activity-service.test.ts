import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { ActivityService } from '../services/activity-service';
import { seedActivities } from '../services/seed';
import { ConflictError, InfrastructureError, NotFoundError } from '../utils/errors';
import { createTestStore } from './helpers';
import type { TestStore } from './helpers';

describe('ActivityService', () => {
  let ctx: TestStore;
  let service: ActivityService;

  const participantsOf = (name: string): string[] => service.getActivities()[name].participants;

  beforeEach(() => {
    ctx = createTestStore();
    seedActivities(ctx.store);
    service = new ActivityService(ctx.store);
  });

  afterEach(() => ctx.cleanup());

  describe('getActivities', () => {
    it('maps activity names to their details', () => {
      const activities = service.getActivities();
      expect(Object.keys(activities)).toEqual(['Chess Club', 'Programming Class', 'Gym Class']);
      expect(activities['Programming Class']).toEqual({
        description: 'Learn programming fundamentals and build software projects',
        schedule: 'Tuesdays and Thursdays, 3:30 PM - 4:30 PM',
        max_participants: 20,
        participants: ['emma@mergington.edu', 'sophia@mergington.edu'],
      });
    });

    it('returns an empty mapping for an empty store', () => {
      const empty = createTestStore();
      try {
        expect(new ActivityService(empty.store).getActivities()).toEqual({});
      } finally {
        empty.cleanup();
      }
    });

    it('propagates store failures as InfrastructureError', () => {
      ctx.db.close();
      expect(() => service.getActivities()).toThrow(InfrastructureError);
    });
  });

  describe('signup', () => {
    it('appends a new email at the end of the list', () => {
      const result = service.signup('Chess Club', 'new@mergington.edu');
      expect(result).toEqual({ message: 'Signed up new@mergington.edu for Chess Club' });
      expect(participantsOf('Chess Club')).toEqual([
        'michael@mergington.edu',
        'daniel@mergington.edu',
        'new@mergington.edu',
      ]);
    });

    it('keeps insertion order across several signups', () => {
      service.signup('Gym Class', 'c@mergington.edu');
      service.signup('Gym Class', 'a@mergington.edu');
      service.signup('Gym Class', 'b@mergington.edu');
      expect(participantsOf('Gym Class')).toEqual([
        'john@mergington.edu',
        'olivia@mergington.edu',
        'c@mergington.edu',
        'a@mergington.edu',
        'b@mergington.edu',
      ]);
    });

    it('rejects a duplicate signup and leaves the list unchanged', () => {
      service.signup('Chess Club', 'new@mergington.edu');
      expect(() => service.signup('Chess Club', 'new@mergington.edu')).toThrow(
        new ConflictError('Student is already signed up')
      );
      expect(participantsOf('Chess Club').filter((e) => e === 'new@mergington.edu')).toHaveLength(1);
      expect(participantsOf('Chess Club')).toHaveLength(3);
    });

    it('treats emails differing in case as different participants', () => {
      service.signup('Chess Club', 'Michael@mergington.edu');
      expect(participantsOf('Chess Club')).toHaveLength(3);
    });

    it('allows the same email in different activities', () => {
      service.signup('Gym Class', 'michael@mergington.edu');
      expect(participantsOf('Gym Class')).toContain('michael@mergington.edu');
      expect(participantsOf('Chess Club')).toContain('michael@mergington.edu');
    });

    it('does not enforce max_participants', () => {
      for (let i = 0; i < 11; i++) {
        service.signup('Chess Club', `student${i}@mergington.edu`);
      }
      expect(participantsOf('Chess Club')).toHaveLength(13);
    });

    it('fails with NotFoundError for an unknown activity', () => {
      expect(() => service.signup('Robotics', 'new@mergington.edu')).toThrow(NotFoundError);
      expect(() => service.signup('Robotics', '')).toThrow(NotFoundError);
    });
  });

  describe('unregister', () => {
    it('removes the email and keeps the order of the rest', () => {
      service.signup('Chess Club', 'x@mergington.edu');
      const result = service.unregister('Chess Club', 'daniel@mergington.edu');
      expect(result).toEqual({ message: 'Unregistered daniel@mergington.edu from Chess Club' });
      expect(participantsOf('Chess Club')).toEqual(['michael@mergington.edu', 'x@mergington.edu']);
    });

    it('rejects an email that is not signed up and leaves the list unchanged', () => {
      expect(() => service.unregister('Chess Club', 'nobody@mergington.edu')).toThrow(
        new ConflictError('Student is not signed up for this activity')
      );
      expect(participantsOf('Chess Club')).toHaveLength(2);
    });

    it('allows signing up again after unregistering', () => {
      service.unregister('Gym Class', 'john@mergington.edu');
      service.signup('Gym Class', 'john@mergington.edu');
      expect(participantsOf('Gym Class')).toEqual(['olivia@mergington.edu', 'john@mergington.edu']);
    });

    it('fails with NotFoundError for an unknown activity', () => {
      expect(() => service.unregister('Robotics', 'michael@mergington.edu')).toThrow(NotFoundError);
    });
  });
});
