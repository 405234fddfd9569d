import { describe, it, expect, beforeEach } from 'vitest';
import { ActivityStore } from './activity-store.js';
import {
  ActivityFullError,
  ActivityNotFoundError,
  AlreadyRegisteredError,
  NotRegisteredError,
  RegistryError,
} from './errors.js';
import { MERGINGTON_ACTIVITIES } from './seed.js';
import type { ActivityMap } from './types.js';

const SMALL_SEED: ActivityMap = {
  'Robotics Club': {
    description: 'Build robots',
    schedule: 'Mondays, 4:00 PM - 5:00 PM',
    max_participants: 3,
    participants: ['first@school.test', 'second@school.test'],
  },
};

describe('ActivityStore', () => {
  let store: ActivityStore;

  beforeEach(() => {
    store = new ActivityStore(MERGINGTON_ACTIVITIES);
  });

  describe('list', () => {
    it('returns every seeded activity', () => {
      expect(Object.keys(store.list())).toEqual(Object.keys(MERGINGTON_ACTIVITIES));
    });

    it('returns copies that do not alias the registry', () => {
      const snapshot = store.list();
      snapshot['Chess Club'].participants.push('intruder@mergington.edu');
      expect(store.get('Chess Club')?.participants).toEqual([
        'michael@mergington.edu',
        'daniel@mergington.edu',
      ]);
    });

    it('keeps every seeded activity within capacity', () => {
      for (const activity of Object.values(store.list())) {
        expect(activity.participants.length).toBeLessThanOrEqual(activity.max_participants);
      }
    });
  });

  describe('signup', () => {
    it('appends the email in signup order', () => {
      store.signup('Chess Club', 'test@mergington.edu');
      expect(store.get('Chess Club')?.participants).toEqual([
        'michael@mergington.edu',
        'daniel@mergington.edu',
        'test@mergington.edu',
      ]);
    });

    it('rejects a duplicate signup', () => {
      store.signup('Chess Club', 'dup@mergington.edu');
      expect(() => store.signup('Chess Club', 'dup@mergington.edu')).toThrow(AlreadyRegisteredError);
      expect(store.get('Chess Club')?.participants.filter((p) => p === 'dup@mergington.edu')).toHaveLength(1);
    });

    it('rejects an unknown activity with a 404 registry error', () => {
      try {
        store.signup('Underwater Basket Weaving', 'test@mergington.edu');
        expect.fail('signup should have thrown');
      } catch (err) {
        expect(err).toBeInstanceOf(ActivityNotFoundError);
        expect(err).toBeInstanceOf(RegistryError);
        if (err instanceof RegistryError) {
          expect(err.status).toBe(404);
          expect(err.message).toBe('Activity not found');
        }
      }
    });

    it('accepts any string as an email', () => {
      store.signup('Art Club', 'not-an-email');
      expect(store.get('Art Club')?.participants).toContain('not-an-email');
    });

    it('does not cap signups by default', () => {
      const small = new ActivityStore(SMALL_SEED);
      small.signup('Robotics Club', 'third@school.test');
      small.signup('Robotics Club', 'fourth@school.test');
      expect(small.get('Robotics Club')?.participants).toHaveLength(4);
    });

    it('caps signups when capacity is enforced', () => {
      const small = new ActivityStore(SMALL_SEED, { enforceCapacity: true });
      small.signup('Robotics Club', 'third@school.test');
      expect(() => small.signup('Robotics Club', 'fourth@school.test')).toThrow(ActivityFullError);
      expect(small.get('Robotics Club')?.participants).toHaveLength(3);
    });

    it('reports a duplicate before a full activity', () => {
      const small = new ActivityStore(SMALL_SEED, { enforceCapacity: true });
      small.signup('Robotics Club', 'third@school.test');
      expect(() => small.signup('Robotics Club', 'first@school.test')).toThrow(AlreadyRegisteredError);
    });
  });

  describe('unregister', () => {
    it('removes a registered email', () => {
      store.unregister('Soccer Team', 'alex@mergington.edu');
      expect(store.get('Soccer Team')?.participants).not.toContain('alex@mergington.edu');
    });

    it('rejects an email that is not registered', () => {
      expect(() => store.unregister('Chess Club', 'nobody@mergington.edu')).toThrow(NotRegisteredError);
    });

    it('rejects an unknown activity', () => {
      expect(() => store.unregister('NonExistentActivity', 'x@y.com')).toThrow(ActivityNotFoundError);
    });

    it('allows signing up again after unregistering', () => {
      store.signup('Math Club', 'again@mergington.edu');
      store.unregister('Math Club', 'again@mergington.edu');
      store.signup('Math Club', 'again@mergington.edu');
      expect(store.get('Math Club')?.participants).toEqual([
        'ethan@mergington.edu',
        'amelia@mergington.edu',
        'again@mergington.edu',
      ]);
    });
  });

  describe('reset', () => {
    it('restores the seeded participants', () => {
      store.signup('Drama Club', 'new@mergington.edu');
      store.unregister('Drama Club', 'isabella@mergington.edu');
      store.reset();
      expect(store.get('Drama Club')?.participants).toEqual(['isabella@mergington.edu']);
    });
  });

  it('keeps instances isolated', () => {
    const other = new ActivityStore(MERGINGTON_ACTIVITIES);
    store.signup('Debate Team', 'solo@mergington.edu');
    expect(other.get('Debate Team')?.participants).toEqual(['liam@mergington.edu']);
    expect(MERGINGTON_ACTIVITIES['Debate Team'].participants).toEqual(['liam@mergington.edu']);
  });

  it('answers has/get for unknown names', () => {
    expect(store.has('Gym Class')).toBe(true);
    expect(store.has('gym class')).toBe(false);
    expect(store.get('gym class')).toBeUndefined();
  });
});
