import {
  ActivityFullError,
  ActivityNotFoundError,
  AlreadyRegisteredError,
  NotRegisteredError,
} from './errors.js';
import type { Activity, ActivityMap, ActivityStoreOptions } from './types.js';

interface ActivityRecord {
  description: string;
  schedule: string;
  maxParticipants: number;
  // Insertion order is signup order
  participants: Set<string>;
}

// ============================================================
// Activity registry
// ============================================================

/**
 * In-memory registry of activities and their participants.
 *
 * Every operation is synchronous, so a check and its mutation never
 * interleave with another request on the event loop.
 */
export class ActivityStore {
  private records = new Map<string, ActivityRecord>();
  private readonly enforceCapacity: boolean;

  constructor(private readonly seed: ActivityMap, options: ActivityStoreOptions = {}) {
    this.enforceCapacity = options.enforceCapacity ?? false;
    this.reset();
  }

  reset(): void {
    this.records.clear();
    for (const [name, activity] of Object.entries(this.seed)) {
      this.records.set(name, {
        description: activity.description,
        schedule: activity.schedule,
        maxParticipants: activity.max_participants,
        participants: new Set(activity.participants),
      });
    }
  }

  list(): ActivityMap {
    const result: ActivityMap = {};
    for (const [name, record] of this.records) {
      result[name] = toActivity(record);
    }
    return result;
  }

  get(name: string): Activity | undefined {
    const record = this.records.get(name);
    return record ? toActivity(record) : undefined;
  }

  has(name: string): boolean {
    return this.records.has(name);
  }

  get capacityEnforced(): boolean {
    return this.enforceCapacity;
  }

  signup(name: string, email: string): void {
    const record = this.require(name);
    if (record.participants.has(email)) {
      throw new AlreadyRegisteredError(name, email);
    }
    if (this.enforceCapacity && record.participants.size >= record.maxParticipants) {
      throw new ActivityFullError(name, record.maxParticipants);
    }
    record.participants.add(email);
  }

  unregister(name: string, email: string): void {
    const record = this.require(name);
    if (!record.participants.delete(email)) {
      throw new NotRegisteredError(name, email);
    }
  }

  private require(name: string): ActivityRecord {
    const record = this.records.get(name);
    if (!record) throw new ActivityNotFoundError(name);
    return record;
  }
}

function toActivity(record: ActivityRecord): Activity {
  return {
    description: record.description,
    schedule: record.schedule,
    max_participants: record.maxParticipants,
    participants: [...record.participants],
  };
}
