export interface Activity {
  description: string;
  schedule: string;
  max_participants: number;
  participants: string[];
}

export type ActivityMap = Record<string, Activity>;

export interface ActivityStoreOptions {
  // Reject signups once participants reach max_participants. Off: capacity is advisory.
  enforceCapacity?: boolean;
}
