export type RegistryErrorStatus = 400 | 404;

export class RegistryError extends Error {
  constructor(message: string, readonly status: RegistryErrorStatus) {
    super(message);
    this.name = new.target.name;
  }
}

export class ActivityNotFoundError extends RegistryError {
  constructor(readonly activityName: string) {
    super('Activity not found', 404);
  }
}

export class AlreadyRegisteredError extends RegistryError {
  constructor(readonly activityName: string, readonly email: string) {
    super('Student is already signed up for this activity', 400);
  }
}

export class NotRegisteredError extends RegistryError {
  constructor(readonly activityName: string, readonly email: string) {
    super('Student is not registered for this activity', 400);
  }
}

export class ActivityFullError extends RegistryError {
  constructor(readonly activityName: string, readonly maxParticipants: number) {
    super('Activity is full', 400);
  }
}

export class SeedFileError extends Error {
  constructor(readonly file: string, reason: string) {
    super(`Invalid activities file ${file}: ${reason}`);
    this.name = 'SeedFileError';
  }
}
