import { AppError, ConflictError, NotFoundError } from '@mergington/utils';

export class ActivityNotFoundError extends NotFoundError {
  constructor(activityName: string) {
    super('Activity', 'ACTIVITY_NOT_FOUND', { activity: activityName });
  }
}

export class AlreadySignedUpError extends ConflictError {
  constructor(activityName: string) {
    super('Student is already signed up for this activity', 'ALREADY_SIGNED_UP', 400, {
      activity: activityName,
    });
  }
}

export class ActivityFullError extends ConflictError {
  constructor(activityName: string, maxParticipants: number) {
    super('Activity is full', 'ACTIVITY_FULL', 400, {
      activity: activityName,
      maxParticipants,
    });
  }
}

export class NotRegisteredError extends AppError {
  constructor(activityName: string) {
    super('Student is not registered for this activity', 'NOT_REGISTERED', 404, true, {
      activity: activityName,
    });
  }
}
