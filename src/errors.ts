import type { AttendanceRecord } from './models/Attendance.js';

export type AttendanceErrorCode =
  | 'UnknownUser'
  | 'UserInactive'
  | 'NotTracked'
  | 'RecordNotFound'
  | 'InvalidOrdering'
  | 'ConflictingRecord'
  | 'PastDate'
  | 'NotToday'
  | 'CutoffNotReached'
  | 'ConcurrentUpdate';

/**
 * A misordered or duplicate client action. Surfaced to the caller as-is and
 * never retried.
 */
export class AttendanceError extends Error {
  constructor(
    readonly code: AttendanceErrorCode,
    readonly status: number,
    message: string
  ) {
    super(message);
    this.name = code;
  }
}

export class UnknownUserError extends AttendanceError {
  constructor(userId: string) {
    super('UnknownUser', 404, `User ${userId} does not exist`);
  }
}

export class UserInactiveError extends AttendanceError {
  constructor(userId: string) {
    super('UserInactive', 403, `User ${userId} is inactive. Please contact admin.`);
  }
}

export class NotTrackedError extends AttendanceError {
  constructor(role: string) {
    super('NotTracked', 400, `Attendance is not tracked for ${role} accounts`);
  }
}

export class RecordNotFoundError extends AttendanceError {
  constructor(userId: string, date: string) {
    super('RecordNotFound', 404, `No attendance record for user ${userId} on ${date}`);
  }
}

export class InvalidOrderingError extends AttendanceError {
  constructor(message: string) {
    super('InvalidOrdering', 409, message);
  }
}

export class ConflictingRecordError extends AttendanceError {
  constructor(readonly record: AttendanceRecord) {
    super(
      'ConflictingRecord',
      409,
      `Attendance for ${record.date} already has worked hours and cannot be changed to leave or remote`
    );
  }
}

export class PastDateError extends AttendanceError {
  constructor(date: string) {
    super('PastDate', 400, `Cannot mark leave or remote work for past date ${date}`);
  }
}

export class NotTodayError extends AttendanceError {
  constructor(date: string, today: string) {
    super('NotToday', 409, `Sign-in and sign-out can only be recorded for today (${today}), not ${date}`);
  }
}

export class CutoffNotReachedError extends AttendanceError {
  constructor(date: string, cutoff: string) {
    super('CutoffNotReached', 409, `Absence sweep for ${date} cannot run before the ${cutoff} cutoff`);
  }
}

export class ConcurrentUpdateError extends AttendanceError {
  constructor(userId: string, date: string) {
    super('ConcurrentUpdate', 409, `Attendance for user ${userId} on ${date} is being changed by another request, try again`);
  }
}

/** Storage-level conflicts. The engine recovers from these by re-reading. */
export class StoreError extends Error {}

export class UniquenessViolation extends StoreError {
  constructor(userId: string, date: string) {
    super(`Attendance already exists for user ${userId} on ${date}`);
    this.name = 'UniquenessViolation';
  }
}

export class StaleWrite extends StoreError {
  constructor(userId: string, date: string) {
    super(`Attendance for user ${userId} on ${date} was modified concurrently`);
    this.name = 'StaleWrite';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
