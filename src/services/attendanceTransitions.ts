import { isBefore } from 'date-fns';
import { AttendanceRecord, RemoteLoginPolicy } from '../models/Attendance.js';
import { ConflictingRecordError, InvalidOrderingError, RecordNotFoundError } from '../errors.js';
import { formatTime } from '../clock.js';

export type AttendanceEvent =
  | { kind: 'login'; at: Date }
  | { kind: 'logout'; at: Date }
  | { kind: 'leave'; notes: string | null }
  | { kind: 'remote'; notes: string | null }
  | { kind: 'sweep' };

export type AttendanceEventKind = AttendanceEvent['kind'];

/**
 * - none: no record for the day
 * - unopened: a record without a login (Absent, Leave or Remote)
 * - open: logged in, not yet out
 * - closed: logged in and out
 */
export type Phase = 'none' | 'unopened' | 'open' | 'closed';

export type IdempotentCondition = 'DuplicateLogin' | 'DuplicateLogout';

type Rejection = 'RecordNotFound' | 'InvalidOrdering' | 'ConflictingRecord';

/** create: start from a blank record; apply: mutate the existing one. */
type Rule = 'create' | 'apply' | 'noop' | IdempotentCondition | Rejection;

export const TRANSITIONS: Record<Phase, Record<AttendanceEventKind, Rule>> = {
  none: {
    login: 'create',
    logout: 'RecordNotFound',
    leave: 'create',
    remote: 'create',
    sweep: 'create',
  },
  unopened: {
    login: 'apply',
    logout: 'InvalidOrdering',
    leave: 'apply',
    remote: 'apply',
    sweep: 'noop',
  },
  open: {
    login: 'DuplicateLogin',
    logout: 'apply',
    leave: 'ConflictingRecord',
    remote: 'ConflictingRecord',
    sweep: 'noop',
  },
  closed: {
    login: 'DuplicateLogin',
    logout: 'DuplicateLogout',
    leave: 'ConflictingRecord',
    remote: 'ConflictingRecord',
    sweep: 'noop',
  },
};

export type TransitionResult =
  | { kind: 'write'; record: AttendanceRecord }
  | { kind: 'unchanged'; record: AttendanceRecord | null; condition: IdempotentCondition | null };

export interface TransitionContext {
  userId: string;
  date: string;
  remoteLoginPolicy: RemoteLoginPolicy;
  createId: () => string;
}

export function phaseOf(record: AttendanceRecord | null): Phase {
  if (!record) return 'none';
  if (!record.loginTime) return 'unopened';
  return record.logoutTime ? 'closed' : 'open';
}

function blankRecord(ctx: TransitionContext): AttendanceRecord {
  return {
    id: ctx.createId(),
    userId: ctx.userId,
    date: ctx.date,
    loginTime: null,
    logoutTime: null,
    status: 'Absent',
    workType: 'Office',
    notes: null,
    version: 0,
    createdAt: 0,
    updatedAt: 0,
  };
}

function applyEvent(record: AttendanceRecord, event: AttendanceEvent, ctx: TransitionContext): AttendanceRecord {
  switch (event.kind) {
    case 'login':
      return {
        ...record,
        loginTime: event.at,
        // a login on a leave day is recorded but does not cancel the leave
        status: record.status === 'Leave' ? 'Leave' : 'Present',
        workType: record.workType === 'Remote' && ctx.remoteLoginPolicy === 'office' ? 'Office' : record.workType,
      };
    case 'logout':
      if (record.loginTime && isBefore(event.at, record.loginTime)) {
        throw new InvalidOrderingError(
          `Sign-out at ${formatTime(event.at)} is before sign-in at ${formatTime(record.loginTime)}`
        );
      }
      return { ...record, logoutTime: event.at };
    case 'leave':
      return { ...record, status: 'Leave', workType: 'Leave', notes: event.notes };
    case 'remote':
      return { ...record, status: 'Remote', workType: 'Remote', notes: event.notes };
    case 'sweep':
      return { ...record, status: 'Absent', workType: 'Office' };
  }
}

/**
 * Looks the (phase, event) pair up in {@link TRANSITIONS} and produces the
 * record to write, or throws the rejection.
 */
export function resolveTransition(
  current: AttendanceRecord | null,
  event: AttendanceEvent,
  ctx: TransitionContext
): TransitionResult {
  const rule = TRANSITIONS[phaseOf(current)][event.kind];
  const base = current ?? blankRecord(ctx);

  switch (rule) {
    case 'create':
    case 'apply':
      return { kind: 'write', record: applyEvent(base, event, ctx) };
    case 'noop':
      return { kind: 'unchanged', record: current, condition: null };
    case 'DuplicateLogin':
    case 'DuplicateLogout':
      return { kind: 'unchanged', record: current, condition: rule };
    case 'RecordNotFound':
      throw new RecordNotFoundError(ctx.userId, ctx.date);
    case 'InvalidOrdering':
      throw new InvalidOrderingError(`Cannot sign out on ${ctx.date} without signing in first`);
    case 'ConflictingRecord':
      throw new ConflictingRecordError(base);
  }
}
