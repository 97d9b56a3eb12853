import { subDays } from 'date-fns';
import { v4 as uuid } from 'uuid';
import { AttendanceCorrection, AttendanceRecord, RemoteLoginPolicy } from '../models/Attendance.js';
import { NotificationType } from '../models/Notification.js';
import { User } from '../models/User.js';
import { AttendanceRepository } from '../repositories/AttendanceRepository.js';
import { UserRepository } from '../repositories/UserRepository.js';
import {
  ConcurrentUpdateError,
  CutoffNotReachedError,
  NotTodayError,
  NotTrackedError,
  PastDateError,
  RecordNotFoundError,
  StoreError,
  UnknownUserError,
  UserInactiveError,
} from '../errors.js';
import { Clock, dateKey, isCutoffReached, systemClock, workDurationMinutes } from '../clock.js';
import { AttendanceEvent, IdempotentCondition, resolveTransition } from './attendanceTransitions.js';
import { loginMessage, logoutMessage } from './notificationMessages.js';

/** Anything that can accept an outbound message for later delivery. */
export interface Notifier {
  notify(userId: string, message: string, type: NotificationType): Promise<string>;
}

export interface AttendanceEngineOptions {
  cutoffTime: string;
  clock?: Clock;
  remoteLoginPolicy?: RemoteLoginPolicy;
  /** Attempts per event before a store conflict is given up on. */
  maxAttempts?: number;
}

export interface AttendanceOutcome {
  record: AttendanceRecord;
  /** Set when the event repeated one already applied; the record is returned unchanged. */
  condition: IdempotentCondition | null;
}

export interface SweepSummary {
  date: string;
  created: number;
  skipped: number;
  failed: number;
}

export interface AttendanceSummary {
  from: string;
  to: string;
  totalDays: number;
  presentDays: number;
  remoteDays: number;
  leaveDays: number;
  absentDays: number;
}

type Applied =
  | { written: true; record: AttendanceRecord }
  | { written: false; record: AttendanceRecord | null; condition: IdempotentCondition | null };

export class AttendanceEngine {
  private readonly clock: Clock;
  private readonly cutoffTime: string;
  private readonly remoteLoginPolicy: RemoteLoginPolicy;
  private readonly maxAttempts: number;

  constructor(
    private readonly users: UserRepository,
    private readonly attendance: AttendanceRepository,
    private readonly notifier: Notifier,
    options: AttendanceEngineOptions
  ) {
    this.clock = options.clock ?? systemClock;
    this.cutoffTime = options.cutoffTime;
    this.remoteLoginPolicy = options.remoteLoginPolicy ?? 'keep-remote';
    this.maxAttempts = options.maxAttempts ?? 5;
  }

  async login(userId: string, at: Date = this.clock.now()): Promise<AttendanceOutcome> {
    const user = await this.requireTrackedUser(userId);
    const date = this.requireToday(at);
    const applied = await this.apply(user.id, date, { kind: 'login', at });
    const outcome = this.toOutcome(user.id, date, applied);

    if (applied.written) {
      console.log(`[Attendance] ${user.name} signed in for ${date}`);
      await this.emit(user, loginMessage(user.name, at), 'login');
    }
    return outcome;
  }

  async logout(userId: string, at: Date = this.clock.now()): Promise<AttendanceOutcome> {
    const user = await this.requireTrackedUser(userId);
    const date = this.requireToday(at);
    const applied = await this.apply(user.id, date, { kind: 'logout', at });
    const outcome = this.toOutcome(user.id, date, applied);

    if (applied.written) {
      const minutes = workDurationMinutes(outcome.record.loginTime, outcome.record.logoutTime);
      console.log(`[Attendance] ${user.name} signed out for ${date}`);
      await this.emit(user, logoutMessage(user.name, at, minutes), 'logout');
    }
    return outcome;
  }

  /** Leave and remote declarations are silent: no message is queued. */
  async requestLeave(userId: string, date: string, notes: string | null = null): Promise<AttendanceRecord> {
    return this.declare(userId, date, { kind: 'leave', notes });
  }

  async markRemote(userId: string, date: string, notes: string | null = null): Promise<AttendanceRecord> {
    return this.declare(userId, date, { kind: 'remote', notes });
  }

  /**
   * Materializes Absent records for active staff with nothing recorded on
   * `date`. Safe to run repeatedly and alongside live logins: existing records
   * are never touched. Defaults to today.
   */
  async runAbsenceSweep(date: string = dateKey(this.clock.now())): Promise<SweepSummary> {
    if (!isCutoffReached(this.clock, date, this.cutoffTime)) {
      throw new CutoffNotReachedError(date, this.cutoffTime);
    }

    const summary: SweepSummary = { date, created: 0, skipped: 0, failed: 0 };
    const missing = await this.attendance.listForSweep(date);

    for (const userId of missing) {
      try {
        const applied = await this.apply(userId, date, { kind: 'sweep' });
        if (applied.written) summary.created++;
        else summary.skipped++;
      } catch (error) {
        summary.failed++;
        console.error(`[Sweep] Failed to mark ${userId} absent on ${date}:`, error);
      }
    }

    console.log(
      `✅ [Sweep] ${date}: ${summary.created} marked absent, ${summary.skipped} already recorded, ${summary.failed} failed`
    );
    return summary;
  }

  /** Admin override; bypasses the transition table. */
  async correct(userId: string, date: string, patch: AttendanceCorrection): Promise<AttendanceRecord> {
    for (let attempt = 1; ; attempt++) {
      const current = await this.attendance.get(userId, date);
      if (!current) throw new RecordNotFoundError(userId, date);

      try {
        const record = await this.attendance.upsert({
          ...current,
          status: patch.status ?? current.status,
          workType: patch.workType ?? current.workType,
          notes: patch.notes !== undefined ? patch.notes : current.notes,
        });
        console.log(`[Attendance] Record for ${userId} on ${date} corrected`);
        return record;
      } catch (error) {
        this.retryOrGiveUp(error, attempt, userId, date);
      }
    }
  }

  async getRecord(userId: string, date: string): Promise<AttendanceRecord> {
    const record = await this.attendance.get(userId, date);
    if (!record) throw new RecordNotFoundError(userId, date);
    return record;
  }

  async listRecords(userId: string, from: string, to: string): Promise<AttendanceRecord[]> {
    return this.attendance.listForUser(userId, from, to);
  }

  workDuration(record: AttendanceRecord): number | null {
    return workDurationMinutes(record.loginTime, record.logoutTime);
  }

  /**
   * Day counts for the last `days` days up to today. A worked day on remote
   * counts as remote, not present.
   */
  async summarize(userId: string, days = 7): Promise<AttendanceSummary> {
    const now = this.clock.now();
    const from = dateKey(subDays(now, days - 1));
    const to = dateKey(now);
    const records = await this.attendance.listForUser(userId, from, to);

    const summary: AttendanceSummary = {
      from,
      to,
      totalDays: records.length,
      presentDays: 0,
      remoteDays: 0,
      leaveDays: 0,
      absentDays: 0,
    };

    for (const record of records) {
      if (record.status === 'Remote' || (record.status === 'Present' && record.workType === 'Remote')) {
        summary.remoteDays++;
      } else if (record.status === 'Present') summary.presentDays++;
      else if (record.status === 'Leave') summary.leaveDays++;
      else summary.absentDays++;
    }
    return summary;
  }

  private async declare(userId: string, date: string, event: AttendanceEvent): Promise<AttendanceRecord> {
    const user = await this.requireTrackedUser(userId);
    if (date < dateKey(this.clock.now())) throw new PastDateError(date);

    const applied = await this.apply(user.id, date, event);
    const { record } = this.toOutcome(user.id, date, applied);
    console.log(`[Attendance] ${user.name} marked ${record.status} for ${date}`);
    return record;
  }

  /**
   * Reads the current record, resolves the transition and writes it. A
   * uniqueness or version conflict means another writer got there first, so
   * the transition is re-applied to whatever that writer left behind.
   */
  private async apply(userId: string, date: string, event: AttendanceEvent): Promise<Applied> {
    for (let attempt = 1; ; attempt++) {
      const current = await this.attendance.get(userId, date);
      const next = resolveTransition(current, event, {
        userId,
        date,
        remoteLoginPolicy: this.remoteLoginPolicy,
        createId: () => uuid(),
      });

      if (next.kind === 'unchanged') {
        return { written: false, record: next.record, condition: next.condition };
      }

      try {
        return { written: true, record: await this.attendance.upsert(next.record) };
      } catch (error) {
        this.retryOrGiveUp(error, attempt, userId, date);
      }
    }
  }

  private retryOrGiveUp(error: unknown, attempt: number, userId: string, date: string): void {
    if (!(error instanceof StoreError)) throw error;
    if (attempt >= this.maxAttempts) {
      console.error(`[Attendance] Giving up on ${userId} ${date} after ${attempt} attempts: ${error.message}`);
      throw new ConcurrentUpdateError(userId, date);
    }
    console.warn(`[Attendance] ${error.message}; re-reading (attempt ${attempt}/${this.maxAttempts})`);
  }

  private toOutcome(userId: string, date: string, applied: Applied): AttendanceOutcome {
    if (applied.written) return { record: applied.record, condition: null };
    // unchanged only happens with an existing record for login and logout
    if (!applied.record) throw new RecordNotFoundError(userId, date);
    return { record: applied.record, condition: applied.condition };
  }

  /** Events only ever land on today's record; earlier days are settled by the sweep. */
  private requireToday(at: Date): string {
    const date = dateKey(at);
    const today = dateKey(this.clock.now());
    if (date !== today) throw new NotTodayError(date, today);
    return date;
  }

  private async requireTrackedUser(userId: string): Promise<User> {
    const user = await this.users.getById(userId);
    if (!user) throw new UnknownUserError(userId);
    if (user.status !== 'active') throw new UserInactiveError(userId);
    if (user.role !== 'staff') throw new NotTrackedError(user.role);
    return user;
  }

  /** Queue failures are logged and swallowed: the attendance change has already committed. */
  private async emit(user: User, message: string, type: NotificationType): Promise<void> {
    try {
      await this.notifier.notify(user.id, message, type);
    } catch (error) {
      console.error(`[Notifications] Failed to queue ${type} notification for ${user.id}:`, error);
    }
  }
}
