import { DeliveryChannel, DeliveryResult, NotificationEntry, NotificationType } from '../models/Notification.js';
import { NotificationRepository } from '../repositories/NotificationRepository.js';
import { UserRepository } from '../repositories/UserRepository.js';
import { Clock, systemClock } from '../clock.js';
import { errorMessage } from '../errors.js';
import { Notifier } from './AttendanceEngine.js';

export type DispatchMode = 'inline' | 'deferred';

export interface NotificationDispatcherOptions {
  /** inline: a cycle is also scheduled after every enqueue; deferred: only the poller runs cycles. */
  mode?: DispatchMode;
  clock?: Clock;
  batchSize?: number;
}

export interface DispatchSummary {
  attempted: number;
  sent: number;
  failed: number;
}

/**
 * Delivers pending notifications. Cycles never overlap within a process, and
 * each user's entries go out in the order they were queued.
 */
export class NotificationDispatcher implements Notifier {
  private readonly mode: DispatchMode;
  private readonly clock: Clock;
  private readonly batchSize: number;
  private tail: Promise<void> = Promise.resolve();
  private timer: NodeJS.Timeout | null = null;
  /** Entries already attempted whose outcome could not be written yet. Never sent again. */
  private readonly unrecorded = new Map<string, DeliveryResult>();

  constructor(
    private readonly queue: NotificationRepository,
    private readonly users: UserRepository,
    private readonly channel: DeliveryChannel,
    options: NotificationDispatcherOptions = {}
  ) {
    this.mode = options.mode ?? 'inline';
    this.clock = options.clock ?? systemClock;
    this.batchSize = options.batchSize ?? 100;
  }

  async notify(userId: string, message: string, type: NotificationType): Promise<string> {
    const id = await this.queue.enqueue(userId, message, type);
    if (this.mode === 'inline') this.schedule();
    return id;
  }

  /** Requests a cycle without waiting for it. */
  schedule(): void {
    this.dispatchPending().catch((error) => console.error('[Notifications] Dispatch cycle failed:', error));
  }

  dispatchPending(): Promise<DispatchSummary> {
    const run = this.tail.then(() => this.runCycle());
    // the caller sees the failure through `run`; the chain itself must keep going
    this.tail = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }

  /** Resolves once every cycle requested so far has finished. */
  async idle(): Promise<void> {
    await this.tail;
  }

  start(intervalMs: number): void {
    if (this.timer) return;
    this.timer = setInterval(() => this.schedule(), intervalMs);
    console.log(`[Notifications] Polling for pending notifications every ${intervalMs}ms`);
  }

  async stop(): Promise<void> {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
    await this.idle();
  }

  private async runCycle(): Promise<DispatchSummary> {
    const pending = await this.queue.listPending(this.batchSize);
    const byUser = new Map<string, NotificationEntry[]>();

    for (const entry of pending) {
      const attempted = this.unrecorded.get(entry.id);
      if (attempted) {
        await this.record(entry, attempted);
        continue;
      }

      const entries = byUser.get(entry.userId) ?? [];
      entries.push(entry);
      byUser.set(entry.userId, entries);
    }

    const results = await Promise.all(Array.from(byUser.values()).map((entries) => this.deliverInOrder(entries)));

    return results.reduce(
      (total, r) => ({
        attempted: total.attempted + r.attempted,
        sent: total.sent + r.sent,
        failed: total.failed + r.failed,
      }),
      { attempted: 0, sent: 0, failed: 0 }
    );
  }

  private async deliverInOrder(entries: NotificationEntry[]): Promise<DispatchSummary> {
    const summary: DispatchSummary = { attempted: 0, sent: 0, failed: 0 };

    try {
      for (const entry of entries) {
        summary.attempted++;
        if (await this.deliver(entry)) summary.sent++;
        else summary.failed++;
      }
    } catch (error) {
      // later entries stay pending so the user's order is kept for the next cycle
      console.error(`[Notifications] Stopped delivering to ${entries[0].userId}:`, error);
    }

    return summary;
  }

  private async deliver(entry: NotificationEntry): Promise<boolean> {
    const user = await this.users.getById(entry.userId);
    let result: DeliveryResult;

    if (!user || !user.phone) {
      result = { ok: false, reason: `No contact address for user ${entry.userId}` };
    } else {
      try {
        result = await this.channel.send(user.phone, entry.message);
      } catch (error) {
        result = { ok: false, reason: errorMessage(error) };
      }
    }

    if (result.ok) console.log(`✅ [Notifications] ${entry.type} notification sent to ${entry.userId}`);
    else console.error(`❌ [Notifications] ${entry.type} notification to ${entry.userId} failed: ${result.reason}`);

    await this.record(entry, result);
    return result.ok;
  }

  /** Writes the outcome; on failure it is kept and written again by a later cycle. */
  private async record(entry: NotificationEntry, result: DeliveryResult): Promise<void> {
    try {
      if (result.ok) await this.queue.markSent(entry.id, this.clock.now());
      else await this.queue.markFailed(entry.id, result.reason);
      this.unrecorded.delete(entry.id);
    } catch (error) {
      this.unrecorded.set(entry.id, result);
      console.error(`[Notifications] Could not record outcome of ${entry.id}, will retry:`, error);
    }
  }
}
