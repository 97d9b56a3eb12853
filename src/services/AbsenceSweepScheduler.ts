import { Clock, dateKey, isCutoffReached, systemClock } from '../clock.js';
import { AttendanceEngine, SweepSummary } from './AttendanceEngine.js';

export interface AbsenceSweepSchedulerOptions {
  cutoffTime: string;
  clock?: Clock;
}

/** Runs the day's absence sweep once, on the first check after the cutoff. */
export class AbsenceSweepScheduler {
  private readonly clock: Clock;
  private lastSweptDate: string | null = null;
  private running = false;
  private timer: NodeJS.Timeout | null = null;

  constructor(
    private readonly engine: AttendanceEngine,
    private readonly options: AbsenceSweepSchedulerOptions
  ) {
    this.clock = options.clock ?? systemClock;
  }

  async tick(): Promise<SweepSummary | null> {
    const today = dateKey(this.clock.now());
    if (this.running || this.lastSweptDate === today) return null;
    if (!isCutoffReached(this.clock, today, this.options.cutoffTime)) return null;

    this.running = true;
    try {
      const summary = await this.engine.runAbsenceSweep(today);
      this.lastSweptDate = today;
      return summary;
    } finally {
      this.running = false;
    }
  }

  start(checkIntervalMs: number): void {
    if (this.timer) return;
    this.timer = setInterval(() => {
      this.tick().catch((error) => console.error('[Sweep] Scheduled absence sweep failed:', error));
    }, checkIntervalMs);
    console.log(`[Sweep] Absence sweep scheduled daily after ${this.options.cutoffTime}`);
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }
}
