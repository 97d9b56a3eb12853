import { AppConfig, loadConfig } from '../src/config.js';
import { createServices } from '../src/app.js';
import { Clock } from '../src/clock.js';
import { DeliveryChannel, DeliveryResult } from '../src/models/Notification.js';
import { ImportUser } from '../src/models/User.js';

export class MutableClock implements Clock {
  constructor(private current: Date) {}

  now(): Date {
    return new Date(this.current);
  }

  set(at: Date): void {
    this.current = at;
  }
}

/** Records every send; fails the ones matching `failWhen`. */
export class FakeChannel implements DeliveryChannel {
  sent: Array<{ address: string; message: string }> = [];
  failWhen: (message: string) => boolean = () => false;

  async send(address: string, message: string): Promise<DeliveryResult> {
    this.sent.push({ address, message });
    if (this.failWhen(message)) return { ok: false, reason: 'channel down' };
    return { ok: true, reference: `SM${this.sent.length}` };
  }
}

/** Local wall-clock time on 2024-03-01 unless another day is given. */
export function at(hours: number, minutes: number, day = 1): Date {
  return new Date(2024, 2, day, hours, minutes);
}

export const STAFF: ImportUser[] = [
  { id: 'u-alice', name: 'Alice', phone: '+15550000001', department: 'Engineering', role: 'staff', status: 'active' },
  { id: 'u-bob', name: 'Bob', phone: '+15550000002', department: 'Sales', role: 'staff', status: 'active' },
  { id: 'u-carol', name: 'Carol', phone: '+15550000003', department: 'Sales', role: 'staff', status: 'inactive' },
  { id: 'u-admin', name: 'Admin User', phone: '+15550000000', department: 'Administration', role: 'admin', status: 'active' },
];

export interface HarnessOptions {
  now?: Date;
  dispatchMode?: AppConfig['dispatchMode'];
  remoteLoginPolicy?: AppConfig['remoteLoginPolicy'];
}

export async function createHarness(options: HarnessOptions = {}) {
  const clock = new MutableClock(options.now ?? at(8, 0));
  const channel = new FakeChannel();
  const config: AppConfig = {
    ...loadConfig({}),
    dispatchMode: options.dispatchMode ?? 'deferred',
    remoteLoginPolicy: options.remoteLoginPolicy ?? 'keep-remote',
  };

  const services = createServices(config, { pool: null, clock, channel });
  await services.users.importUsers(STAFF);

  return { ...services, clock, channel, config };
}
