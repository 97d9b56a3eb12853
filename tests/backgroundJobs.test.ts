/** @jest-environment node */

import { describe, expect, it } from '@jest/globals';
import { startBackgroundJobs, stopBackgroundJobs } from '../src/app.js';
import { createHarness } from './helpers.js';

describe('background jobs', () => {
  it('delivers entries left pending before start-up in inline mode', async () => {
    const h = await createHarness({ dispatchMode: 'inline' });
    const id = await h.notifications.enqueue('u-bob', 'Timesheets due Friday', 'reminder');

    startBackgroundJobs(h, { ...h.config, pollIntervalMs: 60_000, sweepCheckIntervalMs: 60_000 });
    await h.dispatcher.idle();
    await stopBackgroundJobs(h);

    expect(await h.notifications.get(id)).toMatchObject({ status: 'sent' });
    expect(h.channel.sent).toEqual([{ address: '+15550000002', message: 'Timesheets due Friday' }]);
  });
});
