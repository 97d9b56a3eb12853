/** @jest-environment node */

import { describe, expect, it, jest } from '@jest/globals';
import { NotificationDispatcher } from '../src/services/NotificationDispatcher.js';
import { DeliveryChannel } from '../src/models/Notification.js';
import { at, createHarness } from './helpers.js';

describe('NotificationDispatcher', () => {
  it('delivers a queued login message and marks it sent', async () => {
    const h = await createHarness();
    await h.engine.login('u-alice', at(9, 5));
    h.clock.set(at(9, 6));

    const summary = await h.dispatcher.dispatchPending();

    expect(summary).toEqual({ attempted: 1, sent: 1, failed: 0 });
    expect(h.channel.sent).toEqual([
      {
        address: '+15550000001',
        message: 'Hi Alice,\n\nYou have successfully signed in at 09:05 AM.\n\nHave a productive day! 🚀',
      },
    ]);

    const [entry] = await h.notifications.listForUser('u-alice');
    expect(entry).toMatchObject({ type: 'login', status: 'sent', sentAt: at(9, 6), errorMessage: null });
  });

  it('records a failed logout delivery without affecting the logout', async () => {
    const h = await createHarness();
    h.channel.failWhen = (message) => message.includes('signed out');

    await h.engine.login('u-alice', at(9, 5));
    const { record } = await h.engine.logout('u-alice', at(17, 30));
    const summary = await h.dispatcher.dispatchPending();

    expect(summary).toEqual({ attempted: 2, sent: 1, failed: 1 });
    expect(record.logoutTime).toEqual(at(17, 30));

    const entries = await h.notifications.listForUser('u-alice');
    expect(entries.map((e) => [e.type, e.status])).toEqual([
      ['login', 'sent'],
      ['logout', 'failed'],
    ]);
    expect(entries[1]).toMatchObject({ errorMessage: 'channel down', sentAt: null });
  });

  it('sends each user’s messages in the order they were queued', async () => {
    const h = await createHarness();
    await h.engine.login('u-alice', at(9, 5));
    await h.engine.login('u-bob', at(9, 10));
    await h.engine.logout('u-alice', at(12, 0));

    await h.dispatcher.dispatchPending();

    const aliceMessages = h.channel.sent.filter((s) => s.address === '+15550000001').map((s) => s.message);
    expect(aliceMessages).toHaveLength(2);
    expect(aliceMessages[0]).toContain('signed in at 09:05 AM');
    expect(aliceMessages[1]).toContain('signed out at 12:00 PM');
  });

  it('attempts every entry exactly once across overlapping cycles', async () => {
    const h = await createHarness();
    await h.engine.login('u-alice', at(9, 5));
    await h.engine.login('u-bob', at(9, 10));

    const [first, second] = await Promise.all([h.dispatcher.dispatchPending(), h.dispatcher.dispatchPending()]);

    expect(first).toEqual({ attempted: 2, sent: 2, failed: 0 });
    expect(second).toEqual({ attempted: 0, sent: 0, failed: 0 });
    expect(h.channel.sent).toHaveLength(2);
  });

  it('never retries a failed entry', async () => {
    const h = await createHarness();
    h.channel.failWhen = () => true;
    await h.engine.login('u-alice', at(9, 5));

    await h.dispatcher.dispatchPending();
    const again = await h.dispatcher.dispatchPending();

    expect(again.attempted).toBe(0);
    expect(h.channel.sent).toHaveLength(1);
    expect(await h.notifications.countByStatus()).toEqual({ pending: 0, sent: 0, failed: 1 });
  });

  it('does not send again when recording a delivery fails', async () => {
    const h = await createHarness();
    await h.engine.login('u-alice', at(9, 5));
    jest.spyOn(h.notifications, 'markSent').mockRejectedValueOnce(new Error('connection reset'));
    const errorSpy = jest.spyOn(console, 'error').mockImplementation(() => undefined);

    const first = await h.dispatcher.dispatchPending();
    const [afterFirst] = await h.notifications.listForUser('u-alice');
    h.clock.set(at(9, 10));
    const second = await h.dispatcher.dispatchPending();

    expect(first).toEqual({ attempted: 1, sent: 1, failed: 0 });
    expect(afterFirst.status).toBe('pending');
    expect(second).toEqual({ attempted: 0, sent: 0, failed: 0 });
    expect(h.channel.sent).toHaveLength(1);
    expect((await h.notifications.listForUser('u-alice'))[0]).toMatchObject({ status: 'sent', sentAt: at(9, 10) });
    errorSpy.mockRestore();
  });

  it('marks the entry failed when the channel throws', async () => {
    const h = await createHarness();
    const throwing: DeliveryChannel = {
      send: async () => {
        throw new Error('socket hang up');
      },
    };
    const dispatcher = new NotificationDispatcher(h.notifications, h.users, throwing, { mode: 'deferred', clock: h.clock });
    const id = await dispatcher.notify('u-bob', 'Team meeting at 3pm', 'reminder');

    await dispatcher.dispatchPending();

    expect(await h.notifications.get(id)).toMatchObject({ status: 'failed', errorMessage: 'socket hang up' });
  });

  it('fails entries for users without a contact address', async () => {
    const h = await createHarness();
    await h.users.importUsers([
      { id: 'u-dave', name: 'Dave', phone: '', department: 'Ops', role: 'staff', status: 'active' },
    ]);
    const id = await h.dispatcher.notify('u-dave', 'Please update your phone number', 'alert');

    await h.dispatcher.dispatchPending();

    expect(await h.notifications.get(id)).toMatchObject({
      status: 'failed',
      errorMessage: 'No contact address for user u-dave',
    });
    expect(h.channel.sent).toEqual([]);
  });

  it('dispatches right after enqueue in inline mode', async () => {
    const h = await createHarness({ dispatchMode: 'inline' });

    await h.engine.login('u-alice', at(9, 5));
    await h.dispatcher.idle();

    const [entry] = await h.notifications.listForUser('u-alice');
    expect(entry.status).toBe('sent');
    expect(h.channel.sent).toHaveLength(1);
  });

  it('leaves entries pending in deferred mode until a cycle runs', async () => {
    const h = await createHarness({ dispatchMode: 'deferred' });

    await h.engine.login('u-alice', at(9, 5));
    await h.dispatcher.idle();

    expect(await h.notifications.countByStatus()).toEqual({ pending: 1, sent: 0, failed: 0 });
    expect(h.channel.sent).toEqual([]);
  });
});
