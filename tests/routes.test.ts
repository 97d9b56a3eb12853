/** @jest-environment node */

import { afterAll, beforeAll, describe, expect, it } from '@jest/globals';
import { Server } from 'node:http';
import axios, { AxiosInstance } from 'axios';
import { createApp } from '../src/app.js';
import { at, createHarness } from './helpers.js';

describe('HTTP routes', () => {
  let harness: Awaited<ReturnType<typeof createHarness>>;
  let server: Server;
  let http: AxiosInstance;

  beforeAll(async () => {
    harness = await createHarness();
    server = await new Promise<Server>((resolve) => {
      const listening = createApp(harness).listen(0, '127.0.0.1', () => resolve(listening));
    });

    const address = server.address();
    const port = typeof address === 'object' && address ? address.port : 0;
    http = axios.create({ baseURL: `http://127.0.0.1:${port}`, validateStatus: () => true });
  });

  afterAll(async () => {
    await new Promise<void>((resolve, reject) => server.close((error) => (error ? reject(error) : resolve())));
  });

  it('reports health', async () => {
    const res = await http.get('/health');

    expect(res.status).toBe(200);
    expect(res.data).toEqual({ status: 'ok', store: 'memory' });
  });

  it('imports users', async () => {
    const res = await http.post('/users/import', {
      users: [{ id: 'u-erin', name: 'Erin', phone: '+15550000005', department: 'Support' }],
    });

    expect(res.status).toBe(200);
    expect(res.data).toEqual({ message: 'Successfully imported 1 users', count: 1 });

    const user = await http.get('/users/u-erin');
    expect(user.data).toMatchObject({ id: 'u-erin', role: 'staff', status: 'active' });
  });

  it('signs in, signs in again and signs out', async () => {
    const first = await http.post('/attendance/login', { userId: 'u-alice', at: at(9, 5).toISOString() });
    expect(first.status).toBe(200);
    expect(first.data).toMatchObject({
      message: 'Signed in successfully',
      condition: null,
      record: { status: 'Present', workType: 'Office', loginTime: at(9, 5).toISOString(), workDurationMinutes: null },
    });

    const again = await http.post('/attendance/login', { userId: 'u-alice', at: at(9, 45).toISOString() });
    expect(again.status).toBe(200);
    expect(again.data).toMatchObject({
      message: 'Already signed in today',
      condition: 'DuplicateLogin',
      record: { loginTime: at(9, 5).toISOString() },
    });

    const out = await http.post('/attendance/logout', { userId: 'u-alice', at: at(17, 30).toISOString() });
    expect(out.status).toBe(200);
    expect(out.data.record).toMatchObject({ logoutTime: at(17, 30).toISOString(), workDurationMinutes: 505 });

    const day = await http.get('/attendance/u-alice/2024-03-01');
    expect(day.data).toMatchObject({ status: 'Present', workDurationMinutes: 505 });
  });

  it('summarizes recent days', async () => {
    const res = await http.get('/attendance/u-alice/summary', { params: { days: 7 } });

    expect(res.status).toBe(200);
    expect(res.data).toEqual({
      from: '2024-02-24',
      to: '2024-03-01',
      totalDays: 1,
      presentDays: 1,
      remoteDays: 0,
      leaveDays: 0,
      absentDays: 0,
    });

    const invalid = await http.get('/attendance/u-alice/summary', { params: { days: 0 } });
    expect(invalid.status).toBe(400);
  });

  it('rejects a sign-in for another day', async () => {
    const res = await http.post('/attendance/login', { userId: 'u-bob', at: at(9, 0, 2).toISOString() });

    expect(res.status).toBe(409);
    expect(res.data.code).toBe('NotToday');
  });

  it('maps engine rejections to their status and code', async () => {
    const res = await http.post('/attendance/logout', { userId: 'u-bob', at: at(17, 0).toISOString() });

    expect(res.status).toBe(404);
    expect(res.data).toEqual({ error: 'No attendance record for user u-bob on 2024-03-01', code: 'RecordNotFound' });

    const inactive = await http.post('/attendance/login', { userId: 'u-carol' });
    expect(inactive.status).toBe(403);
    expect(inactive.data.code).toBe('UserInactive');
  });

  it('validates request bodies', async () => {
    const res = await http.post('/attendance/leave', { userId: 'u-bob', date: '03/04/2024' });

    expect(res.status).toBe(400);
    expect(res.data.error).toContain('Invalid date format. Use YYYY-MM-DD');
  });

  it('declares leave and corrects it', async () => {
    const leave = await http.post('/attendance/leave', { userId: 'u-bob', date: '2024-03-04', notes: 'Trip' });
    expect(leave.status).toBe(200);
    expect(leave.data).toMatchObject({
      message: 'Leave marked successfully for 2024-03-04',
      record: { status: 'Leave', workType: 'Leave', notes: 'Trip' },
    });

    const corrected = await http.patch('/attendance/u-bob/2024-03-04', { status: 'Remote', workType: 'Remote' });
    expect(corrected.status).toBe(200);
    expect(corrected.data.record).toMatchObject({ status: 'Remote', workType: 'Remote', notes: 'Trip' });

    const history = await http.get('/attendance/u-bob', { params: { from: '2024-03-01', to: '2024-03-31' } });
    expect(history.data.map((r: { date: string }) => r.date)).toEqual(['2024-03-04']);
  });

  it('rejects a sweep before the cutoff', async () => {
    const res = await http.post('/attendance/sweep', { date: '2024-03-01' });

    expect(res.status).toBe(409);
    expect(res.data.code).toBe('CutoffNotReached');
  });

  it('dispatches queued notifications and reports the counts', async () => {
    const dispatch = await http.post('/notifications/dispatch');
    expect(dispatch.status).toBe(200);
    expect(dispatch.data).toEqual({ attempted: 2, sent: 2, failed: 0 });

    const log = await http.get('/notifications', { params: { userId: 'u-alice' } });
    expect(log.data.map((n: { type: string; status: string }) => `${n.type}:${n.status}`)).toEqual([
      'login:sent',
      'logout:sent',
    ]);

    const reminder = await http.post('/notifications/reminder', { userId: 'u-bob', message: 'Timesheets due Friday' });
    expect(reminder.status).toBe(202);

    const stats = await http.get('/notifications/stats');
    expect(stats.data).toEqual({ pending: 1, sent: 2, failed: 0 });
  });

  it('refuses reminders for unknown users', async () => {
    const res = await http.post('/notifications/reminder', { userId: 'u-nobody', message: 'Hello' });

    expect(res.status).toBe(404);
    expect(res.data.code).toBe('UnknownUser');
  });
});
