import { Router, Request, Response } from 'express';
import { z } from 'zod';
import { AttendanceEngine, AttendanceOutcome } from '../services/AttendanceEngine.js';
import { AttendanceRecord, ATTENDANCE_STATUSES, WORK_TYPES } from '../models/Attendance.js';
import { isDateKey } from '../clock.js';
import { sendError, sendValidationError } from './respond.js';

const dateSchema = z.string().refine(isDateKey, 'Invalid date format. Use YYYY-MM-DD');

export function createAttendanceRoutes(engine: AttendanceEngine): Router {
  const router = Router();

  const withDuration = (record: AttendanceRecord) => ({
    ...record,
    workDurationMinutes: engine.workDuration(record),
  });

  const outcomeBody = (outcome: AttendanceOutcome, done: string, duplicate: string) => ({
    message: outcome.condition ? duplicate : done,
    condition: outcome.condition,
    record: withDuration(outcome.record),
  });

  // POST /attendance/login - Record a sign-in
  const eventSchema = z.object({
    userId: z.string().min(1),
    at: z.string().datetime({ offset: true }).optional(),
  });

  router.post('/login', async (req: Request, res: Response) => {
    try {
      const parsed = eventSchema.safeParse(req.body);
      if (!parsed.success) return sendValidationError(res, parsed.error);

      const { userId, at } = parsed.data;
      const outcome = await engine.login(userId, at ? new Date(at) : undefined);
      res.json(outcomeBody(outcome, 'Signed in successfully', 'Already signed in today'));
    } catch (error) {
      sendError(res, error, 'Attendance', 'Failed to record sign-in');
    }
  });

  // POST /attendance/logout - Record a sign-out
  router.post('/logout', async (req: Request, res: Response) => {
    try {
      const parsed = eventSchema.safeParse(req.body);
      if (!parsed.success) return sendValidationError(res, parsed.error);

      const { userId, at } = parsed.data;
      const outcome = await engine.logout(userId, at ? new Date(at) : undefined);
      res.json(outcomeBody(outcome, 'Signed out successfully', 'Already signed out today'));
    } catch (error) {
      sendError(res, error, 'Attendance', 'Failed to record sign-out');
    }
  });

  // POST /attendance/leave and /attendance/remote - Declare a day off or a remote day
  const declarationSchema = z.object({
    userId: z.string().min(1),
    date: dateSchema,
    notes: z.string().max(1000).optional(),
  });

  for (const kind of ['leave', 'remote'] as const) {
    router.post(`/${kind}`, async (req: Request, res: Response) => {
      try {
        const parsed = declarationSchema.safeParse(req.body);
        if (!parsed.success) return sendValidationError(res, parsed.error);

        const { userId, date, notes } = parsed.data;
        const record =
          kind === 'leave'
            ? await engine.requestLeave(userId, date, notes ?? null)
            : await engine.markRemote(userId, date, notes ?? null);

        res.json({
          message: `${record.status} marked successfully for ${date}`,
          record: withDuration(record),
        });
      } catch (error) {
        sendError(res, error, 'Attendance', `Failed to mark ${kind}`);
      }
    });
  }

  // POST /attendance/sweep - Mark everyone without a record as absent
  const sweepSchema = z.object({ date: dateSchema.optional() });

  router.post('/sweep', async (req: Request, res: Response) => {
    try {
      const parsed = sweepSchema.safeParse(req.body ?? {});
      if (!parsed.success) return sendValidationError(res, parsed.error);

      const summary = await engine.runAbsenceSweep(parsed.data.date);
      res.json(summary);
    } catch (error) {
      sendError(res, error, 'Sweep', 'Failed to run absence sweep');
    }
  });

  // GET /attendance/:userId?from=&to= - History for one user
  const rangeSchema = z.object({ from: dateSchema, to: dateSchema });

  router.get('/:userId', async (req: Request, res: Response) => {
    try {
      const parsed = rangeSchema.safeParse(req.query);
      if (!parsed.success) return sendValidationError(res, parsed.error);

      const records = await engine.listRecords(req.params.userId, parsed.data.from, parsed.data.to);
      res.json(records.map(withDuration));
    } catch (error) {
      sendError(res, error, 'Attendance', 'Failed to get attendance');
    }
  });

  // GET /attendance/:userId/summary?days= - Day counts up to today
  const summarySchema = z.object({ days: z.coerce.number().int().min(1).max(366).default(7) });

  router.get('/:userId/summary', async (req: Request, res: Response) => {
    try {
      const parsed = summarySchema.safeParse(req.query);
      if (!parsed.success) return sendValidationError(res, parsed.error);

      res.json(await engine.summarize(req.params.userId, parsed.data.days));
    } catch (error) {
      sendError(res, error, 'Attendance', 'Failed to summarize attendance');
    }
  });

  // GET /attendance/:userId/:date - One day
  router.get('/:userId/:date', async (req: Request, res: Response) => {
    try {
      const parsed = dateSchema.safeParse(req.params.date);
      if (!parsed.success) return sendValidationError(res, parsed.error);

      const record = await engine.getRecord(req.params.userId, parsed.data);
      res.json(withDuration(record));
    } catch (error) {
      sendError(res, error, 'Attendance', 'Failed to get attendance');
    }
  });

  // PATCH /attendance/:userId/:date - Admin correction
  const correctionSchema = z
    .object({
      status: z.enum(ATTENDANCE_STATUSES).optional(),
      workType: z.enum(WORK_TYPES).optional(),
      notes: z.string().max(1000).nullable().optional(),
    })
    .refine((patch) => Object.keys(patch).length > 0, 'Nothing to update');

  router.patch('/:userId/:date', async (req: Request, res: Response) => {
    try {
      const date = dateSchema.safeParse(req.params.date);
      if (!date.success) return sendValidationError(res, date.error);
      const parsed = correctionSchema.safeParse(req.body);
      if (!parsed.success) return sendValidationError(res, parsed.error);

      const record = await engine.correct(req.params.userId, date.data, parsed.data);
      res.json({ message: 'Attendance record updated successfully', record: withDuration(record) });
    } catch (error) {
      sendError(res, error, 'Attendance', 'Failed to update attendance');
    }
  });

  return router;
}
