import { Router, Request, Response } from 'express';
import { z } from 'zod';
import { NotificationRepository } from '../repositories/NotificationRepository.js';
import { UserRepository } from '../repositories/UserRepository.js';
import { NotificationDispatcher } from '../services/NotificationDispatcher.js';
import { UnknownUserError } from '../errors.js';
import { sendError, sendValidationError } from './respond.js';

export function createNotificationRoutes(
  queue: NotificationRepository,
  dispatcher: NotificationDispatcher,
  users: UserRepository
): Router {
  const router = Router();

  // GET /notifications?userId= - Delivery log for one user
  router.get('/', async (req: Request, res: Response) => {
    try {
      const userId = req.query.userId;
      if (typeof userId !== 'string' || !userId) {
        return res.status(400).json({ error: 'userId is required' });
      }

      res.json(await queue.listForUser(userId));
    } catch (error) {
      sendError(res, error, 'Notifications', 'Failed to get notifications');
    }
  });

  // GET /notifications/stats - Pending, sent and failed counts
  router.get('/stats', async (_req: Request, res: Response) => {
    try {
      res.json(await queue.countByStatus());
    } catch (error) {
      sendError(res, error, 'Notifications', 'Failed to count notifications');
    }
  });

  // POST /notifications/dispatch - Run a delivery cycle now
  router.post('/dispatch', async (_req: Request, res: Response) => {
    try {
      res.json(await dispatcher.dispatchPending());
    } catch (error) {
      sendError(res, error, 'Notifications', 'Failed to dispatch notifications');
    }
  });

  // POST /notifications/reminder - Queue a custom reminder or alert
  const reminderSchema = z.object({
    userId: z.string().min(1),
    message: z.string().min(1).max(1600),
    type: z.enum(['reminder', 'alert']).default('reminder'),
  });

  router.post('/reminder', async (req: Request, res: Response) => {
    try {
      const parsed = reminderSchema.safeParse(req.body);
      if (!parsed.success) return sendValidationError(res, parsed.error);

      const { userId, message, type } = parsed.data;
      if (!(await users.getById(userId))) throw new UnknownUserError(userId);

      const id = await dispatcher.notify(userId, message, type);
      res.status(202).json({ message: 'Notification queued', id });
    } catch (error) {
      sendError(res, error, 'Notifications', 'Failed to queue notification');
    }
  });

  return router;
}
