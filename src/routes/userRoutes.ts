import { Router, Request, Response } from 'express';
import { z } from 'zod';
import { UserRepository } from '../repositories/UserRepository.js';
import { sendError, sendValidationError } from './respond.js';

export function createUserRoutes(users: UserRepository): Router {
  const router = Router();

  // POST /users/import - Seed or refresh the staff directory
  const importSchema = z.object({
    users: z.array(
      z.object({
        id: z.string().min(1),
        name: z.string().min(1).max(100),
        phone: z.string().max(20),
        department: z.string().min(1).max(50),
        role: z.enum(['staff', 'admin']).default('staff'),
        status: z.enum(['active', 'inactive']).default('active'),
      })
    ),
  });

  router.post('/import', async (req: Request, res: Response) => {
    try {
      const parsed = importSchema.safeParse(req.body);
      if (!parsed.success) return sendValidationError(res, parsed.error);

      const count = await users.importUsers(parsed.data.users);
      res.json({
        message: `Successfully imported ${count} users`,
        count,
      });
    } catch (error) {
      sendError(res, error, 'Users', 'Failed to import users');
    }
  });

  // GET /users/:userId
  router.get('/:userId', async (req: Request, res: Response) => {
    try {
      const user = await users.getById(req.params.userId);
      if (!user) return res.status(404).json({ error: `User ${req.params.userId} does not exist` });
      res.json(user);
    } catch (error) {
      sendError(res, error, 'Users', 'Failed to get user');
    }
  });

  return router;
}
