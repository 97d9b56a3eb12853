import { Response } from 'express';
import { ZodError } from 'zod';
import { AttendanceError } from '../errors.js';

export function sendValidationError(res: Response, error: ZodError) {
  return res.status(400).json({ error: error.message });
}

/** Maps engine rejections to their status; anything else is logged as a 500. */
export function sendError(res: Response, error: unknown, tag: string, fallback: string) {
  if (error instanceof AttendanceError) {
    return res.status(error.status).json({ error: error.message, code: error.code });
  }

  console.error(`[${tag}] ${fallback}:`, error);
  return res.status(500).json({ error: error instanceof Error && error.message ? error.message : fallback });
}
