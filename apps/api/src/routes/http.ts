import type { Response } from 'express';
import type { z } from 'zod';
import { AppError, ValidationError } from '../errors';
import { logError } from '../logger';

export function parseId(raw: string | undefined): number | null {
  if (!raw || !/^\d+$/.test(raw)) {
    return null;
  }
  const id = Number(raw);
  return Number.isSafeInteger(id) && id > 0 ? id : null;
}

export function parseBody<S extends z.ZodTypeAny>(schema: S, body: unknown): z.infer<S> {
  const parsed = schema.safeParse(body);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue.path.length > 0 ? `${issue.path.join('.')}: ` : '';
    throw new ValidationError(`${where}${issue.message}`);
  }
  return parsed.data;
}

export function sendInvalidId(res: Response) {
  return res.status(400).json({ error: { code: 'ValidationError', message: 'Invalid id' } });
}

/** Domain errors answer with their own status; anything else is logged and hidden behind a 500. */
export function sendError(res: Response, error: unknown, fallbackMessage: string, context: Record<string, unknown> = {}) {
  if (error instanceof AppError) {
    return res.status(error.statusCode).json(error.toResponse());
  }

  logError(fallbackMessage, { ...context, error });
  return res.status(500).json({ error: { code: 'InternalError', message: fallbackMessage } });
}
