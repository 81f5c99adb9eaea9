import type { Response } from 'express';
import { z, ZodError } from 'zod';

export const pageQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(100).default(20),
  offset: z.coerce.number().int().min(0).default(0),
});

export const idParamSchema = z.object({ id: z.string().min(1) });

// zod failures are the caller's fault; anything else is ours.
export function sendFailure(res: Response, tag: string, code: string, err: unknown) {
  if (err instanceof ZodError) {
    return res.status(400).json({ error: 'invalid_input', details: err.issues });
  }
  console.error(`[${tag}] ${code}`, err);
  return res.status(500).json({ error: code });
}
