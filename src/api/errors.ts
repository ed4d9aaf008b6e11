import { Response } from 'express';
import { z } from 'zod';
import { ArbitrageCoreError } from '../eval/errors';
import { createLogger } from '../utils/logger';

const logger = createLogger('api');

/** Caller mistakes become 400s with a stable code; anything else is a 500. */
export function sendError(res: Response, error: unknown): void {
  if (error instanceof ArbitrageCoreError) {
    res.status(400).json({ error: error.message, code: error.code });
    return;
  }
  if (error instanceof z.ZodError) {
    const issue = error.errors[0];
    res.status(400).json({ error: `${issue.path.join('.')}: ${issue.message}`, code: 'invalid_request' });
    return;
  }
  logger.error('unhandled_route_error', { error: error instanceof Error ? error.stack : String(error) });
  res.status(500).json({ error: 'internal_error', code: 'internal_error' });
}

export const DecimalInputSchema = z.union([
  z.string().trim().regex(/^-?\d+(\.\d+)?([eE][-+]?\d+)?$/, 'expected a decimal number'),
  z.number().finite(),
]);
