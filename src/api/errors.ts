import type { Response } from 'express';
import { z } from 'zod';
import { DecodeError, SchemaError, ServiceError } from '../utils/errors';
import { logger, errorMessage } from '../utils/logger';

export function sendPipelineError(res: Response, err: unknown, action: string): void {
  if (err instanceof z.ZodError) {
    res.status(400).json({ error: 'Validation error', details: err.issues });
    return;
  }
  if (err instanceof DecodeError || err instanceof SchemaError) {
    logger.error(`Error ${action}`, { stage: err.stage, iteration: err.iteration, error: err.message });
    res.status(502).json({
      error: err instanceof DecodeError ? 'Model response was not valid JSON' : 'Model response had an unexpected shape',
      stage: err.stage,
      iteration: err.iteration,
    });
    return;
  }
  if (err instanceof ServiceError) {
    logger.error(`Error ${action}`, { status: err.status, error: err.message });
    res.status(err.status === 429 ? 503 : 502).json({ error: 'Completion service failed' });
    return;
  }
  logger.error(`Error ${action}`, { error: errorMessage(err) });
  res.status(500).json({ error: 'Internal server error' });
}
