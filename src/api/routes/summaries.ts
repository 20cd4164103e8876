import { Router } from 'express';
import { z } from 'zod';
import { formatTranscript, runCallSummary } from '../../services/summary';
import type { PipelineContext } from '../../services/stage';
import { sendPipelineError } from '../errors';

const summarySchema = z.object({
  transcript: z.union([
    z.string().trim().min(1).max(100_000),
    z
      .array(z.object({ role: z.string().min(1).max(50), text: z.string().max(10_000) }))
      .min(1)
      .max(1000),
  ]),
});

export function createSummariesRouter(ctx: PipelineContext): Router {
  const router = Router();

  // POST /api/summaries — summarize a finished call's transcript
  router.post('/', async (req, res) => {
    try {
      const parsed = summarySchema.parse(req.body);
      const transcript =
        typeof parsed.transcript === 'string' ? parsed.transcript : formatTranscript(parsed.transcript);
      const summary = await runCallSummary(ctx, transcript);
      res.json(summary);
    } catch (err) {
      sendPipelineError(res, err, 'summarizing call');
    }
  });

  return router;
}
