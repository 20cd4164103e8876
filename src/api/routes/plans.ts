import { Router } from 'express';
import { z } from 'zod';
import { runCallPlanning } from '../../services/planner';
import type { PipelineContext } from '../../services/stage';
import { sendPipelineError } from '../errors';

const createPlanSchema = z.object({
  request: z.string().trim().min(1).max(2000),
  refinementIterations: z.number().int().min(0).max(10).optional(),
});

export function createPlansRouter(ctx: PipelineContext, defaultIterations: number): Router {
  const router = Router();

  // POST /api/plans — run the full planning pipeline for a call request
  router.post('/', async (req, res) => {
    try {
      const parsed = createPlanSchema.parse(req.body);
      const result = await runCallPlanning(ctx, parsed.request, {
        refinementIterations: parsed.refinementIterations ?? defaultIterations,
      });
      res.json(result);
    } catch (err) {
      sendPipelineError(res, err, 'planning call');
    }
  });

  return router;
}
