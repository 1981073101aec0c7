// API layer: Stateless scoring routes
// Score a roll without touching any scoresheet

import { Router, type Request, type Response } from 'express';
import type { ScoringService } from '@/application/scoring/ScoringService.js';
import { RollRequestSchema, SelectionRequestSchema } from './schemas.js';

export function createScoringRouter(service: ScoringService): Router {
  const router = Router();

  // Score one category
  router.post('/score', (req: Request, res: Response) => {
    const { dice, categoryId } = SelectionRequestSchema.parse(req.body);
    const roll = service.newRoll(dice);

    res.json({
      success: true,
      categoryId,
      dice: roll,
      score: service.score(roll, categoryId),
      eligible: service.isEligible(roll, categoryId),
    });
  });

  // Score every category
  router.post('/preview', (req: Request, res: Response) => {
    const { dice } = RollRequestSchema.parse(req.body);
    const roll = service.newRoll(dice);

    res.json({
      success: true,
      dice: roll,
      scores: service.preview(roll),
    });
  });

  return router;
}
