// API layer: Scoresheet play routes
// Each handler runs synchronously, so a sheet has one writer at a time

import { Router, type Request, type Response } from 'express';
import type { ScoringService } from '@/application/scoring/ScoringService.js';
import type { ScoresheetStore } from '@/application/scoring/ScoresheetStore.js';
import { ScoreRejectedError } from '@/utils/errors.js';
import { RollRequestSchema, SelectionRequestSchema } from '../schemas.js';
import { requireScoresheet } from './create.js';

export function createPlayRoutes(service: ScoringService, store: ScoresheetStore): Router {
  const router = Router();

  // Check whether a category may be scored
  router.post('/:id/validate', (req: Request, res: Response) => {
    const { sheet } = requireScoresheet(store, req.params.id);
    const { dice, categoryId } = SelectionRequestSchema.parse(req.body);

    res.json({
      success: true,
      verdict: service.validate(sheet, dice, categoryId),
    });
  });

  // Categories legal for a roll
  router.post('/:id/legal', (req: Request, res: Response) => {
    const { sheet } = requireScoresheet(store, req.params.id);
    const { dice } = RollRequestSchema.parse(req.body);
    const roll = service.newRoll(dice);

    res.json({
      success: true,
      categories: service.legalCategories(sheet, roll).map((category) => category.id),
    });
  });

  // Commit a score
  router.post('/:id/commit', (req: Request, res: Response) => {
    const { sheet } = requireScoresheet(store, req.params.id);
    const { dice, categoryId } = SelectionRequestSchema.parse(req.body);

    const result = service.commit(sheet, dice, categoryId);
    if (!result.ok) {
      throw new ScoreRejectedError(result.reason, result.message, { categoryId });
    }

    res.json({
      success: true,
      entry: result.entry,
      bonusAwarded: result.bonusAwarded,
      totals: result.totals,
      complete: sheet.isComplete(),
    });
  });

  return router;
}
