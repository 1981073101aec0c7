// API layer: Category catalog routes

import { Router, type Request, type Response } from 'express';
import type { ScoringService } from '@/application/scoring/ScoringService.js';

export function createCategoryRouter(service: ScoringService): Router {
  const router = Router();

  // List the rule catalog
  router.get('/', (_req: Request, res: Response) => {
    const { catalog } = service;

    res.json({
      success: true,
      categories: service.categoryCatalog(),
      bonus: catalog.bonus,
      upperBonus: catalog.upperBonus,
      options: catalog.options,
    });
  });

  return router;
}
