// API layer: Scoresheet lifecycle routes

import { Router, type Request, type Response } from 'express';
import { v4 as uuidv4 } from 'uuid';
import { createError } from '@/api/middleware/errorHandler.js';
import type { ScoringService } from '@/application/scoring/ScoringService.js';
import type { ScoresheetStore, StoredScoresheet } from '@/application/scoring/ScoresheetStore.js';
import { CreateScoresheetSchema } from '../schemas.js';

export function describeScoresheet(stored: StoredScoresheet) {
  const { sheet } = stored;
  return {
    sheetId: stored.id,
    player: stored.player ?? null,
    createdAt: stored.createdAt.toISOString(),
    complete: sheet.isComplete(),
    rows: sheet.rows(),
    totals: sheet.totals(),
  };
}

export function requireScoresheet(store: ScoresheetStore, id: string): StoredScoresheet {
  const stored = store.get(id);
  if (!stored) {
    throw createError('Scoresheet not found', 404, 'SCORESHEET_NOT_FOUND');
  }
  return stored;
}

export function createLifecycleRoutes(service: ScoringService, store: ScoresheetStore): Router {
  const router = Router();

  // Create scoresheet
  router.post('/', (req: Request, res: Response) => {
    const { requestId, player } = CreateScoresheetSchema.parse(req.body ?? {});

    const sheetId = requestId || uuidv4();
    if (store.has(sheetId)) {
      throw createError('Scoresheet already exists', 409, 'SCORESHEET_EXISTS');
    }

    const stored = store.add(sheetId, service.createScoresheet(), player);

    res.status(201).json({
      success: true,
      sheetId,
      createdAt: stored.createdAt.toISOString(),
    });
  });

  // List scoresheets
  router.get('/', (_req: Request, res: Response) => {
    res.json({
      success: true,
      count: store.size,
      scoresheets: store.list().map((stored) => ({
        sheetId: stored.id,
        player: stored.player ?? null,
        grandTotal: stored.sheet.totals().grandTotal,
      })),
    });
  });

  // Get scoresheet
  router.get('/:id', (req: Request, res: Response) => {
    const stored = requireScoresheet(store, req.params.id);
    res.json({ success: true, ...describeScoresheet(stored) });
  });

  // Delete scoresheet
  router.delete('/:id', (req: Request, res: Response) => {
    if (!store.delete(req.params.id)) {
      throw createError('Scoresheet not found', 404, 'SCORESHEET_NOT_FOUND');
    }
    res.json({ success: true });
  });

  return router;
}
