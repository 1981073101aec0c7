// API layer: Scoresheet routes (composed)

import { Router } from 'express';
import type { ScoringService } from '@/application/scoring/ScoringService.js';
import type { ScoresheetStore } from '@/application/scoring/ScoresheetStore.js';
import { createLifecycleRoutes } from './create.js';
import { createPlayRoutes } from './play.js';

export function createScoresheetRouter(service: ScoringService, store: ScoresheetStore): Router {
  const router = Router();

  router.use('/', createLifecycleRoutes(service, store));
  router.use('/', createPlayRoutes(service, store));

  return router;
}
