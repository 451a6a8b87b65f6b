import { Router } from 'express';
import { createScoringController } from './scoring.controller';
import { ScoringService } from './scoring.service';

export function createScoringRouter(service: ScoringService): Router {
  const router = Router();
  const controller = createScoringController(service);

  router.post('/', controller.calculateScoreHandler);
  router.get('/', controller.listScoresHandler);
  router.get('/:id', controller.getScoreHandler);

  return router;
}
