import { Router } from 'express';
import { createSessionsController } from './sessions.controller';
import { SessionsService } from './sessions.service';

export function createSessionsRouter(service: SessionsService): Router {
  const router = Router();
  const controller = createSessionsController(service);

  router.post('/', controller.startSessionHandler);
  router.get('/:id', controller.getSessionHandler);
  router.post('/:id/answers', controller.submitAnswerHandler);
  router.post('/:id/finish', controller.finishSessionHandler);
  router.get('/:id/remaining-time', controller.getRemainingTimeHandler);
  router.get('/:id/ledger', controller.getLedgerHandler);

  return router;
}
