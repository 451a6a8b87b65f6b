import { Router } from 'express';
import { createExamsController } from './exams.controller';
import { ExamsService } from './exams.service';

export function createExamsRouter(service: ExamsService): Router {
  const router = Router();
  const controller = createExamsController(service);

  router.post('/', controller.createExamHandler);
  router.get('/:id', controller.getExamHandler);
  router.get('/:id/answer-key', controller.getAnswerKeyHandler);
  router.post('/:id/activate', controller.activateExamHandler);
  router.post('/:id/deactivate', controller.deactivateExamHandler);

  return router;
}
