// apps/api/src/app.ts

import express from 'express';
import compression from 'compression';
import type { Express, NextFunction, Request, Response } from 'express';
import { createExamsRouter } from './modules/exams/exams.routes';
import { ExamsService } from './modules/exams/exams.service';
import { createScoringRouter } from './modules/scoring/scoring.routes';
import { ScoringService } from './modules/scoring/scoring.service';
import { createSessionsRouter } from './modules/sessions/sessions.routes';
import { SessionsService } from './modules/sessions/sessions.service';

/** Services to mount; an absent one is served by another process. */
export interface MountedServices {
  exams?: ExamsService;
  sessions?: SessionsService;
  scoring?: ScoringService;
}

export function createApp(services: MountedServices): Express {
  const app = express();

  app.use(compression());
  app.use(express.json({ limit: '1mb' }));

  if (services.exams) app.use('/exams', createExamsRouter(services.exams));
  if (services.sessions) app.use('/sessions', createSessionsRouter(services.sessions));
  if (services.scoring) app.use('/scores', createScoringRouter(services.scoring));

  app.get('/health', (_req, res) => {
    res.status(200).json({ status: 'ok' });
  });

  app.use((_req, res) => {
    res.status(404).json({ status: 'not_found' });
  });

  // Global error handler: rejected async handlers end up here
  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    if (err && typeof err === 'object' && 'type' in err && err.type === 'entity.parse.failed') {
      if (!res.headersSent) {
        res.status(400).json({
          success: false,
          code: 'INVALID_ARGUMENT',
          reasonCode: 'INVALID_INPUT',
          message: 'malformed JSON body',
        });
        return;
      }
    }
    console.error('[API error]', err);
    if (res.headersSent) return;
    res.status(500).json({ success: false, code: 'INTERNAL', reasonCode: 'INTERNAL_ERROR' });
  });

  return app;
}
