// apps/api/src/container.ts

import type IORedis from 'ioredis';
import type { Database } from './db/client';
import type { AppConfig } from './lib/config';
import { createExamsRepository } from './modules/exams/exam.repository';
import {
  createHttpExamAuthority,
  createLocalExamAuthority,
  ExamAuthority,
} from './modules/exams/examAuthority.client';
import { createExamsService, ExamsService } from './modules/exams/exams.service';
import {
  createHttpScoreTrigger,
  createLocalScoreTrigger,
  ScoreTrigger,
} from './modules/scoring/scoring.client';
import { createScoringRepository } from './modules/scoring/scoring.repository';
import { createScoringService, ScoringService } from './modules/scoring/scoring.service';
import {
  createExamDurationReader,
  createRedisDurationCache,
  ExamDurationReader,
} from './modules/sessions/examDuration.reader';
import {
  createHttpSessionLedgerSource,
  createLocalSessionLedgerSource,
  SessionLedgerSource,
} from './modules/sessions/sessionLedger.client';
import { createSessionsRepository, SessionsRepository } from './modules/sessions/sessions.repository';
import { createSessionsService, SessionsService } from './modules/sessions/sessions.service';

export interface Container {
  exams?: ExamsService;
  sessions?: SessionsService;
  scoring?: ScoringService;
  /** Set when the sessions service is mounted; used by the timeout sweep. */
  sweep?: {
    sessions: SessionsRepository;
    durations: ExamDurationReader;
    scoreTrigger?: ScoreTrigger;
  };
}

/**
 * Builds the mounted services and their collaborators. A collaborator whose
 * service is mounted here is called in-process, otherwise over HTTP.
 */
export function buildContainer(config: AppConfig, db: Database, redis?: IORedis): Container {
  const has = (name: AppConfig['services'][number]) => config.services.includes(name);
  const container: Container = {};

  if (has('exams')) {
    container.exams = createExamsService({ exams: createExamsRepository(db) });
  }

  let examAuthority: ExamAuthority | undefined;
  if (container.exams) {
    examAuthority = createLocalExamAuthority(container.exams);
  } else if (config.examServiceUrl) {
    examAuthority = createHttpExamAuthority(config.examServiceUrl, config.serviceTimeoutMs);
  }

  const sessionsRepo = has('sessions') ? createSessionsRepository(db) : undefined;

  if (has('scoring') && examAuthority) {
    let ledgers: SessionLedgerSource | undefined;
    if (sessionsRepo) {
      ledgers = createLocalSessionLedgerSource(sessionsRepo);
    } else if (config.sessionServiceUrl) {
      ledgers = createHttpSessionLedgerSource(config.sessionServiceUrl, config.serviceTimeoutMs);
    }
    if (ledgers) {
      container.scoring = createScoringService({
        scores: createScoringRepository(db),
        ledgers,
        examAuthority,
      });
    }
  }

  if (sessionsRepo && examAuthority) {
    let scoreTrigger: ScoreTrigger | undefined;
    if (config.scoreOnFinish) {
      if (container.scoring) {
        scoreTrigger = createLocalScoreTrigger(container.scoring);
      } else if (config.scoringServiceUrl) {
        scoreTrigger = createHttpScoreTrigger(config.scoringServiceUrl, config.serviceTimeoutMs);
      } else {
        console.warn('[sessions] SCORE_ON_FINISH is set but no scoring service is reachable');
      }
    }

    const cache =
      redis && config.examDurationCacheTtlSeconds > 0
        ? createRedisDurationCache(redis, config.examDurationCacheTtlSeconds)
        : undefined;
    const durations = createExamDurationReader(examAuthority, cache);

    container.sessions = createSessionsService({
      sessions: sessionsRepo,
      examAuthority,
      durations,
      scoreTrigger,
    });
    container.sweep = { sessions: sessionsRepo, durations, scoreTrigger };
  }

  return container;
}
