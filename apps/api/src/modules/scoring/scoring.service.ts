// apps/api/src/modules/scoring/scoring.service.ts

import { randomUUID } from 'crypto';
import { fail, internalFailure, ServiceFailure } from '../../lib/status';
import { AnswerKeyEntry } from '../exams/exam.model';
import { ExamAuthority } from '../exams/examAuthority.client';
import { SessionLedger } from '../examSession/session.model';
import { isLive } from '../examSession/sessionStateMachine';
import { SessionLedgerSource } from '../sessions/sessionLedger.client';
import { tallyAnswers } from './grading.service';
import { ExamScore, ScorePage } from './score.model';
import { ScoringRepository } from './scoring.repository';

export const DEFAULT_PAGE_SIZE = 20;
export const MAX_PAGE_SIZE = 100;

export type ScoreResult =
  | { success: true; score: ExamScore }
  | ServiceFailure;

export type ScorePageResult =
  | ({ success: true } & ScorePage)
  | ServiceFailure;

export interface ListScoresParams {
  examId: string;
  pageSize?: number;
  pageToken?: string;
}

export interface ScoringService {
  calculateScore(sessionId: string): Promise<ScoreResult>;
  getScore(scoreId: string): Promise<ScoreResult>;
  listScores(params: ListScoresParams): Promise<ScorePageResult>;
}

export interface ScoringServiceDeps {
  scores: ScoringRepository;
  ledgers: SessionLedgerSource;
  examAuthority: ExamAuthority;
  now?: () => Date;
}

function parsePageToken(token: string | undefined): number | null {
  if (token === undefined || token === '') return 0;
  if (!/^\d+$/.test(token)) return null;
  const offset = Number(token);
  return Number.isSafeInteger(offset) ? offset : null;
}

export function createScoringService(deps: ScoringServiceDeps): ScoringService {
  const now = deps.now ?? (() => new Date());

  return {
    async calculateScore(sessionId) {
      let ledger: SessionLedger | null;
      try {
        ledger = await deps.ledgers.getLedger(sessionId);
      } catch (err) {
        return internalFailure('scoring', 'get session ledger', err);
      }
      if (!ledger) {
        return fail('NOT_FOUND', 'SESSION_NOT_FOUND', 'session not found');
      }
      if (isLive(ledger.status)) {
        return fail('FAILED_PRECONDITION', 'SESSION_NOT_FINISHED', 'session is not finished');
      }

      let answerKey: AnswerKeyEntry[] | null;
      try {
        answerKey = await deps.examAuthority.getAnswerKey(ledger.examId);
      } catch (err) {
        return internalFailure('scoring', 'get answer key', err);
      }
      if (!answerKey) {
        return fail('NOT_FOUND', 'ANSWER_KEY_NOT_FOUND', 'answer key not found for exam');
      }

      const tally = tallyAnswers(answerKey, ledger.answers);
      const score: ExamScore = {
        id: randomUUID(),
        examId: ledger.examId,
        sessionId: ledger.sessionId,
        studentId: ledger.studentId,
        ...tally,
        createdAt: now(),
      };

      try {
        const result = await deps.scores.createScore(score);
        if (result.outcome === 'DUPLICATE') {
          return fail(
            'ALREADY_EXISTS',
            'SCORE_ALREADY_EXISTS',
            'score already exists for this exam and student'
          );
        }
        console.log(
          `[scoring] session ${ledger.sessionId} scored ${tally.correctAnswers}/${tally.totalQuestions}`
        );
        return { success: true, score: result.score };
      } catch (err) {
        return internalFailure('scoring', 'save score', err);
      }
    },

    async getScore(scoreId) {
      try {
        const score = await deps.scores.getScoreById(scoreId);
        return score
          ? { success: true, score }
          : fail('NOT_FOUND', 'SCORE_NOT_FOUND', 'score not found');
      } catch (err) {
        return internalFailure('scoring', 'get score', err);
      }
    },

    async listScores({ examId, pageSize, pageToken }) {
      const size = pageSize ?? DEFAULT_PAGE_SIZE;
      if (!Number.isInteger(size) || size <= 0) {
        return fail('INVALID_ARGUMENT', 'INVALID_INPUT', 'pageSize must be a positive integer');
      }
      const offset = parsePageToken(pageToken);
      if (offset === null) {
        return fail('INVALID_ARGUMENT', 'INVALID_INPUT', 'invalid pageToken');
      }

      const limit = Math.min(size, MAX_PAGE_SIZE);
      try {
        const scores = await deps.scores.listScoresByExam(examId, limit, offset);
        return {
          success: true,
          scores,
          nextPageToken: scores.length === limit ? String(offset + limit) : undefined,
        };
      } catch (err) {
        return internalFailure('scoring', 'list scores', err);
      }
    },
  };
}
