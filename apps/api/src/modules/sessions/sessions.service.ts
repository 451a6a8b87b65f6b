// apps/api/src/modules/sessions/sessions.service.ts

import { randomUUID } from 'crypto';

// ===== Domain =====
import {
  ExamSession,
  RemainingTime,
  SessionLedger,
  SessionStatus,
  toLedger,
} from '../examSession/session.model';
import { isTerminal } from '../examSession/sessionStateMachine';
import { computeRemainingTime } from '../examSession/time.guard';

// ===== Collaborators =====
import { ExamAuthority, ExamStateView } from '../exams/examAuthority.client';
import { admitsNewSessions } from '../exams/examStateMachine';
import { ScoreTrigger } from '../scoring/scoring.client';
import { ExamDurationReader } from './examDuration.reader';

// ===== Persistence & errors =====
import { fail, internalFailure, ServiceFailure } from '../../lib/status';
import { SessionsRepository } from './sessions.repository';

// =======================================================

export type SessionActionResult =
  | { success: true; session: ExamSession }
  | ServiceFailure;

export type SubmitAnswerResult =
  | { success: true; message: string }
  | ServiceFailure;

export type RemainingTimeResult =
  | { success: true; remaining: RemainingTime }
  | ServiceFailure;

export type SessionLedgerResult =
  | { success: true; ledger: SessionLedger }
  | ServiceFailure;

export interface SubmitAnswerParams {
  sessionId: string;
  questionId: string;
  selectedChoice: string;
}

export interface SessionsService {
  startSession(examId: string, studentId: string): Promise<SessionActionResult>;
  getSession(sessionId: string): Promise<SessionActionResult>;
  submitAnswer(params: SubmitAnswerParams): Promise<SubmitAnswerResult>;
  finishSession(sessionId: string): Promise<SessionActionResult>;
  getRemainingTime(sessionId: string): Promise<RemainingTimeResult>;
  getSessionLedger(sessionId: string): Promise<SessionLedgerResult>;
}

export interface SessionsServiceDeps {
  sessions: SessionsRepository;
  examAuthority: ExamAuthority;
  durations: ExamDurationReader;
  /** Asked to score a session once it is finished. Optional. */
  scoreTrigger?: ScoreTrigger;
  now?: () => Date;
}

// ================== Failures ==================

const sessionNotFound = () =>
  fail('NOT_FOUND', 'SESSION_NOT_FOUND', 'session not found');

const examNotFound = () =>
  fail('NOT_FOUND', 'EXAM_NOT_FOUND', 'exam not found');

function finishRejected(status: SessionStatus): ServiceFailure {
  if (status === 'timeout') {
    return fail('FAILED_PRECONDITION', 'SESSION_TIMED_OUT', 'session has timed out');
  }
  return fail('FAILED_PRECONDITION', 'SESSION_ALREADY_FINISHED', 'session is already finished');
}

// ================== Public API ==================

export function createSessionsService(deps: SessionsServiceDeps): SessionsService {
  const now = deps.now ?? (() => new Date());

  async function requestScore(sessionId: string): Promise<void> {
    if (!deps.scoreTrigger) return;
    try {
      await deps.scoreTrigger.requestScore(sessionId);
    } catch (err) {
      // The finish is already committed; scoring can be requested again explicitly.
      console.error(`[sessions] score request for session ${sessionId} failed`, err);
    }
  }

  return {
    async startSession(examId, studentId) {
      // Live read on every admission; activation state is never cached.
      let exam: ExamStateView | null;
      try {
        exam = await deps.examAuthority.getExamState(examId);
      } catch (err) {
        return internalFailure('sessions', 'check exam status', err);
      }
      if (!exam) {
        return examNotFound();
      }
      if (!admitsNewSessions(exam.status)) {
        return fail('FAILED_PRECONDITION', 'EXAM_NOT_ACTIVE', 'exam is not active');
      }

      const session: ExamSession = {
        id: randomUUID(),
        examId,
        studentId,
        status: 'started',
        startTime: now(),
        answers: [],
      };

      try {
        const result = await deps.sessions.startSession(session);
        if (result.outcome === 'LIVE_SESSION_EXISTS') {
          return fail(
            'FAILED_PRECONDITION',
            'SESSION_ALREADY_ACTIVE',
            'student already has an active session'
          );
        }
        return { success: true, session: result.session };
      } catch (err) {
        return internalFailure('sessions', 'start session', err);
      }
    },

    async getSession(sessionId) {
      try {
        const session = await deps.sessions.getSessionById(sessionId);
        return session ? { success: true, session } : sessionNotFound();
      } catch (err) {
        return internalFailure('sessions', 'get session', err);
      }
    },

    async submitAnswer(params) {
      try {
        const result = await deps.sessions.submitAnswer(params.sessionId, {
          questionId: params.questionId,
          selectedChoice: params.selectedChoice,
          answeredAt: now(),
        });

        if (result.outcome === 'NOT_FOUND') return sessionNotFound();
        if (result.outcome === 'REJECTED') {
          return fail(
            'FAILED_PRECONDITION',
            'SESSION_NOT_ANSWERABLE',
            'session is not in valid state for answering'
          );
        }
        return { success: true, message: 'Answer submitted successfully' };
      } catch (err) {
        return internalFailure('sessions', 'submit answer', err);
      }
    },

    async finishSession(sessionId) {
      // No exam authority check here: a session outlives its exam's deactivation.
      let finished: ExamSession;
      try {
        const result = await deps.sessions.finishSession(sessionId, now());
        if (result.outcome === 'NOT_FOUND') return sessionNotFound();
        if (result.outcome === 'REJECTED') return finishRejected(result.status);
        finished = result.session;
      } catch (err) {
        return internalFailure('sessions', 'finish session', err);
      }

      await requestScore(finished.id);
      return { success: true, session: finished };
    },

    async getRemainingTime(sessionId) {
      let session: ExamSession | null;
      try {
        session = await deps.sessions.getSessionById(sessionId);
      } catch (err) {
        return internalFailure('sessions', 'get session', err);
      }
      if (!session) return sessionNotFound();

      if (isTerminal(session.status)) {
        return { success: true, remaining: { minutes: 0, seconds: 0 } };
      }

      let durationMinutes: number | null;
      try {
        durationMinutes = await deps.durations.getDurationMinutes(session.examId);
      } catch (err) {
        return internalFailure('sessions', 'get exam duration', err);
      }
      if (durationMinutes === null) return examNotFound();

      return {
        success: true,
        remaining: computeRemainingTime(session, durationMinutes, now()),
      };
    },

    async getSessionLedger(sessionId) {
      try {
        const session = await deps.sessions.getSessionById(sessionId);
        return session ? { success: true, ledger: toLedger(session) } : sessionNotFound();
      } catch (err) {
        return internalFailure('sessions', 'get session ledger', err);
      }
    },
  };
}
