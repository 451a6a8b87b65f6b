// apps/api/src/modules/sessions/sessions.repository.ts

import { and, asc, eq, inArray } from 'drizzle-orm';
import type { Database } from '../../db/client';
import { isUniqueViolation } from '../../db/pgErrors';
import { DbSessionStatus, examSessions, sessionAnswers } from '../../db/schema';
import {
  ExamSession,
  SessionAnswer,
  SessionStatus,
} from '../examSession/session.model';
import {
  LIVE_STATUSES,
  statusesAccepting,
  transitionSession,
} from '../examSession/sessionStateMachine';

export const LIVE_SESSION_CONSTRAINT = 'uq_live_session_per_student';

export type SessionHeader = Omit<ExamSession, 'answers'>;

export type StartSessionOutcome =
  | { outcome: 'CREATED'; session: ExamSession }
  | { outcome: 'LIVE_SESSION_EXISTS' };

export type SubmitAnswerOutcome =
  | { outcome: 'SAVED'; status: SessionStatus }
  | { outcome: 'NOT_FOUND' }
  | { outcome: 'REJECTED'; status: SessionStatus };

export type FinishSessionOutcome =
  | { outcome: 'FINISHED'; session: ExamSession }
  | { outcome: 'NOT_FOUND' }
  | { outcome: 'REJECTED'; status: SessionStatus };

export interface SessionsRepository {
  /** Admission: the live-session check and the insert are one atomic unit per student. */
  startSession(session: ExamSession): Promise<StartSessionOutcome>;
  getSessionById(sessionId: string): Promise<ExamSession | null>;
  /** Insert-or-replace keyed by (session, question); advances started → inProgress. */
  submitAnswer(sessionId: string, answer: SessionAnswer): Promise<SubmitAnswerOutcome>;
  finishSession(sessionId: string, endTime: Date): Promise<FinishSessionOutcome>;
  listLiveSessions(): Promise<SessionHeader[]>;
  /** false when the session was no longer live. */
  markTimedOut(sessionId: string, endTime: Date): Promise<boolean>;
}

function mapStatusToDb(status: SessionStatus): DbSessionStatus {
  switch (status) {
    case 'started':
      return 'STARTED';
    case 'inProgress':
      return 'IN_PROGRESS';
    case 'finished':
      return 'FINISHED';
    case 'timeout':
      return 'TIMEOUT';
  }
}

function mapStatusFromDb(status: DbSessionStatus): SessionStatus {
  switch (status) {
    case 'IN_PROGRESS':
      return 'inProgress';
    case 'FINISHED':
      return 'finished';
    case 'TIMEOUT':
      return 'timeout';
    default:
      return 'started';
  }
}

type SessionRow = typeof examSessions.$inferSelect;
type AnswerRow = typeof sessionAnswers.$inferSelect;

function mapSessionFromDb(row: SessionRow): SessionHeader {
  return {
    id: row.id,
    examId: row.examId,
    studentId: row.studentId,
    status: mapStatusFromDb(row.status),
    startTime: row.startTime,
    endTime: row.endTime ?? undefined,
  };
}

function mapAnswerFromDb(row: AnswerRow): SessionAnswer {
  return {
    questionId: row.questionId,
    selectedChoice: row.selectedChoice,
    answeredAt: row.answeredAt,
  };
}

const LIVE_DB_STATUSES = LIVE_STATUSES.map(mapStatusToDb);

export function createSessionsRepository(db: Database): SessionsRepository {
  async function loadAnswers(sessionId: string): Promise<SessionAnswer[]> {
    const rows = await db
      .select()
      .from(sessionAnswers)
      .where(eq(sessionAnswers.sessionId, sessionId))
      .orderBy(asc(sessionAnswers.answeredAt));
    return rows.map(mapAnswerFromDb);
  }

  return {
    async startSession(session) {
      try {
        return await db.transaction(async (tx): Promise<StartSessionOutcome> => {
          const [live] = await tx
            .select({ id: examSessions.id })
            .from(examSessions)
            .where(
              and(
                eq(examSessions.studentId, session.studentId),
                inArray(examSessions.status, LIVE_DB_STATUSES)
              )
            )
            .limit(1);
          if (live) {
            return { outcome: 'LIVE_SESSION_EXISTS' };
          }

          // A concurrent admission that slipped past the check trips the partial unique index.
          const [created] = await tx
            .insert(examSessions)
            .values({
              id: session.id,
              examId: session.examId,
              studentId: session.studentId,
              status: mapStatusToDb(session.status),
              startTime: session.startTime,
              createdAt: session.startTime,
              updatedAt: session.startTime,
            })
            .returning();

          return { outcome: 'CREATED', session: { ...mapSessionFromDb(created), answers: [] } };
        });
      } catch (err) {
        if (isUniqueViolation(err, LIVE_SESSION_CONSTRAINT)) {
          return { outcome: 'LIVE_SESSION_EXISTS' };
        }
        throw err;
      }
    },

    async getSessionById(sessionId) {
      const [row] = await db
        .select()
        .from(examSessions)
        .where(eq(examSessions.id, sessionId))
        .limit(1);
      if (!row) return null;
      return { ...mapSessionFromDb(row), answers: await loadAnswers(sessionId) };
    },

    async submitAnswer(sessionId, answer) {
      return db.transaction(async (tx): Promise<SubmitAnswerOutcome> => {
        const [row] = await tx
          .select({ status: examSessions.status })
          .from(examSessions)
          .where(eq(examSessions.id, sessionId))
          .limit(1)
          .for('update');
        if (!row) {
          return { outcome: 'NOT_FOUND' };
        }

        const current = mapStatusFromDb(row.status);
        const next = transitionSession(current, 'ANSWER');
        if (!next.ok) {
          return { outcome: 'REJECTED', status: current };
        }

        await tx
          .insert(sessionAnswers)
          .values({
            sessionId,
            questionId: answer.questionId,
            selectedChoice: answer.selectedChoice,
            answeredAt: answer.answeredAt,
          })
          .onConflictDoUpdate({
            target: [sessionAnswers.sessionId, sessionAnswers.questionId],
            set: {
              selectedChoice: answer.selectedChoice,
              answeredAt: answer.answeredAt,
            },
          });

        if (next.status !== current) {
          await tx
            .update(examSessions)
            .set({ status: mapStatusToDb(next.status), updatedAt: answer.answeredAt })
            .where(eq(examSessions.id, sessionId));
        }

        return { outcome: 'SAVED', status: next.status };
      });
    },

    async finishSession(sessionId, endTime) {
      return db.transaction(async (tx): Promise<FinishSessionOutcome> => {
        const [row] = await tx
          .select({ status: examSessions.status })
          .from(examSessions)
          .where(eq(examSessions.id, sessionId))
          .limit(1)
          .for('update');
        if (!row) {
          return { outcome: 'NOT_FOUND' };
        }

        const current = mapStatusFromDb(row.status);
        const next = transitionSession(current, 'FINISH');
        if (!next.ok) {
          return { outcome: 'REJECTED', status: current };
        }

        const [updated] = await tx
          .update(examSessions)
          .set({ status: mapStatusToDb(next.status), endTime, updatedAt: endTime })
          .where(eq(examSessions.id, sessionId))
          .returning();

        const answers = await tx
          .select()
          .from(sessionAnswers)
          .where(eq(sessionAnswers.sessionId, sessionId))
          .orderBy(asc(sessionAnswers.answeredAt));

        return {
          outcome: 'FINISHED',
          session: { ...mapSessionFromDb(updated), answers: answers.map(mapAnswerFromDb) },
        };
      });
    },

    async listLiveSessions() {
      const rows = await db
        .select()
        .from(examSessions)
        .where(inArray(examSessions.status, LIVE_DB_STATUSES))
        .orderBy(asc(examSessions.startTime));
      return rows.map(mapSessionFromDb);
    },

    async markTimedOut(sessionId, endTime) {
      const accepting = statusesAccepting('TIME_EXPIRED').map(mapStatusToDb);
      const rows = await db
        .update(examSessions)
        .set({ status: mapStatusToDb('timeout'), endTime, updatedAt: endTime })
        .where(and(eq(examSessions.id, sessionId), inArray(examSessions.status, accepting)))
        .returning({ id: examSessions.id });
      return rows.length > 0;
    },
  };
}
