  // modules/exams/exam.repository.ts

import { and, asc, eq } from 'drizzle-orm';
import type { Database } from '../../db/client';
import { DbExamStatus, exams, questions } from '../../db/schema';
import { AnswerKeyEntry, Exam, ExamStatus, NewExam } from './exam.model';

export interface ExamsRepository {
  createExam(input: NewExam): Promise<Exam>;
  getExamById(examId: string): Promise<Exam | null>;
  /** null when the exam does not exist; an empty list when it has no questions. */
  getAnswerKey(examId: string): Promise<AnswerKeyEntry[] | null>;
  /** Moves the exam from `from` to `to`; null when it is no longer in `from`. */
  transitionExamStatus(
    examId: string,
    from: ExamStatus,
    to: ExamStatus,
    at: Date
  ): Promise<Exam | null>;
}

function mapStatusToDb(status: ExamStatus): DbExamStatus {
  switch (status) {
    case 'created':
      return 'CREATED';
    case 'active':
      return 'ACTIVE';
    case 'finished':
      return 'FINISHED';
  }
}

function mapStatusFromDb(status: DbExamStatus): ExamStatus {
  switch (status) {
    case 'ACTIVE':
      return 'active';
    case 'FINISHED':
      return 'finished';
    default:
      return 'created';
  }
}

type ExamRow = typeof exams.$inferSelect;

function mapExamFromDb(row: ExamRow): Exam {
  return {
    id: row.id,
    title: row.title,
    subject: row.subject,
    durationMinutes: row.durationMinutes,
    totalQuestions: row.totalQuestions,
    status: mapStatusFromDb(row.status),
    startTime: row.startTime ?? undefined,
    endTime: row.endTime ?? undefined,
    createdAt: row.createdAt,
    updatedAt: row.updatedAt,
  };
}

export function createExamsRepository(db: Database): ExamsRepository {
  return {
    async createExam({ exam, answerKey }) {
      return db.transaction(async (tx) => {
        const [created] = await tx
          .insert(exams)
          .values({
            id: exam.id,
            title: exam.title,
            subject: exam.subject,
            durationMinutes: exam.durationMinutes,
            totalQuestions: exam.totalQuestions,
            status: mapStatusToDb(exam.status),
            createdAt: exam.createdAt,
            updatedAt: exam.updatedAt,
          })
          .returning();

        if (answerKey.length > 0) {
          await tx.insert(questions).values(
            answerKey.map((entry) => ({
              id: entry.questionId,
              examId: exam.id,
              position: entry.position,
              correctChoice: entry.correctChoice,
            }))
          );
        }

        return mapExamFromDb(created);
      });
    },

    async getExamById(examId) {
      const [row] = await db.select().from(exams).where(eq(exams.id, examId)).limit(1);
      return row ? mapExamFromDb(row) : null;
    },

    async getAnswerKey(examId) {
      const [exam] = await db
        .select({ id: exams.id })
        .from(exams)
        .where(eq(exams.id, examId))
        .limit(1);
      if (!exam) return null;

      const rows = await db
        .select()
        .from(questions)
        .where(eq(questions.examId, examId))
        .orderBy(asc(questions.position));

      return rows.map((row) => ({
        questionId: row.id,
        position: row.position,
        correctChoice: row.correctChoice,
      }));
    },

    async transitionExamStatus(examId, from, to, at) {
      const [row] = await db
        .update(exams)
        .set({
          status: mapStatusToDb(to),
          updatedAt: at,
          ...(to === 'active' ? { startTime: at } : {}),
          ...(to === 'finished' ? { endTime: at } : {}),
        })
        .where(and(eq(exams.id, examId), eq(exams.status, mapStatusToDb(from))))
        .returning();
      return row ? mapExamFromDb(row) : null;
    },
  };
}
