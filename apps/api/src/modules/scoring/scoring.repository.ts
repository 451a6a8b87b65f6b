// modules/scoring/scoring.repository.ts

import { asc, desc, eq } from 'drizzle-orm';
import type { Database } from '../../db/client';
import { isUniqueViolation } from '../../db/pgErrors';
import { examScores } from '../../db/schema';
import { ExamScore } from './score.model';

export const SCORE_PER_STUDENT_CONSTRAINT = 'uq_score_exam_student';

export type CreateScoreOutcome =
  | { outcome: 'CREATED'; score: ExamScore }
  | { outcome: 'DUPLICATE' };

export interface ScoringRepository {
  /** Scores are write-once; a second score for the same exam and student is DUPLICATE. */
  createScore(score: ExamScore): Promise<CreateScoreOutcome>;
  getScoreById(scoreId: string): Promise<ExamScore | null>;
  /** Highest score first, then oldest first. */
  listScoresByExam(examId: string, limit: number, offset: number): Promise<ExamScore[]>;
}

type ScoreRow = typeof examScores.$inferSelect;

function mapScoreFromDb(row: ScoreRow): ExamScore {
  return {
    id: row.id,
    examId: row.examId,
    sessionId: row.sessionId,
    studentId: row.studentId,
    totalQuestions: row.totalQuestions,
    correctAnswers: row.correctAnswers,
    wrongAnswers: row.wrongAnswers,
    unanswered: row.unanswered,
    score: row.score,
    createdAt: row.createdAt,
  };
}

export function createScoringRepository(db: Database): ScoringRepository {
  return {
    async createScore(score) {
      try {
        const [created] = await db.insert(examScores).values(score).returning();
        return { outcome: 'CREATED', score: mapScoreFromDb(created) };
      } catch (err) {
        if (isUniqueViolation(err, SCORE_PER_STUDENT_CONSTRAINT)) {
          return { outcome: 'DUPLICATE' };
        }
        throw err;
      }
    },

    async getScoreById(scoreId) {
      const [row] = await db
        .select()
        .from(examScores)
        .where(eq(examScores.id, scoreId))
        .limit(1);
      return row ? mapScoreFromDb(row) : null;
    },

    async listScoresByExam(examId, limit, offset) {
      const rows = await db
        .select()
        .from(examScores)
        .where(eq(examScores.examId, examId))
        .orderBy(desc(examScores.score), asc(examScores.createdAt), asc(examScores.id))
        .limit(limit)
        .offset(offset);
      return rows.map(mapScoreFromDb);
    },
  };
}
