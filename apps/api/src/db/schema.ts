// apps/api/src/db/schema.ts

import { sql } from 'drizzle-orm';
import {
  doublePrecision,
  index,
  integer,
  pgEnum,
  pgTable,
  primaryKey,
  text,
  timestamp,
  uniqueIndex,
  varchar,
} from 'drizzle-orm/pg-core';

export const examStatusEnum = pgEnum('exam_status', ['CREATED', 'ACTIVE', 'FINISHED']);

export const sessionStatusEnum = pgEnum('session_status', [
  'STARTED',
  'IN_PROGRESS',
  'FINISHED',
  'TIMEOUT',
]);

export type DbExamStatus = (typeof examStatusEnum.enumValues)[number];
export type DbSessionStatus = (typeof sessionStatusEnum.enumValues)[number];

/**
 * exams
 *
 * Owned by the exam authority. `status` is the only thing the session manager
 * reads, and only when admitting a new session.
 */
export const exams = pgTable(
  'exams',
  {
    id: text('id').primaryKey(),
    title: varchar('title', { length: 255 }).notNull(),
    subject: varchar('subject', { length: 100 }).notNull(),
    durationMinutes: integer('duration_minutes').notNull(),
    totalQuestions: integer('total_questions').notNull(),
    status: examStatusEnum('status').default('CREATED').notNull(),
    startTime: timestamp('start_time', { withTimezone: true }),
    endTime: timestamp('end_time', { withTimezone: true }),
    createdAt: timestamp('created_at', { withTimezone: true }).defaultNow().notNull(),
    updatedAt: timestamp('updated_at', { withTimezone: true }).defaultNow().notNull(),
  },
  (table) => ({
    statusIdx: index('idx_exam_status').on(table.status),
  })
);

/** Answer key rows: one per question, ordered by position. */
export const questions = pgTable(
  'questions',
  {
    id: text('id').primaryKey(),
    examId: text('exam_id')
      .references(() => exams.id, { onDelete: 'cascade' })
      .notNull(),
    position: integer('position').notNull(),
    correctChoice: varchar('correct_choice', { length: 1 }).notNull(),
  },
  (table) => ({
    examIdx: index('idx_question_exam').on(table.examId),
    positionUnique: uniqueIndex('uq_question_exam_position').on(table.examId, table.position),
  })
);

export const examSessions = pgTable(
  'exam_sessions',
  {
    id: text('id').primaryKey(),
    examId: text('exam_id').notNull(),
    studentId: text('student_id').notNull(),
    status: sessionStatusEnum('status').default('STARTED').notNull(),
    startTime: timestamp('start_time', { withTimezone: true }).notNull(),
    endTime: timestamp('end_time', { withTimezone: true }),
    createdAt: timestamp('created_at', { withTimezone: true }).defaultNow().notNull(),
    updatedAt: timestamp('updated_at', { withTimezone: true }).defaultNow().notNull(),
  },
  (table) => ({
    // At most one live session per student, whatever the exam.
    liveSessionPerStudent: uniqueIndex('uq_live_session_per_student')
      .on(table.studentId)
      .where(sql`status IN ('STARTED', 'IN_PROGRESS')`),
    examIdx: index('idx_session_exam').on(table.examId),
    statusIdx: index('idx_session_status').on(table.status),
  })
);

/** The answer ledger. Re-answering a question replaces its row. */
export const sessionAnswers = pgTable(
  'session_answers',
  {
    sessionId: text('session_id')
      .references(() => examSessions.id, { onDelete: 'cascade' })
      .notNull(),
    questionId: text('question_id').notNull(),
    selectedChoice: varchar('selected_choice', { length: 1 }).notNull(),
    answeredAt: timestamp('answered_at', { withTimezone: true }).notNull(),
  },
  (table) => ({
    pk: primaryKey({ columns: [table.sessionId, table.questionId] }),
  })
);

export const examScores = pgTable(
  'exam_scores',
  {
    id: text('id').primaryKey(),
    examId: text('exam_id').notNull(),
    sessionId: text('session_id').notNull(),
    studentId: text('student_id').notNull(),
    totalQuestions: integer('total_questions').notNull(),
    correctAnswers: integer('correct_answers').notNull(),
    wrongAnswers: integer('wrong_answers').notNull(),
    unanswered: integer('unanswered').notNull(),
    score: doublePrecision('score').notNull(),
    createdAt: timestamp('created_at', { withTimezone: true }).defaultNow().notNull(),
  },
  (table) => ({
    examStudentUnique: uniqueIndex('uq_score_exam_student').on(table.examId, table.studentId),
    sessionIdx: index('idx_score_session').on(table.sessionId),
  })
);
