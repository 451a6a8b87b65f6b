// apps/api/src/modules/exams/exams.service.ts

import { randomUUID } from 'crypto';
import { fail, internalFailure, ServiceFailure } from '../../lib/status';
import { AnswerKeyEntry, Exam } from './exam.model';
import { ExamsRepository } from './exam.repository';
import { ExamEvent, nextExamStatus } from './examStateMachine';

export type ExamActionResult =
  | { success: true; exam: Exam }
  | ServiceFailure;

export type AnswerKeyResult =
  | { success: true; answerKey: AnswerKeyEntry[] }
  | ServiceFailure;

export interface CreateExamParams {
  title: string;
  subject: string;
  durationMinutes: number;
  correctChoices: string[];
}

export interface ExamsService {
  createExam(params: CreateExamParams): Promise<ExamActionResult>;
  getExam(examId: string): Promise<ExamActionResult>;
  getAnswerKey(examId: string): Promise<AnswerKeyResult>;
  activateExam(examId: string): Promise<ExamActionResult>;
  deactivateExam(examId: string): Promise<ExamActionResult>;
}

export interface ExamsServiceDeps {
  exams: ExamsRepository;
  now?: () => Date;
}

const examNotFound = () => fail('NOT_FOUND', 'EXAM_NOT_FOUND', 'exam not found');

const TRANSITION_FAILURE: Record<ExamEvent, { reasonCode: string; message: string }> = {
  ACTIVATE: {
    reasonCode: 'EXAM_NOT_ACTIVATABLE',
    message: 'exam can only be activated when in CREATED state',
  },
  DEACTIVATE: {
    reasonCode: 'EXAM_NOT_DEACTIVATABLE',
    message: 'exam can only be deactivated when in ACTIVE state',
  },
};

export function createExamsService(deps: ExamsServiceDeps): ExamsService {
  const now = deps.now ?? (() => new Date());

  async function transition(
    examId: string,
    event: ExamEvent
  ): Promise<ExamActionResult> {
    const action = event === 'ACTIVATE' ? 'activate exam' : 'deactivate exam';
    try {
      const exam = await deps.exams.getExamById(examId);
      if (!exam) return examNotFound();

      const next = nextExamStatus(exam.status, event);
      if (!next) {
        const { reasonCode, message } = TRANSITION_FAILURE[event];
        return fail('FAILED_PRECONDITION', reasonCode, message);
      }

      // Conditional on the status we just read: a concurrent transition wins or we do.
      const updated = await deps.exams.transitionExamStatus(examId, exam.status, next, now());
      if (!updated) {
        const { reasonCode, message } = TRANSITION_FAILURE[event];
        return fail('FAILED_PRECONDITION', reasonCode, message);
      }
      return { success: true, exam: updated };
    } catch (err) {
      return internalFailure('exams', action, err);
    }
  }

  return {
    async createExam(params) {
      const createdAt = now();
      const exam: Exam = {
        id: randomUUID(),
        title: params.title,
        subject: params.subject,
        durationMinutes: params.durationMinutes,
        totalQuestions: params.correctChoices.length,
        status: 'created',
        createdAt,
        updatedAt: createdAt,
      };
      const answerKey = params.correctChoices.map((correctChoice, index) => ({
        questionId: randomUUID(),
        position: index + 1,
        correctChoice,
      }));

      try {
        const saved = await deps.exams.createExam({ exam, answerKey });
        return { success: true, exam: saved };
      } catch (err) {
        return internalFailure('exams', 'create exam', err);
      }
    },

    async getExam(examId) {
      try {
        const exam = await deps.exams.getExamById(examId);
        return exam ? { success: true, exam } : examNotFound();
      } catch (err) {
        return internalFailure('exams', 'get exam', err);
      }
    },

    async getAnswerKey(examId) {
      try {
        const answerKey = await deps.exams.getAnswerKey(examId);
        return answerKey ? { success: true, answerKey } : examNotFound();
      } catch (err) {
        return internalFailure('exams', 'get answer key', err);
      }
    },

    activateExam: (examId) => transition(examId, 'ACTIVATE'),
    deactivateExam: (examId) => transition(examId, 'DEACTIVATE'),
  };
}
