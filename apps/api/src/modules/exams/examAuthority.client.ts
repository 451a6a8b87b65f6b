// apps/api/src/modules/exams/examAuthority.client.ts

import {
  callService,
  isRecord,
  readArray,
  readNumber,
  readRecord,
  readString,
} from '../../lib/serviceClient';
import { ServiceCallError, ServiceFailure } from '../../lib/status';
import { AnswerKeyEntry, ExamStatus } from './exam.model';
import { ExamsService } from './exams.service';

export interface ExamStateView {
  id: string;
  status: ExamStatus;
  durationMinutes: number;
}

/**
 * What the session manager and the scoring aggregator may ask the exam
 * authority. Both reads return null when the exam does not exist and throw
 * when the authority cannot answer.
 */
export interface ExamAuthority {
  getExamState(examId: string): Promise<ExamStateView | null>;
  getAnswerKey(examId: string): Promise<AnswerKeyEntry[] | null>;
}

function unwrapLocal(failure: ServiceFailure): null {
  if (failure.code === 'NOT_FOUND') return null;
  throw new ServiceCallError(failure.message);
}

export function createLocalExamAuthority(service: ExamsService): ExamAuthority {
  return {
    async getExamState(examId) {
      const result = await service.getExam(examId);
      if (!result.success) return unwrapLocal(result);
      const { id, status, durationMinutes } = result.exam;
      return { id, status, durationMinutes };
    },

    async getAnswerKey(examId) {
      const result = await service.getAnswerKey(examId);
      if (!result.success) return unwrapLocal(result);
      return result.answerKey;
    },
  };
}

function parseExamStatus(value: string): ExamStatus {
  switch (value) {
    case 'created':
    case 'active':
    case 'finished':
      return value;
    default:
      throw new ServiceCallError(`malformed response: unknown exam status "${value}"`);
  }
}

function parseAnswerKeyEntry(value: unknown): AnswerKeyEntry {
  if (!isRecord(value)) {
    throw new ServiceCallError('malformed response: answer key entry is not an object');
  }
  return {
    questionId: readString(value, 'questionId'),
    position: readNumber(value, 'position'),
    correctChoice: readString(value, 'correctChoice'),
  };
}

export function createHttpExamAuthority(baseUrl: string, timeoutMs: number): ExamAuthority {
  return {
    async getExamState(examId) {
      const response = await callService(baseUrl, `/exams/${encodeURIComponent(examId)}`, { timeoutMs });
      if (!response.found) return null;
      const exam = readRecord(response.body, 'exam');
      return {
        id: readString(exam, 'id'),
        status: parseExamStatus(readString(exam, 'status')),
        durationMinutes: readNumber(exam, 'durationMinutes'),
      };
    },

    async getAnswerKey(examId) {
      const response = await callService(
        baseUrl,
        `/exams/${encodeURIComponent(examId)}/answer-key`,
        { timeoutMs }
      );
      if (!response.found) return null;
      return readArray(response.body, 'answerKey').map(parseAnswerKeyEntry);
    },
  };
}
