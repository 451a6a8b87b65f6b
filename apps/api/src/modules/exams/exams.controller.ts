// apps/api/src/modules/exams/exams.controller.ts

import { Request, Response } from 'express';
import { bodyOf, paramOf, sendFailure, sendInvalidInput, trimmedString } from '../../lib/http';
import { AnswerKeyEntry, Exam } from './exam.model';
import { ExamsService } from './exams.service';

const CHOICE_PATTERN = /^[A-Z]$/;

export function toExamDto(exam: Exam) {
  return {
    id: exam.id,
    title: exam.title,
    subject: exam.subject,
    durationMinutes: exam.durationMinutes,
    totalQuestions: exam.totalQuestions,
    status: exam.status,
    startTime: exam.startTime?.toISOString(),
    endTime: exam.endTime?.toISOString(),
    createdAt: exam.createdAt.toISOString(),
    updatedAt: exam.updatedAt.toISOString(),
  };
}

function toAnswerKeyDto(entry: AnswerKeyEntry) {
  return {
    questionId: entry.questionId,
    position: entry.position,
    correctChoice: entry.correctChoice,
  };
}

function parseCorrectChoices(value: unknown): string[] | null {
  if (!Array.isArray(value)) return null;
  const choices: string[] = [];
  for (const item of value) {
    const choice = trimmedString(item).toUpperCase();
    if (!CHOICE_PATTERN.test(choice)) return null;
    choices.push(choice);
  }
  return choices;
}

export function createExamsController(service: ExamsService) {
  return {
    async createExamHandler(req: Request, res: Response): Promise<void> {
      const body = bodyOf(req);
      const title = trimmedString(body.title);
      const subject = trimmedString(body.subject);
      const durationMinutes = body.durationMinutes;
      const correctChoices = parseCorrectChoices(body.correctChoices);

      if (!title || !subject) {
        sendInvalidInput(res, 'title and subject are required');
        return;
      }
      if (typeof durationMinutes !== 'number' || !Number.isInteger(durationMinutes) || durationMinutes <= 0) {
        sendInvalidInput(res, 'durationMinutes must be a positive integer');
        return;
      }
      if (!correctChoices) {
        sendInvalidInput(res, 'correctChoices must be a list of single letters');
        return;
      }

      const result = await service.createExam({ title, subject, durationMinutes, correctChoices });
      if (!result.success) {
        sendFailure(res, result);
        return;
      }
      res.status(201).json({ success: true, exam: toExamDto(result.exam) });
    },

    async getExamHandler(req: Request, res: Response): Promise<void> {
      const result = await service.getExam(paramOf(req, 'id'));
      if (!result.success) {
        sendFailure(res, result);
        return;
      }
      res.json({ success: true, exam: toExamDto(result.exam) });
    },

    async getAnswerKeyHandler(req: Request, res: Response): Promise<void> {
      const result = await service.getAnswerKey(paramOf(req, 'id'));
      if (!result.success) {
        sendFailure(res, result);
        return;
      }
      res.json({ success: true, answerKey: result.answerKey.map(toAnswerKeyDto) });
    },

    async activateExamHandler(req: Request, res: Response): Promise<void> {
      const result = await service.activateExam(paramOf(req, 'id'));
      if (!result.success) {
        sendFailure(res, result);
        return;
      }
      res.json({ success: true, exam: toExamDto(result.exam) });
    },

    async deactivateExamHandler(req: Request, res: Response): Promise<void> {
      const result = await service.deactivateExam(paramOf(req, 'id'));
      if (!result.success) {
        sendFailure(res, result);
        return;
      }
      res.json({ success: true, exam: toExamDto(result.exam) });
    },
  };
}
