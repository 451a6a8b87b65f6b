// apps/api/src/modules/sessions/sessions.controller.ts

import { Request, Response } from 'express';
import { bodyOf, paramOf, sendFailure, sendInvalidInput, trimmedString } from '../../lib/http';
import { ExamSession, SessionAnswer, SessionLedger } from '../examSession/session.model';
import { SessionsService } from './sessions.service';

// '' records an explicitly blank answer.
const CHOICE_PATTERN = /^[A-Z]?$/;

function toAnswerDto(answer: SessionAnswer) {
  return {
    questionId: answer.questionId,
    selectedChoice: answer.selectedChoice,
    answeredAt: answer.answeredAt.toISOString(),
  };
}

export function toSessionDto(session: ExamSession) {
  return {
    id: session.id,
    examId: session.examId,
    studentId: session.studentId,
    status: session.status,
    startTime: session.startTime.toISOString(),
    endTime: session.endTime?.toISOString(),
    answers: session.answers.map(toAnswerDto),
  };
}

export function toLedgerDto(ledger: SessionLedger) {
  return {
    sessionId: ledger.sessionId,
    examId: ledger.examId,
    studentId: ledger.studentId,
    status: ledger.status,
    answers: ledger.answers.map(toAnswerDto),
  };
}

export function createSessionsController(service: SessionsService) {
  return {
    async startSessionHandler(req: Request, res: Response): Promise<void> {
      const body = bodyOf(req);
      const examId = trimmedString(body.examId);
      const studentId = trimmedString(body.studentId);
      if (!examId || !studentId) {
        sendInvalidInput(res, 'examId and studentId are required');
        return;
      }

      const result = await service.startSession(examId, studentId);
      if (!result.success) {
        sendFailure(res, result);
        return;
      }
      res.status(201).json({ success: true, session: toSessionDto(result.session) });
    },

    async getSessionHandler(req: Request, res: Response): Promise<void> {
      const result = await service.getSession(paramOf(req, 'id'));
      if (!result.success) {
        sendFailure(res, result);
        return;
      }
      res.json({ success: true, session: toSessionDto(result.session) });
    },

    async submitAnswerHandler(req: Request, res: Response): Promise<void> {
      const body = bodyOf(req);
      const questionId = trimmedString(body.questionId);

      if (!questionId) {
        sendInvalidInput(res, 'questionId is required');
        return;
      }
      // A blank answer must be sent as ''; a missing field is not one.
      if (typeof body.selectedChoice !== 'string') {
        sendInvalidInput(res, 'selectedChoice must be a single letter or empty');
        return;
      }
      const selectedChoice = body.selectedChoice.trim().toUpperCase();
      if (!CHOICE_PATTERN.test(selectedChoice)) {
        sendInvalidInput(res, 'selectedChoice must be a single letter or empty');
        return;
      }

      const result = await service.submitAnswer({
        sessionId: paramOf(req, 'id'),
        questionId,
        selectedChoice,
      });
      if (!result.success) {
        sendFailure(res, result);
        return;
      }
      res.json({ success: true, message: result.message });
    },

    async finishSessionHandler(req: Request, res: Response): Promise<void> {
      const result = await service.finishSession(paramOf(req, 'id'));
      if (!result.success) {
        sendFailure(res, result);
        return;
      }
      res.json({ success: true, session: toSessionDto(result.session) });
    },

    async getRemainingTimeHandler(req: Request, res: Response): Promise<void> {
      const result = await service.getRemainingTime(paramOf(req, 'id'));
      if (!result.success) {
        sendFailure(res, result);
        return;
      }
      res.json({
        success: true,
        remainingMinutes: result.remaining.minutes,
        remainingSeconds: result.remaining.seconds,
      });
    },

    async getLedgerHandler(req: Request, res: Response): Promise<void> {
      const result = await service.getSessionLedger(paramOf(req, 'id'));
      if (!result.success) {
        sendFailure(res, result);
        return;
      }
      res.json({ success: true, ledger: toLedgerDto(result.ledger) });
    },
  };
}
