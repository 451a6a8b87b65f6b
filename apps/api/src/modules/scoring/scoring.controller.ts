// apps/api/src/modules/scoring/scoring.controller.ts

import { Request, Response } from 'express';
import { bodyOf, paramOf, sendFailure, sendInvalidInput, trimmedString } from '../../lib/http';
import { ExamScore } from './score.model';
import { ScoringService } from './scoring.service';

export function toScoreDto(score: ExamScore) {
  return {
    id: score.id,
    examId: score.examId,
    sessionId: score.sessionId,
    studentId: score.studentId,
    totalQuestions: score.totalQuestions,
    correctAnswers: score.correctAnswers,
    wrongAnswers: score.wrongAnswers,
    unanswered: score.unanswered,
    score: score.score,
    createdAt: score.createdAt.toISOString(),
  };
}

function queryString(req: Request, name: string): string {
  const value: unknown = req.query[name];
  return trimmedString(Array.isArray(value) ? value[0] : value);
}

export function createScoringController(service: ScoringService) {
  return {
    async calculateScoreHandler(req: Request, res: Response): Promise<void> {
      const sessionId = trimmedString(bodyOf(req).sessionId);
      if (!sessionId) {
        sendInvalidInput(res, 'sessionId is required');
        return;
      }

      const result = await service.calculateScore(sessionId);
      if (!result.success) {
        sendFailure(res, result);
        return;
      }
      res.status(201).json({ success: true, score: toScoreDto(result.score) });
    },

    async getScoreHandler(req: Request, res: Response): Promise<void> {
      const result = await service.getScore(paramOf(req, 'id'));
      if (!result.success) {
        sendFailure(res, result);
        return;
      }
      res.json({ success: true, score: toScoreDto(result.score) });
    },

    async listScoresHandler(req: Request, res: Response): Promise<void> {
      const examId = queryString(req, 'examId');
      if (!examId) {
        sendInvalidInput(res, 'examId is required');
        return;
      }
      const rawPageSize = queryString(req, 'pageSize');
      const pageSize = rawPageSize ? Number(rawPageSize) : undefined;
      const pageToken = queryString(req, 'pageToken') || undefined;

      const result = await service.listScores({ examId, pageSize, pageToken });
      if (!result.success) {
        sendFailure(res, result);
        return;
      }
      res.json({
        success: true,
        scores: result.scores.map(toScoreDto),
        nextPageToken: result.nextPageToken,
      });
    },
  };
}
