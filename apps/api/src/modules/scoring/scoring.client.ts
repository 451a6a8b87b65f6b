// apps/api/src/modules/scoring/scoring.client.ts

import { callService } from '../../lib/serviceClient';
import { ServiceCallError } from '../../lib/status';
import { ScoringService } from './scoring.service';

/** Called by the session manager once a session is terminal. Throws on failure. */
export interface ScoreTrigger {
  requestScore(sessionId: string): Promise<void>;
}

export function createLocalScoreTrigger(service: ScoringService): ScoreTrigger {
  return {
    async requestScore(sessionId) {
      const result = await service.calculateScore(sessionId);
      if (!result.success) {
        throw new ServiceCallError(result.message);
      }
    },
  };
}

export function createHttpScoreTrigger(baseUrl: string, timeoutMs: number): ScoreTrigger {
  return {
    async requestScore(sessionId) {
      const response = await callService(baseUrl, '/scores', {
        method: 'POST',
        body: { sessionId },
        timeoutMs,
      });
      if (!response.found) {
        throw new ServiceCallError(`session ${sessionId} not found by scoring service`, 404);
      }
    },
  };
}
