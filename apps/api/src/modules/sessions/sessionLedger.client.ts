// apps/api/src/modules/sessions/sessionLedger.client.ts

import {
  callService,
  isRecord,
  readArray,
  readDate,
  readRecord,
  readString,
} from '../../lib/serviceClient';
import { ServiceCallError } from '../../lib/status';
import { SessionAnswer, SessionLedger, SessionStatus, toLedger } from '../examSession/session.model';
import { SessionsRepository } from './sessions.repository';

/** The scoring aggregator's read-only view of a session. null = no such session. */
export interface SessionLedgerSource {
  getLedger(sessionId: string): Promise<SessionLedger | null>;
}

export function createLocalSessionLedgerSource(sessions: SessionsRepository): SessionLedgerSource {
  return {
    async getLedger(sessionId) {
      const session = await sessions.getSessionById(sessionId);
      return session ? toLedger(session) : null;
    },
  };
}

function parseSessionStatus(value: string): SessionStatus {
  switch (value) {
    case 'started':
    case 'inProgress':
    case 'finished':
    case 'timeout':
      return value;
    default:
      throw new ServiceCallError(`malformed response: unknown session status "${value}"`);
  }
}

function parseAnswer(value: unknown): SessionAnswer {
  if (!isRecord(value)) {
    throw new ServiceCallError('malformed response: answer is not an object');
  }
  return {
    questionId: readString(value, 'questionId'),
    selectedChoice: readString(value, 'selectedChoice'),
    answeredAt: readDate(value, 'answeredAt'),
  };
}

export function createHttpSessionLedgerSource(baseUrl: string, timeoutMs: number): SessionLedgerSource {
  return {
    async getLedger(sessionId) {
      const response = await callService(
        baseUrl,
        `/sessions/${encodeURIComponent(sessionId)}/ledger`,
        { timeoutMs }
      );
      if (!response.found) return null;

      const ledger = readRecord(response.body, 'ledger');
      return {
        sessionId: readString(ledger, 'sessionId'),
        examId: readString(ledger, 'examId'),
        studentId: readString(ledger, 'studentId'),
        status: parseSessionStatus(readString(ledger, 'status')),
        answers: readArray(ledger, 'answers').map(parseAnswer),
      };
    },
  };
}
