// modules/exams/examStateMachine.ts

import { ExamStatus } from './exam.model';

export type ExamEvent = 'ACTIVATE' | 'DEACTIVATE';

// ===== State machine =====

/** Next status for `event`, or null when the exam cannot take it. Never goes back. */
export function nextExamStatus(
  status: ExamStatus,
  event: ExamEvent
): ExamStatus | null {
  switch (status) {
    case 'created':
      return event === 'ACTIVATE' ? 'active' : null;
    case 'active':
      return event === 'DEACTIVATE' ? 'finished' : null;
    case 'finished':
      return null;
  }
}

export function admitsNewSessions(status: ExamStatus): boolean {
  return status === 'active';
}
