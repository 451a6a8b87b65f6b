import { ExamSession, RemainingTime } from './session.model';
import { isTerminal } from './sessionStateMachine';

const ZERO: RemainingTime = { minutes: 0, seconds: 0 };

export function deadlineOf(startTime: Date, durationMinutes: number): number {
  return startTime.getTime() + durationMinutes * 60_000;
}

export function isPastDeadline(
  session: Pick<ExamSession, 'startTime'>,
  durationMinutes: number,
  now: Date
): boolean {
  return now.getTime() >= deadlineOf(session.startTime, durationMinutes);
}

/** Advisory only; the timeout sweep is what actually ends overdue sessions. */
export function computeRemainingTime(
  session: Pick<ExamSession, 'status' | 'startTime'>,
  durationMinutes: number,
  now: Date
): RemainingTime {
  if (isTerminal(session.status)) return { ...ZERO };

  const remainingMs = deadlineOf(session.startTime, durationMinutes) - now.getTime();
  if (remainingMs <= 0) return { ...ZERO };

  const totalSeconds = Math.floor(remainingMs / 1000);
  return {
    minutes: Math.floor(totalSeconds / 60),
    seconds: totalSeconds % 60,
  };
}
