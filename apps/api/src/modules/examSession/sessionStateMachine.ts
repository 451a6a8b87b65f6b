  // modules/examSession/sessionStateMachine.ts

import { SessionStatus } from './session.model';

export type SessionEvent =
  | 'ANSWER'
  | 'FINISH'
  | 'TIME_EXPIRED';

export type TransitionResult =
  | { ok: true; status: SessionStatus }
  | { ok: false; from: SessionStatus; event: SessionEvent };

export const LIVE_STATUSES: readonly SessionStatus[] = ['started', 'inProgress'];

export function isLive(status: SessionStatus): boolean {
  return LIVE_STATUSES.includes(status);
}

export function isTerminal(status: SessionStatus): boolean {
  return !isLive(status);
}

// ===== State machine =====
// finished and timeout are absorbing: every event on them is rejected.

export function transitionSession(
  status: SessionStatus,
  event: SessionEvent
): TransitionResult {
  switch (status) {
    case 'started':
    case 'inProgress':
      if (event === 'ANSWER') {
        return { ok: true, status: 'inProgress' };
      }
      if (event === 'FINISH') {
        return { ok: true, status: 'finished' };
      }
      if (event === 'TIME_EXPIRED') {
        return { ok: true, status: 'timeout' };
      }
      break;

    case 'finished':
    case 'timeout':
      break;
  }

  return { ok: false, from: status, event };
}

/** Statuses from which `event` is legal; used to guard conditional updates in the store. */
export function statusesAccepting(event: SessionEvent): SessionStatus[] {
  const all: SessionStatus[] = ['started', 'inProgress', 'finished', 'timeout'];
  return all.filter((status) => transitionSession(status, event).ok);
}
