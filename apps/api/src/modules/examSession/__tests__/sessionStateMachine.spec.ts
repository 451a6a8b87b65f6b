import { describe, expect, it } from 'vitest';
import {
  isLive,
  isTerminal,
  statusesAccepting,
  transitionSession,
} from '../sessionStateMachine';

describe('transitionSession', () => {
  it('moves a started session to inProgress on the first answer', () => {
    expect(transitionSession('started', 'ANSWER')).toEqual({ ok: true, status: 'inProgress' });
  });

  it('keeps an inProgress session inProgress on further answers', () => {
    expect(transitionSession('inProgress', 'ANSWER')).toEqual({ ok: true, status: 'inProgress' });
  });

  it('finishes live sessions', () => {
    expect(transitionSession('started', 'FINISH')).toEqual({ ok: true, status: 'finished' });
    expect(transitionSession('inProgress', 'FINISH')).toEqual({ ok: true, status: 'finished' });
  });

  it('times out live sessions', () => {
    expect(transitionSession('inProgress', 'TIME_EXPIRED')).toEqual({ ok: true, status: 'timeout' });
  });

  it('rejects every event on terminal sessions', () => {
    for (const status of ['finished', 'timeout'] as const) {
      for (const event of ['ANSWER', 'FINISH', 'TIME_EXPIRED'] as const) {
        expect(transitionSession(status, event)).toEqual({ ok: false, from: status, event });
      }
    }
  });
});

describe('liveness', () => {
  it('treats started and inProgress as live', () => {
    expect(isLive('started')).toBe(true);
    expect(isLive('inProgress')).toBe(true);
    expect(isTerminal('finished')).toBe(true);
    expect(isTerminal('timeout')).toBe(true);
  });

  it('lists the statuses an event is legal from', () => {
    expect(statusesAccepting('TIME_EXPIRED')).toEqual(['started', 'inProgress']);
    expect(statusesAccepting('ANSWER')).toEqual(['started', 'inProgress']);
  });
});
