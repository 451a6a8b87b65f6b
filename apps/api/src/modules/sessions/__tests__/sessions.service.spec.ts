import { describe, expect, it, vi } from 'vitest';
import {
  InMemoryExamsRepository,
  InMemorySessionsRepository,
  TestClock,
} from '../../../test/inMemoryStores';
import { createLocalExamAuthority } from '../../exams/examAuthority.client';
import { createExamsService } from '../../exams/exams.service';
import { ScoreTrigger } from '../../scoring/scoring.client';
import { createExamDurationReader } from '../examDuration.reader';
import { createSessionsService } from '../sessions.service';

function setup(options: { scoreTrigger?: ScoreTrigger } = {}) {
  const clock = new TestClock(new Date('2026-03-01T09:00:00.000Z'));
  const examsRepo = new InMemoryExamsRepository();
  const exams = createExamsService({ exams: examsRepo, now: clock.now });
  const examAuthority = createLocalExamAuthority(exams);
  const sessionsRepo = new InMemorySessionsRepository();
  const sessions = createSessionsService({
    sessions: sessionsRepo,
    examAuthority,
    durations: createExamDurationReader(examAuthority),
    scoreTrigger: options.scoreTrigger,
    now: clock.now,
  });

  async function createExam(durationMinutes = 30, activate = true) {
    const created = await exams.createExam({
      title: 'Physics quiz',
      subject: 'physics',
      durationMinutes,
      correctChoices: ['A', 'B', 'C'],
    });
    if (!created.success) throw new Error(created.message);
    if (activate) await exams.activateExam(created.exam.id);
    return created.exam.id;
  }

  async function startSession(examId: string, studentId = 'student-1') {
    const started = await sessions.startSession(examId, studentId);
    if (!started.success) throw new Error(started.message);
    return started.session;
  }

  return { clock, exams, sessionsRepo, sessions, createExam, startSession };
}

describe('startSession', () => {
  it('admits a student to an active exam', async () => {
    const { sessions, createExam, clock } = setup();
    const examId = await createExam();

    const result = await sessions.startSession(examId, 'student-1');
    expect(result).toMatchObject({
      success: true,
      session: { examId, studentId: 'student-1', status: 'started', answers: [] },
    });
    if (result.success) {
      expect(result.session.startTime).toEqual(clock.now());
    }
  });

  it('refuses exams that are not active and persists nothing', async () => {
    const { sessions, sessionsRepo, createExam } = setup();
    const examId = await createExam(30, false);

    expect(await sessions.startSession(examId, 'student-1')).toEqual({
      success: false,
      code: 'FAILED_PRECONDITION',
      reasonCode: 'EXAM_NOT_ACTIVE',
      message: 'exam is not active',
    });
    expect(sessionsRepo.sessions.size).toBe(0);
  });

  it('refuses exams that were deactivated', async () => {
    const { sessions, exams, createExam } = setup();
    const examId = await createExam();
    await exams.deactivateExam(examId);

    expect(await sessions.startSession(examId, 'student-1')).toMatchObject({
      code: 'FAILED_PRECONDITION',
      message: 'exam is not active',
    });
  });

  it('reports unknown exams as not found', async () => {
    const { sessions } = setup();
    expect(await sessions.startSession('missing', 'student-1')).toMatchObject({
      code: 'NOT_FOUND',
      message: 'exam not found',
    });
  });

  it('refuses a second live session, even for another exam', async () => {
    const { sessions, sessionsRepo, createExam, startSession } = setup();
    const first = await createExam();
    const second = await createExam();
    await startSession(first);

    expect(await sessions.startSession(second, 'student-1')).toEqual({
      success: false,
      code: 'FAILED_PRECONDITION',
      reasonCode: 'SESSION_ALREADY_ACTIVE',
      message: 'student already has an active session',
    });
    expect(sessionsRepo.sessions.size).toBe(1);
  });

  it('admits the same student again once the live session is finished', async () => {
    const { sessions, createExam, startSession } = setup();
    const examId = await createExam();
    const first = await startSession(examId);
    await sessions.finishSession(first.id);

    const again = await sessions.startSession(examId, 'student-1');
    expect(again.success).toBe(true);
  });

  it('admits exactly one of many concurrent starts for one student', async () => {
    const { sessions, sessionsRepo, createExam } = setup();
    const examId = await createExam();

    const results = await Promise.all(
      Array.from({ length: 8 }, () => sessions.startSession(examId, 'student-1'))
    );

    expect(results.filter((result) => result.success)).toHaveLength(1);
    const failures = results.filter((result) => !result.success);
    expect(failures).toHaveLength(7);
    for (const failure of failures) {
      expect(failure).toMatchObject({ code: 'FAILED_PRECONDITION' });
    }
    expect(sessionsRepo.sessions.size).toBe(1);
  });

  it('returns an internal failure when the exam authority cannot answer', async () => {
    const { sessionsRepo } = setup();
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const sessions = createSessionsService({
      sessions: sessionsRepo,
      examAuthority: {
        getExamState: vi.fn().mockRejectedValue(new Error('timeout')),
        getAnswerKey: vi.fn(),
      },
      durations: { getDurationMinutes: vi.fn() },
    });

    expect(await sessions.startSession('exam-1', 'student-1')).toEqual({
      success: false,
      code: 'INTERNAL',
      reasonCode: 'INTERNAL_ERROR',
      message: 'failed to check exam status',
    });
    expect(sessionsRepo.sessions.size).toBe(0);
  });
});

describe('submitAnswer', () => {
  it('keeps the last answer per question and moves the session to inProgress', async () => {
    const { sessions, createExam, startSession } = setup();
    const session = await startSession(await createExam());

    expect(
      await sessions.submitAnswer({ sessionId: session.id, questionId: 'q1', selectedChoice: 'A' })
    ).toEqual({ success: true, message: 'Answer submitted successfully' });
    await sessions.submitAnswer({ sessionId: session.id, questionId: 'q1', selectedChoice: 'B' });

    const ledger = await sessions.getSessionLedger(session.id);
    expect(ledger.success).toBe(true);
    if (ledger.success) {
      expect(ledger.ledger.status).toBe('inProgress');
      expect(ledger.ledger.answers.map((a) => [a.questionId, a.selectedChoice])).toEqual([['q1', 'B']]);
    }
  });

  it('records a blank answer', async () => {
    const { sessions, createExam, startSession } = setup();
    const session = await startSession(await createExam());

    await sessions.submitAnswer({ sessionId: session.id, questionId: 'q2', selectedChoice: '' });

    const fetched = await sessions.getSession(session.id);
    expect(fetched).toMatchObject({
      success: true,
      session: { answers: [{ questionId: 'q2', selectedChoice: '' }] },
    });
  });

  it('rejects answers on a finished session and leaves the ledger unchanged', async () => {
    const { sessions, createExam, startSession } = setup();
    const session = await startSession(await createExam());
    await sessions.submitAnswer({ sessionId: session.id, questionId: 'q1', selectedChoice: 'A' });
    await sessions.finishSession(session.id);

    expect(
      await sessions.submitAnswer({ sessionId: session.id, questionId: 'q1', selectedChoice: 'C' })
    ).toEqual({
      success: false,
      code: 'FAILED_PRECONDITION',
      reasonCode: 'SESSION_NOT_ANSWERABLE',
      message: 'session is not in valid state for answering',
    });

    const ledger = await sessions.getSessionLedger(session.id);
    expect(ledger).toMatchObject({
      success: true,
      ledger: { status: 'finished', answers: [{ questionId: 'q1', selectedChoice: 'A' }] },
    });
  });

  it('reports unknown sessions as not found', async () => {
    const { sessions } = setup();
    expect(
      await sessions.submitAnswer({ sessionId: 'missing', questionId: 'q1', selectedChoice: 'A' })
    ).toMatchObject({ code: 'NOT_FOUND', message: 'session not found' });
  });
});

describe('finishSession', () => {
  it('finishes a live session and stamps the end time', async () => {
    const { sessions, clock, createExam, startSession } = setup();
    const session = await startSession(await createExam());
    clock.advance(5 * 60_000);

    const result = await sessions.finishSession(session.id);
    expect(result).toMatchObject({ success: true, session: { status: 'finished' } });
    if (result.success) {
      expect(result.session.endTime?.toISOString()).toBe('2026-03-01T09:05:00.000Z');
    }
  });

  it('refuses to finish twice', async () => {
    const { sessions, createExam, startSession } = setup();
    const session = await startSession(await createExam());
    await sessions.finishSession(session.id);

    expect(await sessions.finishSession(session.id)).toEqual({
      success: false,
      code: 'FAILED_PRECONDITION',
      reasonCode: 'SESSION_ALREADY_FINISHED',
      message: 'session is already finished',
    });
  });

  it('refuses to finish a timed-out session', async () => {
    const { sessions, sessionsRepo, createExam, startSession, clock } = setup();
    const session = await startSession(await createExam());
    await sessionsRepo.markTimedOut(session.id, clock.now());

    expect(await sessions.finishSession(session.id)).toMatchObject({
      code: 'FAILED_PRECONDITION',
      reasonCode: 'SESSION_TIMED_OUT',
      message: 'session has timed out',
    });
  });

  it('finishes a session whose exam was deactivated meanwhile', async () => {
    const { sessions, exams, createExam, startSession } = setup();
    const examId = await createExam();
    const session = await startSession(examId);
    await exams.deactivateExam(examId);

    expect(await sessions.finishSession(session.id)).toMatchObject({
      success: true,
      session: { status: 'finished' },
    });
  });

  it('requests scoring after the finish', async () => {
    const requestScore = vi.fn().mockResolvedValue(undefined);
    const { sessions, createExam, startSession } = setup({ scoreTrigger: { requestScore } });
    const session = await startSession(await createExam());

    await sessions.finishSession(session.id);
    expect(requestScore).toHaveBeenCalledWith(session.id);
  });

  it('still reports the finish when scoring fails', async () => {
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const requestScore = vi.fn().mockRejectedValue(new Error('scoring down'));
    const { sessions, createExam, startSession } = setup({ scoreTrigger: { requestScore } });
    const session = await startSession(await createExam());

    expect(await sessions.finishSession(session.id)).toMatchObject({
      success: true,
      session: { status: 'finished' },
    });
  });
});

describe('getRemainingTime', () => {
  it('counts down from the exam duration', async () => {
    const { sessions, clock, createExam, startSession } = setup();
    const session = await startSession(await createExam(30));
    clock.advance(12 * 60_000 + 30_000);

    expect(await sessions.getRemainingTime(session.id)).toEqual({
      success: true,
      remaining: { minutes: 17, seconds: 30 },
    });
  });

  it('is zero once the deadline has passed', async () => {
    const { sessions, clock, createExam, startSession } = setup();
    const session = await startSession(await createExam(30));
    clock.advance(31 * 60_000);

    expect(await sessions.getRemainingTime(session.id)).toEqual({
      success: true,
      remaining: { minutes: 0, seconds: 0 },
    });
  });

  it('is zero for finished sessions', async () => {
    const { sessions, createExam, startSession } = setup();
    const session = await startSession(await createExam(30));
    await sessions.finishSession(session.id);

    expect(await sessions.getRemainingTime(session.id)).toEqual({
      success: true,
      remaining: { minutes: 0, seconds: 0 },
    });
  });

  it('reports unknown sessions as not found', async () => {
    const { sessions } = setup();
    expect(await sessions.getRemainingTime('missing')).toMatchObject({ code: 'NOT_FOUND' });
  });
});
