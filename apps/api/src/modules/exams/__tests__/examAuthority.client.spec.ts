import { afterEach, describe, expect, it, vi } from 'vitest';
import { InMemoryExamsRepository } from '../../../test/inMemoryStores';
import { createHttpExamAuthority, createLocalExamAuthority } from '../examAuthority.client';
import { createExamsService } from '../exams.service';

function jsonResponse(status: number, body: unknown): Response {
  return new Response(JSON.stringify(body), { status });
}

describe('createLocalExamAuthority', () => {
  it('exposes state and answer key, and null for unknown exams', async () => {
    const exams = createExamsService({ exams: new InMemoryExamsRepository() });
    const created = await exams.createExam({
      title: 'Biology',
      subject: 'biology',
      durationMinutes: 40,
      correctChoices: ['D'],
    });
    if (!created.success) throw new Error(created.message);
    const authority = createLocalExamAuthority(exams);

    expect(await authority.getExamState(created.exam.id)).toEqual({
      id: created.exam.id,
      status: 'created',
      durationMinutes: 40,
    });
    expect(await authority.getAnswerKey(created.exam.id)).toMatchObject([{ position: 1, correctChoice: 'D' }]);
    expect(await authority.getExamState('missing')).toBeNull();
    expect(await authority.getAnswerKey('missing')).toBeNull();
  });
});

describe('createHttpExamAuthority', () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('reads the exam state from the exams service', async () => {
    const fetchMock = vi.fn().mockResolvedValue(
      jsonResponse(200, {
        success: true,
        exam: { id: 'e1', title: 'Biology', status: 'active', durationMinutes: 40 },
      })
    );
    vi.stubGlobal('fetch', fetchMock);

    const authority = createHttpExamAuthority('http://exams:3001', 1000);
    expect(await authority.getExamState('e1')).toEqual({ id: 'e1', status: 'active', durationMinutes: 40 });
    expect(fetchMock.mock.calls[0][0]).toBe('http://exams:3001/exams/e1');
  });

  it('reads the answer key', async () => {
    vi.stubGlobal(
      'fetch',
      vi.fn().mockResolvedValue(
        jsonResponse(200, {
          success: true,
          answerKey: [{ questionId: 'q1', position: 1, correctChoice: 'B' }],
        })
      )
    );

    const authority = createHttpExamAuthority('http://exams:3001', 1000);
    expect(await authority.getAnswerKey('e1')).toEqual([{ questionId: 'q1', position: 1, correctChoice: 'B' }]);
  });

  it('maps NOT_FOUND to null', async () => {
    vi.stubGlobal(
      'fetch',
      vi.fn().mockResolvedValue(
        jsonResponse(404, {
          success: false,
          code: 'NOT_FOUND',
          reasonCode: 'EXAM_NOT_FOUND',
          message: 'exam not found',
        })
      )
    );
    expect(await createHttpExamAuthority('http://exams:3001', 1000).getExamState('e1')).toBeNull();
  });

  it('fails when the exams route is not mounted', async () => {
    vi.stubGlobal(
      'fetch',
      vi.fn().mockResolvedValue(jsonResponse(404, { success: false, message: 'Route not found' }))
    );
    await expect(createHttpExamAuthority('http://exams:3001', 1000).getExamState('e1')).rejects.toThrow(
      'GET http://exams:3001/exams/e1 failed with 404: Route not found'
    );
  });

  it('rejects malformed payloads', async () => {
    vi.stubGlobal(
      'fetch',
      vi.fn().mockResolvedValue(
        jsonResponse(200, { success: true, exam: { id: 'e1', status: 'paused', durationMinutes: 40 } })
      )
    );
    await expect(createHttpExamAuthority('http://exams:3001', 1000).getExamState('e1')).rejects.toThrow(
      'malformed response: unknown exam status "paused"'
    );
  });
});
