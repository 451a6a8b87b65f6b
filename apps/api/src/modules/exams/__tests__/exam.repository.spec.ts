import { afterAll, beforeAll, beforeEach, describe, expect, it } from 'vitest';
import { createTestDatabase, TestDatabase } from '../../../test/pgliteDatabase';
import { AnswerKeyEntry, Exam } from '../exam.model';
import { createExamsRepository, ExamsRepository } from '../exam.repository';

const CREATED_AT = new Date('2026-03-01T08:00:00.000Z');
const ACTIVATED_AT = new Date('2026-03-01T09:00:00.000Z');

function exam(id: string, totalQuestions: number): Exam {
  return {
    id,
    title: 'Chemistry midterm',
    subject: 'chemistry',
    durationMinutes: 45,
    totalQuestions,
    status: 'created',
    createdAt: CREATED_AT,
    updatedAt: CREATED_AT,
  };
}

let database: TestDatabase;
let repo: ExamsRepository;

beforeAll(async () => {
  database = await createTestDatabase();
  repo = createExamsRepository(database.db);
}, 30_000);

beforeEach(async () => {
  await database.reset();
});

afterAll(async () => {
  await database.close();
});

describe('createExam', () => {
  it('stores the exam with its answer key in question order', async () => {
    const answerKey: AnswerKeyEntry[] = [
      { questionId: 'q2', position: 2, correctChoice: 'C' },
      { questionId: 'q1', position: 1, correctChoice: 'A' },
    ];

    expect(await repo.createExam({ exam: exam('e1', 2), answerKey })).toEqual({
      ...exam('e1', 2),
      startTime: undefined,
      endTime: undefined,
    });
    expect(await repo.getExamById('e1')).toMatchObject({ id: 'e1', status: 'created', totalQuestions: 2 });
    expect(await repo.getAnswerKey('e1')).toEqual([
      { questionId: 'q1', position: 1, correctChoice: 'A' },
      { questionId: 'q2', position: 2, correctChoice: 'C' },
    ]);
  });

  it('distinguishes an exam without questions from a missing exam', async () => {
    await repo.createExam({ exam: exam('empty', 0), answerKey: [] });

    expect(await repo.getAnswerKey('empty')).toEqual([]);
    expect(await repo.getAnswerKey('missing')).toBeNull();
    expect(await repo.getExamById('missing')).toBeNull();
  });

  it('writes nothing when a question cannot be stored', async () => {
    const answerKey: AnswerKeyEntry[] = [
      { questionId: 'q1', position: 1, correctChoice: 'A' },
      { questionId: 'q2', position: 1, correctChoice: 'B' },
    ];

    await expect(repo.createExam({ exam: exam('e1', 2), answerKey })).rejects.toMatchObject({
      code: '23505',
    });
    expect(await repo.getExamById('e1')).toBeNull();
  });
});

describe('transitionExamStatus', () => {
  it('moves the exam only from the expected status', async () => {
    await repo.createExam({ exam: exam('e1', 0), answerKey: [] });

    expect(await repo.transitionExamStatus('e1', 'created', 'active', ACTIVATED_AT)).toMatchObject({
      status: 'active',
      startTime: ACTIVATED_AT,
      updatedAt: ACTIVATED_AT,
    });
    expect(await repo.transitionExamStatus('e1', 'created', 'active', ACTIVATED_AT)).toBeNull();

    const finishedAt = new Date('2026-03-01T10:00:00.000Z');
    expect(await repo.transitionExamStatus('e1', 'active', 'finished', finishedAt)).toMatchObject({
      status: 'finished',
      startTime: ACTIVATED_AT,
      endTime: finishedAt,
    });
    expect(await repo.transitionExamStatus('missing', 'created', 'active', ACTIVATED_AT)).toBeNull();
  });
});
