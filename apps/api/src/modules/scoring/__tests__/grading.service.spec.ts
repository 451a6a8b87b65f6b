import { describe, expect, it } from 'vitest';
import { SessionAnswer } from '../../examSession/session.model';
import { AnswerKeyEntry } from '../../exams/exam.model';
import { tallyAnswers } from '../grading.service';

const answeredAt = new Date('2026-03-01T09:05:00.000Z');

function key(choices: string[]): AnswerKeyEntry[] {
  return choices.map((correctChoice, index) => ({
    questionId: `q${index + 1}`,
    position: index + 1,
    correctChoice,
  }));
}

function answer(questionId: string, selectedChoice: string): SessionAnswer {
  return { questionId, selectedChoice, answeredAt };
}

describe('tallyAnswers', () => {
  it('counts correct, wrong, blank and missing answers over the full key', () => {
    const tally = tallyAnswers(key(['A', 'B', 'C', 'D', 'A']), [
      answer('q1', 'A'),
      answer('q2', 'C'),
      answer('q3', ''),
      answer('q5', 'B'),
    ]);

    expect(tally).toEqual({
      totalQuestions: 5,
      correctAnswers: 1,
      wrongAnswers: 2,
      unanswered: 2,
      score: 20,
    });
  });

  it('ignores answers to questions outside the key', () => {
    const tally = tallyAnswers(key(['A', 'B']), [answer('q1', 'A'), answer('q9', 'A')]);
    expect(tally).toEqual({
      totalQuestions: 2,
      correctAnswers: 1,
      wrongAnswers: 0,
      unanswered: 1,
      score: 50,
    });
  });

  it('scores zero for an exam without questions', () => {
    expect(tallyAnswers([], [answer('q1', 'A')])).toEqual({
      totalQuestions: 0,
      correctAnswers: 0,
      wrongAnswers: 0,
      unanswered: 0,
      score: 0,
    });
  });

  it('keeps the counts summing to the total', () => {
    const tally = tallyAnswers(key(['A', 'B', 'C']), [answer('q2', 'B'), answer('q3', 'A')]);
    expect(tally.correctAnswers + tally.wrongAnswers + tally.unanswered).toBe(tally.totalQuestions);
    expect(tally.score).toBeCloseTo(100 / 3);
  });
});
