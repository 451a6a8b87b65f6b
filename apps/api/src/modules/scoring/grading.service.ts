// modules/scoring/grading.service.ts

import { SessionAnswer } from '../examSession/session.model';
import { AnswerKeyEntry } from '../exams/exam.model';

export interface Tally {
  totalQuestions: number;
  correctAnswers: number;
  wrongAnswers: number;
  unanswered: number;
  score: number;
}

/**
 * Grades the ledger against the exam's full question list. Questions with no
 * answer or a blank one count as unanswered; answers to questions outside the
 * key are ignored.
 */
export function tallyAnswers(
  answerKey: AnswerKeyEntry[],
  answers: SessionAnswer[]
): Tally {
  const selected = new Map<string, string>();
  for (const answer of answers) {
    selected.set(answer.questionId, answer.selectedChoice);
  }

  let correctAnswers = 0;
  let wrongAnswers = 0;
  let unanswered = 0;

  for (const q of answerKey) {
    const choice = selected.get(q.questionId);
    if (!choice) {
      unanswered += 1;
    } else if (choice === q.correctChoice) {
      correctAnswers += 1;
    } else {
      wrongAnswers += 1;
    }
  }

  const totalQuestions = answerKey.length;
  return {
    totalQuestions,
    correctAnswers,
    wrongAnswers,
    unanswered,
    score: totalQuestions > 0 ? (correctAnswers / totalQuestions) * 100 : 0,
  };
}
