// modules/exams/exam.model.ts

export type ExamStatus = 'created' | 'active' | 'finished';

export interface Exam {
  id: string;
  title: string;
  subject: string;
  durationMinutes: number;
  totalQuestions: number;
  status: ExamStatus;
  startTime?: Date;
  endTime?: Date;
  createdAt: Date;
  updatedAt: Date;
}

export interface AnswerKeyEntry {
  questionId: string;
  position: number;
  correctChoice: string;
}

export interface NewExam {
  exam: Exam;
  answerKey: AnswerKeyEntry[];
}
