export interface ExamScore {
  id: string;
  examId: string;
  sessionId: string;
  studentId: string;
  totalQuestions: number;
  correctAnswers: number;
  wrongAnswers: number;
  unanswered: number;
  /** Percentage of the exam's questions answered correctly, 0–100. */
  score: number;
  createdAt: Date;
}

export interface ScorePage {
  scores: ExamScore[];
  nextPageToken?: string;
}
