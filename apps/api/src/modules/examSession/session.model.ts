export type SessionStatus = 'started' | 'inProgress' | 'finished' | 'timeout';

export interface SessionAnswer {
  questionId: string;
  selectedChoice: string; // '' = explicitly left blank
  answeredAt: Date;
}

export interface ExamSession {
  id: string;
  examId: string;
  studentId: string;
  status: SessionStatus;
  startTime: Date;
  endTime?: Date;
  answers: SessionAnswer[];
}

/** The finalized input to scoring, as exposed to the scoring aggregator. */
export interface SessionLedger {
  sessionId: string;
  examId: string;
  studentId: string;
  status: SessionStatus;
  answers: SessionAnswer[];
}

export interface RemainingTime {
  minutes: number;
  seconds: number;
}

export function toLedger(session: ExamSession): SessionLedger {
  return {
    sessionId: session.id,
    examId: session.examId,
    studentId: session.studentId,
    status: session.status,
    answers: session.answers,
  };
}
