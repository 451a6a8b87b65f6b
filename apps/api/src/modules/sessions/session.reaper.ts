// apps/api/src/modules/sessions/session.reaper.ts

import { isPastDeadline } from '../examSession/time.guard';
import { ScoreTrigger } from '../scoring/scoring.client';
import { ExamDurationReader } from './examDuration.reader';
import { SessionsRepository } from './sessions.repository';

export interface SweepDeps {
  sessions: SessionsRepository;
  durations: ExamDurationReader;
  scoreTrigger?: ScoreTrigger;
  now?: () => Date;
}

export interface SweepReport {
  checked: number;
  timedOut: string[];
  failed: number;
}

// Scoring failures are logged only; the timeout is already committed.
async function requestScore(trigger: ScoreTrigger | undefined, sessionId: string): Promise<void> {
  if (!trigger) return;
  try {
    await trigger.requestScore(sessionId);
  } catch (err) {
    console.error(`[reaper] score request for session ${sessionId} failed`, err);
  }
}

/**
 * Moves every live session past its exam deadline to timeout. Sessions
 * finished concurrently are left alone by the conditional update.
 */
export async function sweepTimedOutSessions(deps: SweepDeps): Promise<SweepReport> {
  const now = (deps.now ?? (() => new Date()))();
  const live = await deps.sessions.listLiveSessions();
  const durations = new Map<string, number | null>();
  const report: SweepReport = { checked: live.length, timedOut: [], failed: 0 };

  for (const session of live) {
    try {
      let duration = durations.get(session.examId);
      if (duration === undefined) {
        duration = await deps.durations.getDurationMinutes(session.examId);
        durations.set(session.examId, duration);
      }
      if (duration === null || !isPastDeadline(session, duration, now)) continue;

      const marked = await deps.sessions.markTimedOut(session.id, now);
      if (!marked) continue;
      report.timedOut.push(session.id);
    } catch (err) {
      report.failed += 1;
      console.error(`[reaper] failed to time out session ${session.id}`, err);
      continue;
    }

    await requestScore(deps.scoreTrigger, session.id);
  }

  if (report.timedOut.length > 0 || report.failed > 0) {
    console.log(
      `[reaper] checked=${report.checked} timedOut=${report.timedOut.length} failed=${report.failed}`
    );
  }
  return report;
}

/** Runs `sweep` every `intervalMs`; overlapping runs are skipped. Returns a stop function. */
export function startSessionReaper(
  intervalMs: number,
  sweep: () => Promise<SweepReport>
): () => void {
  let running = false;
  const timer = setInterval(() => {
    if (running) return;
    running = true;
    sweep()
      .catch((err: unknown) => {
        console.error('[reaper] sweep failed', err);
      })
      .finally(() => {
        running = false;
      });
  }, intervalMs);
  timer.unref();

  return () => clearInterval(timer);
}
