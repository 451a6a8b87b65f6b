import { ExamAuthority } from '../exams/examAuthority.client';

const DURATION_KEY_PREFIX = 'exam:duration:';

/** Exam duration lookups for remaining-time and timeout checks. */
export interface ExamDurationReader {
  /** null when the exam does not exist; throws when the authority cannot answer. */
  getDurationMinutes(examId: string): Promise<number | null>;
}

export interface DurationCache {
  get(examId: string): Promise<number | null>;
  set(examId: string, minutes: number): Promise<void>;
}

// ─── Redis cache ─────────────────────────────────────────────────────────────

/** The slice of an ioredis client the cache uses. */
export interface RedisKeyValue {
  get(key: string): Promise<string | null>;
  set(key: string, value: string, mode: 'EX', seconds: number): Promise<unknown>;
}

async function safeRedis<T>(
  action: string,
  fn: () => Promise<T>,
  fallback: T
): Promise<T> {
  try {
    return await fn();
  } catch (err) {
    console.warn(`[redis] ${action} failed, using live lookup:`, err instanceof Error ? err.message : err);
    return fallback;
  }
}

export function createRedisDurationCache(redis: RedisKeyValue, ttlSeconds: number): DurationCache {
  return {
    async get(examId) {
      const raw = await safeRedis('get duration', () => redis.get(`${DURATION_KEY_PREFIX}${examId}`), null);
      if (raw === null) return null;
      const minutes = Number(raw);
      return Number.isFinite(minutes) && minutes > 0 ? minutes : null;
    },

    async set(examId, minutes) {
      await safeRedis(
        'set duration',
        () => redis.set(`${DURATION_KEY_PREFIX}${examId}`, String(minutes), 'EX', ttlSeconds),
        null
      );
    },
  };
}

// ─── Reader ──────────────────────────────────────────────────────────────────

/**
 * Reads the duration from the exam authority on every call, or through
 * `cache` when one is given. Activation state is never read from here.
 */
export function createExamDurationReader(
  authority: ExamAuthority,
  cache?: DurationCache
): ExamDurationReader {
  return {
    async getDurationMinutes(examId) {
      const cached = cache ? await cache.get(examId) : null;
      if (cached !== null) return cached;

      const exam = await authority.getExamState(examId);
      if (!exam) return null;

      if (cache) await cache.set(examId, exam.durationMinutes);
      return exam.durationMinutes;
    },
  };
}
