// apps/api/src/lib/config.ts

import * as fs from 'fs';
import * as path from 'path';

export type ServiceName = 'exams' | 'sessions' | 'scoring';

const SERVICE_NAMES: readonly ServiceName[] = ['exams', 'sessions', 'scoring'];

export interface AppConfig {
  port: number;
  databaseUrl: string;
  services: ServiceName[];
  examServiceUrl?: string;
  sessionServiceUrl?: string;
  scoringServiceUrl?: string;
  serviceTimeoutMs: number;
  redisUrl?: string;
  examDurationCacheTtlSeconds: number;
  sessionSweepIntervalMs: number;
  scoreOnFinish: boolean;
}

type Env = Record<string, string | undefined>;

/**
 * Loads KEY=value pairs from the first .env found into process.env.
 * Variables already set in the environment win.
 */
export function loadEnvFile(candidates?: string[]): string | null {
  const paths = candidates ?? [
    path.join(process.cwd(), '.env'),
    path.join(__dirname, '..', '..', '.env'),
  ];
  for (const envPath of paths) {
    if (!fs.existsSync(envPath)) continue;
    const content = fs.readFileSync(envPath, 'utf8');
    for (const line of content.split('\n')) {
      const match = line.match(/^([^#=]+)=(.*)$/);
      if (!match) continue;
      const key = match[1].trim();
      let val = match[2].trim();
      if ((val.startsWith('"') && val.endsWith('"')) || (val.startsWith("'") && val.endsWith("'"))) {
        val = val.slice(1, -1);
      }
      if (process.env[key] === undefined) {
        process.env[key] = val;
      }
    }
    return envPath;
  }
  return null;
}

function readString(env: Env, key: string): string | undefined {
  const value = env[key]?.trim();
  return value ? value : undefined;
}

function readInt(env: Env, key: string, fallback: number): number {
  const raw = readString(env, key);
  if (raw === undefined) return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value)) {
    throw new Error(`invalid ${key}: expected an integer, got "${raw}"`);
  }
  return value;
}

function readBool(env: Env, key: string, fallback: boolean): boolean {
  const raw = readString(env, key);
  if (raw === undefined) return fallback;
  if (['1', 'true', 'yes', 'on'].includes(raw.toLowerCase())) return true;
  if (['0', 'false', 'no', 'off'].includes(raw.toLowerCase())) return false;
  throw new Error(`invalid ${key}: expected a boolean, got "${raw}"`);
}

function readUrl(env: Env, key: string): string | undefined {
  const raw = readString(env, key);
  if (raw === undefined) return undefined;
  try {
    new URL(raw);
  } catch {
    throw new Error(`invalid ${key}: "${raw}" is not a URL`);
  }
  return raw.replace(/\/+$/, '');
}

function buildDatabaseUrl(env: Env): string {
  const host = readString(env, 'DB_HOST') ?? 'localhost';
  const port = readInt(env, 'DB_PORT', 5432);
  const name = readString(env, 'DB_NAME') ?? 'cbt_exam';
  const user = encodeURIComponent(readString(env, 'DB_USER') ?? 'postgres');
  const pass = encodeURIComponent(readString(env, 'DB_PASS') ?? '');
  const ssl = readString(env, 'DB_SSL') ?? 'disable';
  const auth = pass ? `${user}:${pass}` : user;
  return `postgres://${auth}@${host}:${port}/${name}?sslmode=${ssl}`;
}

function parseServices(raw: string | undefined): ServiceName[] {
  if (raw === undefined) return [...SERVICE_NAMES];
  const names = raw
    .split(',')
    .map((name) => name.trim())
    .filter(Boolean);
  const services: ServiceName[] = [];
  for (const name of names) {
    const known = SERVICE_NAMES.find((service) => service === name);
    if (!known) {
      throw new Error(`unknown service "${name}" in SERVICES (expected ${SERVICE_NAMES.join(', ')})`);
    }
    if (!services.includes(known)) services.push(known);
  }
  if (services.length === 0) {
    throw new Error('SERVICES must name at least one service');
  }
  return services;
}

export function loadConfig(env: Env = process.env): AppConfig {
  const config: AppConfig = {
    port: readInt(env, 'PORT', 3001),
    databaseUrl: readString(env, 'DATABASE_URL') ?? buildDatabaseUrl(env),
    services: parseServices(readString(env, 'SERVICES')),
    examServiceUrl: readUrl(env, 'EXAM_SERVICE_URL'),
    sessionServiceUrl: readUrl(env, 'SESSION_SERVICE_URL'),
    scoringServiceUrl: readUrl(env, 'SCORING_SERVICE_URL'),
    serviceTimeoutMs: readInt(env, 'SERVICE_TIMEOUT_MS', 5000),
    redisUrl: readString(env, 'REDIS_URL'),
    examDurationCacheTtlSeconds: readInt(env, 'EXAM_DURATION_CACHE_TTL_S', 60),
    sessionSweepIntervalMs: readInt(env, 'SESSION_SWEEP_INTERVAL_MS', 0),
    scoreOnFinish: readBool(env, 'SCORE_ON_FINISH', true),
  };
  validateConfig(config);
  return config;
}

function validateConfig(config: AppConfig): void {
  if (config.port <= 0 || config.port > 65535) {
    throw new Error(`invalid port number: ${config.port}`);
  }
  if (config.serviceTimeoutMs <= 0) {
    throw new Error(`invalid SERVICE_TIMEOUT_MS: ${config.serviceTimeoutMs}`);
  }
  if (config.examDurationCacheTtlSeconds < 0) {
    throw new Error(`invalid EXAM_DURATION_CACHE_TTL_S: ${config.examDurationCacheTtlSeconds}`);
  }
  if (config.sessionSweepIntervalMs < 0) {
    throw new Error(`invalid SESSION_SWEEP_INTERVAL_MS: ${config.sessionSweepIntervalMs}`);
  }

  const has = (name: ServiceName) => config.services.includes(name);
  // Each mounted service needs its collaborators either in-process or remote.
  if (has('sessions') && !has('exams') && !config.examServiceUrl) {
    throw new Error('sessions service needs the exams service: mount it or set EXAM_SERVICE_URL');
  }
  if (has('scoring') && !has('exams') && !config.examServiceUrl) {
    throw new Error('scoring service needs the exams service: mount it or set EXAM_SERVICE_URL');
  }
  if (has('scoring') && !has('sessions') && !config.sessionServiceUrl) {
    throw new Error('scoring service needs the sessions service: mount it or set SESSION_SERVICE_URL');
  }
}
