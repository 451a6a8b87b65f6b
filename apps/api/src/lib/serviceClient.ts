// apps/api/src/lib/serviceClient.ts

import { ServiceCallError } from './status';

export interface ServiceRequest {
  method?: 'GET' | 'POST';
  body?: unknown;
  timeoutMs: number;
}

export type ServiceResponse =
  | { found: true; status: number; body: Record<string, unknown> }
  | { found: false };

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * One JSON round trip to another service. A NOT_FOUND failure is reported as
 * `found: false`; anything else that is not a success throws ServiceCallError.
 * No retries.
 */
export async function callService(
  baseUrl: string,
  path: string,
  request: ServiceRequest
): Promise<ServiceResponse> {
  const controller = new AbortController();
  const timeout = setTimeout(() => controller.abort(), request.timeoutMs);
  const url = `${baseUrl}${path}`;
  try {
    const res = await fetch(url, {
      method: request.method ?? 'GET',
      signal: controller.signal,
      headers: { 'Content-Type': 'application/json', Accept: 'application/json' },
      body: request.body !== undefined ? JSON.stringify(request.body) : undefined,
    });

    const payload: unknown = await res.json().catch(() => null);

    // Only the remote service's own NOT_FOUND means the entity is absent. Any
    // other 404 (an unmounted router, a proxy) is a failed call.
    if (res.status === 404 && isRecord(payload) && payload.code === 'NOT_FOUND') {
      return { found: false };
    }
    if (!res.ok) {
      const message = isRecord(payload) && typeof payload.message === 'string'
        ? payload.message
        : res.statusText;
      throw new ServiceCallError(`${request.method ?? 'GET'} ${url} failed with ${res.status}: ${message}`, res.status);
    }
    if (!isRecord(payload)) {
      throw new ServiceCallError(`${request.method ?? 'GET'} ${url} returned a non-object body`, res.status);
    }
    return { found: true, status: res.status, body: payload };
  } catch (err) {
    if (err instanceof ServiceCallError) throw err;
    const reason = controller.signal.aborted
      ? `timed out after ${request.timeoutMs}ms`
      : err instanceof Error ? err.message : String(err);
    throw new ServiceCallError(`${request.method ?? 'GET'} ${url} failed: ${reason}`);
  } finally {
    clearTimeout(timeout);
  }
}

export function readString(record: Record<string, unknown>, key: string): string {
  const value = record[key];
  if (typeof value !== 'string') {
    throw new ServiceCallError(`malformed response: "${key}" is not a string`);
  }
  return value;
}

export function readNumber(record: Record<string, unknown>, key: string): number {
  const value = record[key];
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw new ServiceCallError(`malformed response: "${key}" is not a number`);
  }
  return value;
}

export function readDate(record: Record<string, unknown>, key: string): Date {
  const date = new Date(readString(record, key));
  if (Number.isNaN(date.getTime())) {
    throw new ServiceCallError(`malformed response: "${key}" is not a timestamp`);
  }
  return date;
}

export function readRecord(record: Record<string, unknown>, key: string): Record<string, unknown> {
  const value = record[key];
  if (!isRecord(value)) {
    throw new ServiceCallError(`malformed response: "${key}" is not an object`);
  }
  return value;
}

export function readArray(record: Record<string, unknown>, key: string): unknown[] {
  const value = record[key];
  if (!Array.isArray(value)) {
    throw new ServiceCallError(`malformed response: "${key}" is not an array`);
  }
  return value;
}
