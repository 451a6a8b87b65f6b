// apps/api/src/lib/http.ts

import { Request, Response } from 'express';
import { isRecord } from './serviceClient';
import { fail, httpStatusFor, ServiceFailure } from './status';

export function paramOf(req: Request, name: string): string {
  const value: unknown = req.params[name];
  if (Array.isArray(value)) return String(value[0] ?? '');
  return typeof value === 'string' ? value : '';
}

export function bodyOf(req: Request): Record<string, unknown> {
  const body: unknown = req.body;
  return isRecord(body) ? body : {};
}

export function trimmedString(value: unknown): string {
  return typeof value === 'string' ? value.trim() : '';
}

export function sendFailure(res: Response, failure: ServiceFailure): void {
  res.status(httpStatusFor(failure.code)).json(failure);
}

export function sendInvalidInput(res: Response, message: string): void {
  sendFailure(res, fail('INVALID_ARGUMENT', 'INVALID_INPUT', message));
}
