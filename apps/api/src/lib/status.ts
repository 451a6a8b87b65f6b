// apps/api/src/lib/status.ts

export type StatusCode =
  | 'INVALID_ARGUMENT'
  | 'NOT_FOUND'
  | 'FAILED_PRECONDITION'
  | 'ALREADY_EXISTS'
  | 'INTERNAL';

export interface ServiceFailure {
  success: false;
  code: StatusCode;
  reasonCode: string;
  message: string;
}

export function fail(
  code: StatusCode,
  reasonCode: string,
  message: string
): ServiceFailure {
  return { success: false, code, reasonCode, message };
}

/**
 * Wraps an unexpected store or dependency error. The cause is logged, callers
 * only ever see the fixed message.
 */
export function internalFailure(
  scope: string,
  action: string,
  err: unknown
): ServiceFailure {
  console.error(`[${scope}] failed to ${action}`, err);
  return fail('INTERNAL', 'INTERNAL_ERROR', `failed to ${action}`);
}

export function httpStatusFor(code: StatusCode): number {
  switch (code) {
    case 'INVALID_ARGUMENT':
      return 400;
    case 'NOT_FOUND':
      return 404;
    case 'FAILED_PRECONDITION':
      return 412;
    case 'ALREADY_EXISTS':
      return 409;
    case 'INTERNAL':
      return 500;
  }
}

/** Thrown by HTTP collaborator adapters when the remote call cannot be used. */
export class ServiceCallError extends Error {
  constructor(
    message: string,
    readonly status?: number
  ) {
    super(message);
    this.name = 'ServiceCallError';
  }
}
