import { isAxiosError, isCancel } from 'axios';

import type { TransportFailure } from '../../config/types.js';

import { getErrorMessage, isSystemError } from '../../utils/error-utils.js';

const TIMEOUT_CODES = new Set(['ECONNABORTED', 'ETIMEDOUT', 'ESOCKETTIMEDOUT']);

function isAbortError(error: unknown): boolean {
  return (
    isCancel(error) ||
    (error instanceof Error &&
      (error.name === 'AbortError' || error.name === 'CanceledError'))
  );
}

function resolveCode(error: unknown): string | undefined {
  if (isAxiosError(error)) return error.code;
  return isSystemError(error) ? error.code : undefined;
}

/**
 * Describes why no HTTP response was obtained. Callers see this alongside a
 * status of 0 instead of an exception.
 */
export function describeTransportFailure(error: unknown): TransportFailure {
  const code = resolveCode(error);
  const message = getErrorMessage(error);

  if (isAbortError(error)) {
    return { kind: 'aborted', code, message };
  }
  if (
    (code !== undefined && TIMEOUT_CODES.has(code)) ||
    (error instanceof Error && error.name === 'TimeoutError')
  ) {
    return { kind: 'timeout', code, message };
  }
  if (error instanceof Error) {
    return { kind: 'network', code, message };
  }
  return { kind: 'unknown', message };
}
