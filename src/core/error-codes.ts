import { z } from 'zod';

import type { CliErrorCode, CliErrorPayload } from '../types/cli-error.js';
import { maskSecrets } from './secrets.js';

export type ErrorCode = CliErrorCode;

export const exitCodeByError: Record<ErrorCode, number> = {
  E_USAGE: 2,
  E_CONTRACT_VALIDATION: 3,
  E_INVALID_TRANSITION: 4,
  E_CHECKOUT_FAILED: 5,
  E_TOOLCHAIN_INSTALL_FAILED: 6,
  E_BUILD_SCRIPT_FAILED: 7,
  E_PUBLISH_FAILED: 8,
  E_JOB_NOT_FOUND: 9,
  E_STORAGE_IO: 10,
  E_INTERNAL: 11
};

export class DocPublishError extends Error {
  readonly code: ErrorCode;
  readonly details?: Record<string, unknown>;

  constructor(code: ErrorCode, message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'DocPublishError';
    this.code = code;
    this.details = details;
  }
}

const INTERNAL_ERROR_MESSAGE = 'Internal error';
const STORAGE_IO_MESSAGE = 'Storage I/O error';

function isErrnoException(value: unknown): value is NodeJS.ErrnoException {
  return value instanceof Error && 'code' in value && typeof value.code === 'string';
}

function maskValue(value: unknown): unknown {
  if (typeof value === 'string') {
    return maskSecrets(value);
  }
  if (Array.isArray(value)) {
    return value.map(maskValue);
  }
  if (value !== null && typeof value === 'object') {
    return maskDetails(Object.fromEntries(Object.entries(value)));
  }
  return value;
}

function maskDetails(details: Record<string, unknown>): Record<string, unknown> {
  return Object.fromEntries(Object.entries(details).map(([key, value]) => [key, maskValue(value)]));
}

export function toErrorPayload(error: DocPublishError): CliErrorPayload {
  const isInternal = error.code === 'E_INTERNAL';
  const message = isInternal ? INTERNAL_ERROR_MESSAGE : maskSecrets(error.message);
  return {
    ok: false,
    error: {
      code: error.code,
      message,
      ...(!isInternal && error.details ? { details: maskDetails(error.details) } : {})
    }
  };
}

export function validationError(prefix: string, error: z.ZodError): DocPublishError {
  return new DocPublishError(
    'E_CONTRACT_VALIDATION',
    `${prefix}: ${error.issues.map((issue) => issue.message).join('; ')}`
  );
}

export function normalizeError(error: unknown): DocPublishError {
  if (error instanceof DocPublishError) {
    if (error.code === 'E_INTERNAL') {
      return new DocPublishError('E_INTERNAL', INTERNAL_ERROR_MESSAGE);
    }
    return error;
  }
  if (error instanceof z.ZodError) {
    return validationError('Contract validation failed', error);
  }
  if (isErrnoException(error)) {
    return new DocPublishError('E_STORAGE_IO', STORAGE_IO_MESSAGE, {
      reason: error.code
    });
  }
  if (error instanceof Error && error.message.startsWith('Invalid job transition')) {
    return new DocPublishError('E_INVALID_TRANSITION', error.message);
  }
  return new DocPublishError('E_INTERNAL', INTERNAL_ERROR_MESSAGE);
}
