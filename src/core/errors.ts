// src/core/errors.ts
import type { BatchResult } from './types/index.js';

export enum ErrorCode {
  // validation: fatal, reported before any work starts
  UNKNOWN_ACTION = 'unknown_action',
  MISSING_INPUT = 'missing_input',
  PLATFORM_UNSUPPORTED = 'platform_unsupported',
  INVALID_INPUT_TYPE = 'invalid_input_type',
  EMPTY_INPUT = 'empty_input',
  EMPTY_KEYWORD = 'empty_keyword',
  INVALID_OPTION = 'invalid_option',
  MALFORMED_CREDENTIAL = 'malformed_credential',
  // per item: always isolated
  EXTRACT_FAILED = 'extract_failed',
  FETCH_FAILED = 'fetch_failed',
  // fatal
  RESOURCE_UNAVAILABLE = 'resource_unavailable',
  BACKEND_UNAVAILABLE = 'backend_unavailable',
  UNHANDLED = 'unhandled',
}

export class DispatchError extends Error {
  code: ErrorCode;
  retryable: boolean;
  suggestion?: string;
  context?: Record<string, unknown>;

  constructor(
    code: ErrorCode,
    message: string,
    retryable: boolean = false,
    suggestion?: string,
    context?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'DispatchError';
    this.code = code;
    this.retryable = retryable;
    this.suggestion = suggestion;
    this.context = context;
  }
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

/**
 * Result for a call that never reached batch execution.
 */
export function createFailedResult(error: unknown): BatchResult {
  return {
    success: false,
    message: errorMessage(error),
    downloadedCount: 0,
    failedCount: 0,
    details: [],
  };
}
