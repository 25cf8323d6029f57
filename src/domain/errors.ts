import type { PipelineStage } from './types.js';

export const ErrorCode = {
  // Input
  INPUT_MISSING: 'INPUT_MISSING',
  INPUT_INVALID: 'INPUT_INVALID',

  // Image fetch
  IMAGE_FETCH_FAILED: 'IMAGE_FETCH_FAILED',
  IMAGE_UNSUPPORTED_TYPE: 'IMAGE_UNSUPPORTED_TYPE',

  // Object Storage
  STORAGE_UPLOAD_FAILED: 'STORAGE_UPLOAD_FAILED',
  ACCESS_LINK_FAILED: 'ACCESS_LINK_FAILED',

  // Document generation
  REPORT_GENERATION_FAILED: 'REPORT_GENERATION_FAILED',
} as const;

export type ErrorCode = (typeof ErrorCode)[keyof typeof ErrorCode];

export interface AppError {
  code: ErrorCode;
  message: string;
  stage: PipelineStage;
  details?: string;
}

export function createAppError(
  code: ErrorCode,
  message: string,
  stage: PipelineStage,
  details?: string,
): AppError {
  return { code, message, stage, details };
}

/** Reads the HTTP status an SDK error carries, if any. */
export function extractStatus(cause: unknown): number | undefined {
  if (cause === null || typeof cause !== 'object') return undefined;
  if ('statusCode' in cause && typeof cause.statusCode === 'number') return cause.statusCode;
  if ('status' in cause && typeof cause.status === 'number') return cause.status;
  return undefined;
}
