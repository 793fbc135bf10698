// ═══════════════════════════════════════════════════════════════════════════════
// LOOKUP ERRORS — Recoverable Failures Between a Match and an Answer
// ═══════════════════════════════════════════════════════════════════════════════

import { appError, type AppError } from '../../types/result.js';

export const LookupErrorCode = {
  /** The extraction regex found nothing in the fact block */
  FIELD_NOT_FOUND: 'FIELD_NOT_FOUND',
  /** No reference document exists for the subject */
  SUBJECT_NOT_FOUND: 'SUBJECT_NOT_FOUND',
  /** A document exists but has no summary block */
  NO_FACT_BLOCK: 'NO_FACT_BLOCK',
  /** Transport or payload failure while retrieving the document */
  FETCH_FAILED: 'FETCH_FAILED',
} as const;

export type LookupErrorCode = typeof LookupErrorCode[keyof typeof LookupErrorCode];

export type LookupError = AppError<LookupErrorCode>;

export function fieldNotFound(label: string, field: string): LookupError {
  return appError(LookupErrorCode.FIELD_NOT_FOUND, label, { context: { field } });
}

export function subjectNotFound(subject: string): LookupError {
  return appError(
    LookupErrorCode.SUBJECT_NOT_FOUND,
    `No reference page found for "${subject}"`,
    { context: { subject } }
  );
}

export function noFactBlock(subject: string, page?: string): LookupError {
  return appError(
    LookupErrorCode.NO_FACT_BLOCK,
    `Page has no summary box for "${subject}"`,
    { context: { subject, page } }
  );
}

export function fetchFailed(subject: string, reason: string, cause?: Error): LookupError {
  return appError(
    LookupErrorCode.FETCH_FAILED,
    `Could not retrieve a page for "${subject}": ${reason}`,
    { cause, context: { subject } }
  );
}
