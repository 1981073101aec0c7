// Utilities: Custom error types

import type { RejectionReason } from '@/domain/scoring/types.js';

export class InvalidRollError extends Error {
  statusCode = 400;
  code = 'INVALID_ROLL';
  details?: Record<string, unknown>;

  constructor(message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'InvalidRollError';
    this.details = details;
  }
}

export class UnknownCategoryError extends Error {
  statusCode = 404;
  code = 'UNKNOWN_CATEGORY';
  details?: Record<string, unknown>;

  constructor(categoryId: string) {
    super(`Unknown category: ${categoryId}`);
    this.name = 'UnknownCategoryError';
    this.details = { categoryId };
  }
}

export class DuplicateCategoryError extends Error {
  statusCode = 500;
  code = 'DUPLICATE_CATEGORY';
  details?: Record<string, unknown>;

  constructor(duplicates: string[]) {
    super(`Categories cannot share ids. Duplicate ids are: ${duplicates.join(', ')}`);
    this.name = 'DuplicateCategoryError';
    this.details = { duplicates };
  }
}

export class InvalidRuleError extends Error {
  statusCode = 500;
  code = 'INVALID_RULE';
  details?: Record<string, unknown>;

  constructor(message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'InvalidRuleError';
    this.details = details;
  }
}

const REJECTION_STATUS: Record<RejectionReason, { statusCode: number; code: string }> = {
  RollInvalid: { statusCode: 400, code: 'INVALID_ROLL' },
  UnknownCategory: { statusCode: 404, code: 'UNKNOWN_CATEGORY' },
  AlreadyFilled: { statusCode: 409, code: 'ALREADY_FILLED' },
  JokerRestricted: { statusCode: 409, code: 'JOKER_RESTRICTED' },
};

/**
 * A rejected selection raised as an error, for callers that treat
 * rejection as failure (the HTTP layer).
 */
export class ScoreRejectedError extends Error {
  statusCode: number;
  code: string;
  reason: RejectionReason;
  details?: Record<string, unknown>;

  constructor(reason: RejectionReason, message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'ScoreRejectedError';
    this.reason = reason;
    this.statusCode = REJECTION_STATUS[reason].statusCode;
    this.code = REJECTION_STATUS[reason].code;
    this.details = details;
  }
}
