import { type InvalidPrincipalReason } from '@codeplan/shared/constants/coding.constants.js';

export class AppError extends Error {
  constructor(
    public statusCode: number,
    public code: string,
    message: string,
    public details?: unknown
  ) {
    super(message);
  }
}

export class ValidationError extends AppError {
  constructor(message: string, details?: unknown) {
    super(400, 'VALIDATION_ERROR', message, details);
  }
}

export class NotFoundError extends AppError {
  constructor(resource: string) {
    super(404, 'NOT_FOUND', `${resource} not found`);
  }
}

export class ForbiddenError extends AppError {
  constructor(message = 'Insufficient permissions') {
    super(403, 'FORBIDDEN', message);
  }
}

/**
 * A plan was requested for a code that cannot root one: absent from the
 * catalog, or retired.
 */
export class InvalidPrincipalError extends AppError {
  constructor(
    public principal: string,
    public reason: InvalidPrincipalReason,
  ) {
    super(
      422,
      'INVALID_PRINCIPAL',
      reason === 'RETIRED'
        ? `Code ${principal} is retired and cannot be used as a principal`
        : `Code ${principal} is not in the catalog`,
      { code: principal, reason },
    );
  }
}

/**
 * The caller pinned a data version, or catalog and graph disagree on one.
 * Retry against the current snapshot.
 */
export class DataVersionMismatchError extends AppError {
  constructor(expected: string, actual: string) {
    super(
      409,
      'DATA_VERSION_MISMATCH',
      `Data version mismatch: expected ${expected}, found ${actual}`,
      { expected, actual },
    );
  }
}

export class SnapshotUnavailableError extends AppError {
  constructor() {
    super(503, 'SNAPSHOT_UNAVAILABLE', 'Coding reference data is not loaded yet');
  }
}
