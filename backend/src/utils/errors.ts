import type { Judgment } from '../../../shared/types/session';

export type SessionErrorCode =
  | 'NOT_FOUND'
  | 'INVALID_RANGE'
  | 'INVALID_OUTCOME'
  | 'CONFLICT'
  | 'STORAGE_FAILURE'
  | 'SESSION_ENDED'
  | 'FEATURE_DISABLED';

/**
 * Base class for every failure the session core reports to its caller.
 * `statusCode` is the HTTP status the error handler responds with.
 */
export abstract class SessionError extends Error {
  abstract readonly code: SessionErrorCode;
  abstract readonly statusCode: number;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }

  get details(): Record<string, unknown> | undefined {
    return undefined;
  }
}

export class NotFoundError extends SessionError {
  readonly code = 'NOT_FOUND';
  readonly statusCode = 404;

  constructor(readonly kind: 'pair' | 'trajectory' | 'judgment' | 'media', readonly id: string) {
    super(`Unknown ${kind}: ${id}`);
  }
}

export class InvalidRangeError extends SessionError {
  readonly code = 'INVALID_RANGE';
  readonly statusCode = 400;

  constructor(
    readonly trajectoryId: string,
    readonly start: number,
    readonly end: number,
    readonly duration: number
  ) {
    super(`Trim [${start}, ${end}] is outside [0, ${duration}] or empty for trajectory ${trajectoryId}`);
  }

  get details() {
    return { trajectoryId: this.trajectoryId, start: this.start, end: this.end, duration: this.duration };
  }
}

export class InvalidOutcomeError extends SessionError {
  readonly code = 'INVALID_OUTCOME';
  readonly statusCode = 400;

  constructor(readonly outcome: string, reason: string) {
    super(`Outcome "${outcome}" rejected: ${reason}`);
  }
}

export class ConflictError extends SessionError {
  readonly code = 'CONFLICT';
  readonly statusCode = 409;

  constructor(
    readonly pairId: string,
    readonly existing?: Judgment,
    readonly inProgress?: 'trim' | 'judgment'
  ) {
    super(
      existing
        ? `Pair ${pairId} already judged as "${existing.outcome}"`
        : `Pair ${pairId} has a ${inProgress ?? 'write'} in progress`
    );
  }

  get details() {
    return this.existing
      ? { pairId: this.pairId, existingOutcome: this.existing.outcome, existing: this.existing }
      : { pairId: this.pairId, inProgress: this.inProgress };
  }
}

export class StorageFailureError extends SessionError {
  readonly code = 'STORAGE_FAILURE';
  readonly statusCode = 503;

  constructor(operation: string, readonly reason: unknown) {
    super(`Persisting ${operation} failed: ${reason instanceof Error ? reason.message : String(reason)}`);
  }
}

export class SessionEndedError extends SessionError {
  readonly code = 'SESSION_ENDED';
  readonly statusCode = 410;

  constructor(readonly state: string) {
    super(`Session has ended (state ${state})`);
  }
}

export class FeatureDisabledError extends SessionError {
  readonly code = 'FEATURE_DISABLED';
  readonly statusCode = 403;

  constructor(readonly feature: 'ties' | 'skipping' | 'editing' | 'debug') {
    super(`The ${feature} feature is disabled for this session`);
  }
}
