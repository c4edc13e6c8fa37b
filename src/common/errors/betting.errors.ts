export type BettingErrorCode =
  | 'DEADLINE_PASSED'
  | 'DEADLINE_LOCKED'
  | 'INVALID_DEADLINE'
  | 'INVALID_PREDICTION'
  | 'INVALID_RESULT'
  | 'NOT_GROUP_MEMBER'
  | 'RESULT_ALREADY_FINAL'
  | 'RESULT_NOT_FINAL'
  | 'MATCH_NOT_FOUND'
  | 'MATCH_CANCELLED'
  | 'PREDICTIONS_OPEN'
  | 'CONCURRENT_MODIFICATION'
  | 'SCORING_INVARIANT_VIOLATION';

export type BettingErrorContext = Record<string, string | number | boolean | null>;

/**
 * Base class for every domain failure raised by the league engine.
 * `context` carries the state that explains the rejection (current deadline,
 * lock state, result state) so callers can surface it as-is.
 */
export abstract class BettingError extends Error {
  abstract readonly code: BettingErrorCode;

  constructor(
    message: string,
    public readonly context: BettingErrorContext = {},
  ) {
    super(message);
    this.name = new.target.name;
  }
}

export class DeadlinePassedError extends BettingError {
  readonly code = 'DEADLINE_PASSED';
}

export class DeadlineLockedError extends BettingError {
  readonly code = 'DEADLINE_LOCKED';
}

export class InvalidDeadlineError extends BettingError {
  readonly code = 'INVALID_DEADLINE';
}

export class InvalidPredictionError extends BettingError {
  readonly code = 'INVALID_PREDICTION';
}

export class InvalidResultError extends BettingError {
  readonly code = 'INVALID_RESULT';
}

export class NotGroupMemberError extends BettingError {
  readonly code = 'NOT_GROUP_MEMBER';
}

export class ResultAlreadyFinalError extends BettingError {
  readonly code = 'RESULT_ALREADY_FINAL';
}

export class ResultNotFinalError extends BettingError {
  readonly code = 'RESULT_NOT_FINAL';
}

export class MatchNotFoundError extends BettingError {
  readonly code = 'MATCH_NOT_FOUND';
}

export class MatchCancelledError extends BettingError {
  readonly code = 'MATCH_CANCELLED';
}

/** Other users' picks stay hidden while the match still accepts predictions. */
export class PredictionsOpenError extends BettingError {
  readonly code = 'PREDICTIONS_OPEN';
}

/** Optimistic version check lost; safe to retry after re-reading state. */
export class ConcurrentModificationError extends BettingError {
  readonly code = 'CONCURRENT_MODIFICATION';
}

/** Internal consistency fault. Never shown to users as a scoring outcome. */
export class ScoringInvariantError extends BettingError {
  readonly code = 'SCORING_INVARIANT_VIOLATION';
}
