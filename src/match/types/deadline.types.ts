export enum MatchStatus {
  SCHEDULED = 'SCHEDULED',
  COMPLETED = 'COMPLETED',
  CANCELLED = 'CANCELLED',
}

export enum DeadlineState {
  OPEN = 'OPEN',
  NEXT_LOCKED = 'NEXT_LOCKED',
  DEADLINE_PASSED = 'DEADLINE_PASSED',
}

/**
 * The part of a match the lock evaluation needs. Entities satisfy it directly.
 */
export interface LockSubject {
  id: string;
  scheduledStart: Date;
  deadline: Date;
  deadlineLocked: boolean;
  status: MatchStatus;
}

/** One not-yet-started match in a group-competition queue. */
export interface GroupQueueEntry {
  id: string;
  scheduledStart: Date;
  deadlineLocked: boolean;
}

export interface LockEvaluation {
  state: DeadlineState;
  deadline: Date;
  /** Head of its pairing's queue, or starting at the same instant as the head. */
  isNext: boolean;
  /** The NEXT_LOCKED latch has not been persisted yet. */
  shouldLatch: boolean;
}

export interface MatchSchedule {
  id: string;
  groupId: string;
  competitionId: string;
  scheduledStart: Date;
  homeSide?: string | null;
  awaySide?: string | null;
}

export const DEADLINE_CONSTANTS = {
  MS_PER_MINUTE: 60_000,
} as const;
