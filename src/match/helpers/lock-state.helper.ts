import {
  DEADLINE_CONSTANTS,
  DeadlineState,
  GroupQueueEntry,
  LockEvaluation,
  LockSubject,
  MatchStatus,
} from '../types/deadline.types';

/**
 * Computes whether a match still accepts predictions and deadline changes.
 *
 * Pure: the caller supplies the clock reading and the queue of not-yet-started
 * matches for the match's group-competition pairing. Entries whose start is not
 * after `now` are ignored, so a slightly stale queue cannot make an already
 * started match count as the head.
 *
 * Evaluation order:
 * 1. a match that is no longer SCHEDULED is DEADLINE_PASSED
 * 2. a latched match is NEXT_LOCKED
 * 3. the queue head, and every match starting at the same instant, is NEXT_LOCKED
 * 4. `now >= deadline` is DEADLINE_PASSED
 * 5. otherwise OPEN
 */
export function evaluateLockState(
  match: LockSubject,
  groupQueue: readonly GroupQueueEntry[],
  now: Date,
): LockEvaluation {
  const base = { deadline: match.deadline };

  if (match.status !== MatchStatus.SCHEDULED) {
    return { ...base, state: DeadlineState.DEADLINE_PASSED, isNext: false, shouldLatch: false };
  }

  const head = findQueueHead(groupQueue, now);
  const isNext =
    head !== null &&
    match.scheduledStart.getTime() > now.getTime() &&
    match.scheduledStart.getTime() === head.scheduledStart.getTime();

  if (match.deadlineLocked) {
    return { ...base, state: DeadlineState.NEXT_LOCKED, isNext, shouldLatch: false };
  }

  if (isNext) {
    return { ...base, state: DeadlineState.NEXT_LOCKED, isNext, shouldLatch: true };
  }

  if (now.getTime() >= match.deadline.getTime()) {
    return { ...base, state: DeadlineState.DEADLINE_PASSED, isNext, shouldLatch: false };
  }

  return { ...base, state: DeadlineState.OPEN, isNext, shouldLatch: false };
}

/**
 * Earliest entry that has not started yet, or null for an empty queue.
 */
export function findQueueHead(
  groupQueue: readonly GroupQueueEntry[],
  now: Date,
): GroupQueueEntry | null {
  let head: GroupQueueEntry | null = null;

  for (const entry of groupQueue) {
    if (entry.scheduledStart.getTime() <= now.getTime()) continue;
    if (head === null || entry.scheduledStart.getTime() < head.scheduledStart.getTime()) {
      head = entry;
    }
  }

  return head;
}

export function defaultDeadline(scheduledStart: Date, offsetMinutes: number): Date {
  return new Date(scheduledStart.getTime() - offsetMinutes * DEADLINE_CONSTANTS.MS_PER_MINUTE);
}

export function isDeadlineWithinSchedule(deadline: Date, scheduledStart: Date, now: Date): boolean {
  return (
    deadline.getTime() > now.getTime() && deadline.getTime() < scheduledStart.getTime()
  );
}
