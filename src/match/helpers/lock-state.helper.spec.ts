import {
  defaultDeadline,
  evaluateLockState,
  findQueueHead,
  isDeadlineWithinSchedule,
} from './lock-state.helper';
import { DeadlineState, LockSubject, MatchStatus } from '../types/deadline.types';

const now = new Date('2026-06-01T12:00:00.000Z');
const at = (iso: string) => new Date(iso);

const subject = (overrides: Partial<LockSubject> = {}): LockSubject => ({
  id: 'm2',
  scheduledStart: at('2026-06-02T18:00:00.000Z'),
  deadline: at('2026-06-02T17:00:00.000Z'),
  deadlineLocked: false,
  status: MatchStatus.SCHEDULED,
  ...overrides,
});

const queueEntry = (id: string, start: string, deadlineLocked = false) => ({
  id,
  scheduledStart: at(start),
  deadlineLocked,
});

describe('evaluateLockState', () => {
  const earlier = queueEntry('m1', '2026-06-01T18:00:00.000Z');
  const own = queueEntry('m2', '2026-06-02T18:00:00.000Z');

  it('should be OPEN for a match that is not next and whose deadline is ahead', () => {
    const evaluation = evaluateLockState(subject(), [earlier, own], now);

    expect(evaluation).toEqual({
      state: DeadlineState.OPEN,
      deadline: at('2026-06-02T17:00:00.000Z'),
      isNext: false,
      shouldLatch: false,
    });
  });

  it('should lock the head of the queue and ask for the latch', () => {
    const evaluation = evaluateLockState(subject(), [own], now);

    expect(evaluation.state).toBe(DeadlineState.NEXT_LOCKED);
    expect(evaluation.isNext).toBe(true);
    expect(evaluation.shouldLatch).toBe(true);
  });

  it('should lock every match starting at the same instant as the head', () => {
    const twin = queueEntry('m3', '2026-06-02T18:00:00.000Z');

    const evaluation = evaluateLockState(subject(), [own, twin], now);

    expect(evaluation.state).toBe(DeadlineState.NEXT_LOCKED);
    expect(evaluation.shouldLatch).toBe(true);
  });

  it('should stay NEXT_LOCKED once latched, without latching again', () => {
    const sooner = queueEntry('m0', '2026-06-01T13:00:00.000Z');

    const evaluation = evaluateLockState(subject({ deadlineLocked: true }), [sooner, own], now);

    expect(evaluation.state).toBe(DeadlineState.NEXT_LOCKED);
    expect(evaluation.isNext).toBe(false);
    expect(evaluation.shouldLatch).toBe(false);
  });

  it('should report DEADLINE_PASSED once the deadline is reached', () => {
    const evaluation = evaluateLockState(
      subject({ deadline: now }),
      [earlier, own],
      now,
    );

    expect(evaluation.state).toBe(DeadlineState.DEADLINE_PASSED);
  });

  it('should report DEADLINE_PASSED for matches that are no longer scheduled', () => {
    for (const status of [MatchStatus.COMPLETED, MatchStatus.CANCELLED]) {
      const evaluation = evaluateLockState(subject({ status, deadlineLocked: true }), [], now);

      expect(evaluation.state).toBe(DeadlineState.DEADLINE_PASSED);
      expect(evaluation.shouldLatch).toBe(false);
    }
  });

  it('should ignore queue entries that already started', () => {
    const started = queueEntry('m0', '2026-06-01T11:00:00.000Z');

    const evaluation = evaluateLockState(subject(), [started, own], now);

    expect(evaluation.state).toBe(DeadlineState.NEXT_LOCKED);
  });
});

describe('findQueueHead', () => {
  it('should return the earliest entry still to start', () => {
    const head = findQueueHead(
      [
        queueEntry('late', '2026-06-03T18:00:00.000Z'),
        queueEntry('soon', '2026-06-01T15:00:00.000Z'),
        queueEntry('past', '2026-06-01T10:00:00.000Z'),
      ],
      now,
    );

    expect(head?.id).toBe('soon');
  });

  it('should return null for an empty queue', () => {
    expect(findQueueHead([], now)).toBeNull();
  });
});

describe('deadline arithmetic', () => {
  it('should place the default deadline the configured minutes before the start', () => {
    expect(defaultDeadline(at('2026-06-02T18:00:00.000Z'), 60)).toEqual(at('2026-06-02T17:00:00.000Z'));
  });

  it('should require a deadline strictly between now and the start', () => {
    const start = at('2026-06-02T18:00:00.000Z');

    expect(isDeadlineWithinSchedule(at('2026-06-02T17:30:00.000Z'), start, now)).toBe(true);
    expect(isDeadlineWithinSchedule(start, start, now)).toBe(false);
    expect(isDeadlineWithinSchedule(now, start, now)).toBe(false);
  });
});
