import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { InjectRepository } from '@nestjs/typeorm';
import { FindOptionsWhere, Repository } from 'typeorm';
import { Match } from './entities/match.entity';
import {
  DeadlineState,
  GroupQueueEntry,
  LockEvaluation,
  MatchSchedule,
  MatchStatus,
} from './types/deadline.types';
import {
  defaultDeadline,
  evaluateLockState,
  findQueueHead,
  isDeadlineWithinSchedule,
} from './helpers/lock-state.helper';
import { AuditService } from '../audit/audit.service';
import { AuditKind } from '../audit/types/audit.types';
import { NotificationService } from '../notification/notification.service';
import { MetricsService } from '../common/services/metrics.service';
import { Clock, CLOCK } from '../common/clock/clock';
import {
  ConcurrentModificationError,
  DeadlineLockedError,
  DeadlinePassedError,
  InvalidDeadlineError,
  MatchCancelledError,
  MatchNotFoundError,
  ResultAlreadyFinalError,
} from '../common/errors/betting.errors';
import { isUniqueViolation, withOptimisticRetry } from '../common/helpers/optimistic-retry.helper';

export interface EvaluatedMatch {
  match: Match;
  evaluation: LockEvaluation;
}

/**
 * Owns every match deadline: the default derived from the schedule, admin
 * overrides, and the one-way NEXT_LOCKED latch.
 */
@Injectable()
export class DeadlineService {
  private readonly logger = new Logger(DeadlineService.name);
  private readonly offsetMinutes: number;
  private readonly maxRetries: number;

  constructor(
    @InjectRepository(Match)
    private matchRepository: Repository<Match>,
    private auditService: AuditService,
    private notificationService: NotificationService,
    private metricsService: MetricsService,
    private configService: ConfigService,
    @Inject(CLOCK) private clock: Clock,
  ) {
    this.offsetMinutes = this.configService.get<number>('betting.deadlineOffsetMinutes') || 60;
    this.maxRetries = this.configService.get<number>('betting.maxConcurrencyRetries') ?? 3;
  }

  async getMatch(matchId: string): Promise<Match> {
    const match = await this.matchRepository.findOne({ where: { id: matchId } });
    if (!match) {
      throw new MatchNotFoundError(`Match ${matchId} not found`, { matchId });
    }
    return match;
  }

  /**
   * Not-yet-started SCHEDULED matches of the match's group-competition pairing.
   */
  async loadQueue(match: Pick<Match, 'groupId' | 'competitionId'>): Promise<GroupQueueEntry[]> {
    const now = this.clock.now();
    const scheduled = await this.matchRepository.find({
      where: {
        groupId: match.groupId,
        competitionId: match.competitionId,
        status: MatchStatus.SCHEDULED,
      },
    });

    return scheduled
      .filter((m) => m.scheduledStart.getTime() > now.getTime())
      .map((m) => ({ id: m.id, scheduledStart: m.scheduledStart, deadlineLocked: m.deadlineLocked }));
  }

  /**
   * Current lock state of a match. Persists the NEXT_LOCKED latch the first
   * time the match is observed at the head of its queue.
   */
  async getLockState(matchId: string): Promise<LockEvaluation> {
    const { evaluation } = await withOptimisticRetry(
      this.retryOptions('getLockState'),
      async () => this.evaluate(await this.getMatch(matchId)),
    );
    return evaluation;
  }

  /**
   * Throws DeadlinePassedError unless the match is OPEN.
   */
  async assertAcceptingPredictions(matchId: string): Promise<Match> {
    const { match, evaluation } = await withOptimisticRetry(
      this.retryOptions('assertAcceptingPredictions'),
      async () => this.evaluate(await this.getMatch(matchId)),
    );

    if (evaluation.state !== DeadlineState.OPEN) {
      throw new DeadlinePassedError(`Match ${matchId} no longer accepts predictions`, {
        matchId,
        state: evaluation.state,
        deadline: evaluation.deadline.toISOString(),
        status: match.status,
      });
    }

    return match;
  }

  /**
   * Administrative deadline override. Only an OPEN match can be changed, and the
   * new deadline must lie strictly between now and the scheduled start.
   */
  async setDeadline(matchId: string, newDeadline: Date, actorId: string): Promise<Match> {
    const { updated, previous } = await withOptimisticRetry(
      this.retryOptions('setDeadline'),
      async () => {
        const { match, evaluation } = await this.evaluate(await this.getMatch(matchId));
        this.assertMutable(match, evaluation);

        const now = this.clock.now();
        if (!isDeadlineWithinSchedule(newDeadline, match.scheduledStart, now)) {
          throw new InvalidDeadlineError('Deadline must be in the future and before the match starts', {
            matchId,
            deadline: newDeadline.toISOString(),
            scheduledStart: match.scheduledStart.toISOString(),
            now: now.toISOString(),
          });
        }

        const changes = { deadline: newDeadline, deadlineOverridden: true, version: match.version + 1 };
        await this.guardedUpdate(match, changes);
        return { updated: { ...match, ...changes }, previous: match };
      },
    );

    await this.auditService.record({
      actorId,
      kind: AuditKind.DEADLINE_OVERRIDE,
      entityId: matchId,
      before: { deadline: previous.deadline.toISOString(), overridden: previous.deadlineOverridden },
      after: { deadline: updated.deadline.toISOString(), overridden: true },
    });
    this.metricsService.incrementDeadlineOverrides();

    await this.notificationService.publish({
      type: 'deadline_changed',
      matchId,
      groupId: updated.groupId,
      previousDeadline: previous.deadline.toISOString(),
      deadline: updated.deadline.toISOString(),
      actorId,
    });

    this.logger.log(`Deadline of match ${matchId} set to ${updated.deadline.toISOString()}`);
    return updated;
  }

  /**
   * Creates or reschedules a match from the schedule feed.
   */
  async upsertMatch(schedule: MatchSchedule): Promise<Match> {
    const { match, previousStart } = await withOptimisticRetry(
      this.retryOptions('upsertMatch'),
      async () => {
        const existing = await this.matchRepository.findOne({ where: { id: schedule.id } });
        if (!existing) {
          return { match: await this.createMatch(schedule), previousStart: null };
        }
        return { match: await this.rescheduleMatch(existing, schedule), previousStart: existing.scheduledStart };
      },
    );

    if (previousStart && previousStart.getTime() !== match.scheduledStart.getTime()) {
      await this.notificationService.publish({
        type: 'match_rescheduled',
        matchId: match.id,
        groupId: match.groupId,
        previousStart: previousStart.toISOString(),
        scheduledStart: match.scheduledStart.toISOString(),
        deadline: match.deadline.toISOString(),
      });
    }

    return match;
  }

  /**
   * One-way latch out of SCHEDULED. Repeating the same move is a no-op; leaving
   * COMPLETED or CANCELLED for anything else is rejected. Returns whether the
   * status changed.
   */
  async updateStatus(
    matchId: string,
    status: MatchStatus.COMPLETED | MatchStatus.CANCELLED,
  ): Promise<{ match: Match; changed: boolean }> {
    return withOptimisticRetry(this.retryOptions('updateStatus'), async () => {
      const match = await this.getMatch(matchId);
      if (match.status === status) {
        return { match, changed: false };
      }

      const context = { matchId, status: match.status, requested: status };
      if (match.status === MatchStatus.CANCELLED) {
        throw new MatchCancelledError(`Match ${matchId} was cancelled`, context);
      }
      if (match.status === MatchStatus.COMPLETED) {
        throw new ResultAlreadyFinalError(`Match ${matchId} is already completed`, context);
      }

      const changes = { status, version: match.version + 1 };
      await this.guardedUpdate(match, changes, { status: MatchStatus.SCHEDULED });
      this.logger.log(`Match ${matchId} is now ${status}`);
      return { match: { ...match, ...changes }, changed: true };
    });
  }

  /**
   * Latches every queue head that has not been latched yet. Returns the number
   * of matches latched by this run.
   */
  async latchDueMatches(): Promise<number> {
    const now = this.clock.now();
    const scheduled = await this.matchRepository.find({ where: { status: MatchStatus.SCHEDULED } });
    const pairings = new Map<string, Match[]>();

    for (const match of scheduled) {
      const key = `${match.groupId}:${match.competitionId}`;
      const bucket = pairings.get(key) ?? [];
      bucket.push(match);
      pairings.set(key, bucket);
    }

    let latched = 0;
    for (const matches of pairings.values()) {
      const head = findQueueHead(matches, now);
      if (!head) continue;

      const due = matches.filter(
        (m) => !m.deadlineLocked && m.scheduledStart.getTime() === head.scheduledStart.getTime(),
      );

      for (const match of due) {
        try {
          const { evaluation } = await this.evaluate(match, now);
          if (evaluation.state === DeadlineState.NEXT_LOCKED) latched++;
        } catch (error) {
          if (!(error instanceof ConcurrentModificationError)) throw error;
          // Latched or rescheduled concurrently; the next run sees the fresh row
          this.logger.debug(`Skipped latching match ${match.id}: version conflict`);
        }
      }
    }

    return latched;
  }

  /**
   * Evaluates the lock state of a freshly read match and persists the latch when due.
   */
  private async evaluate(match: Match, now: Date = this.clock.now()): Promise<EvaluatedMatch> {
    const queue = await this.loadQueue(match);
    const evaluation = evaluateLockState(match, queue, now);

    if (!evaluation.shouldLatch) {
      return { match, evaluation };
    }

    const changes = { deadlineLocked: true, lockedAt: now, version: match.version + 1 };
    await this.guardedUpdate(match, changes);
    this.metricsService.incrementDeadlineLatches();
    this.logger.log(`Match ${match.id} latched as next to start`);

    return { match: { ...match, ...changes }, evaluation: { ...evaluation, shouldLatch: false } };
  }

  private assertMutable(match: Match, evaluation: LockEvaluation): void {
    const context = {
      matchId: match.id,
      state: evaluation.state,
      deadline: evaluation.deadline.toISOString(),
    };

    if (evaluation.state === DeadlineState.NEXT_LOCKED) {
      throw new DeadlineLockedError(`Deadline of match ${match.id} is locked`, context);
    }
    if (evaluation.state === DeadlineState.DEADLINE_PASSED) {
      throw new DeadlinePassedError(`Deadline of match ${match.id} has passed`, context);
    }
  }

  private async createMatch(schedule: MatchSchedule): Promise<Match> {
    const match = this.matchRepository.create({
      id: schedule.id,
      groupId: schedule.groupId,
      competitionId: schedule.competitionId,
      homeSide: schedule.homeSide ?? null,
      awaySide: schedule.awaySide ?? null,
      scheduledStart: schedule.scheduledStart,
      deadline: defaultDeadline(schedule.scheduledStart, this.offsetMinutes),
      deadlineOverridden: false,
      deadlineLocked: false,
      lockedAt: null,
      status: MatchStatus.SCHEDULED,
      version: 0,
    });

    try {
      const saved = await this.matchRepository.save(match);
      this.logger.log(`Match ${saved.id} scheduled for ${saved.scheduledStart.toISOString()}`);
      return saved;
    } catch (error) {
      if (isUniqueViolation(error)) {
        throw new ConcurrentModificationError(`Match ${schedule.id} was created concurrently`, {
          matchId: schedule.id,
        });
      }
      throw error;
    }
  }

  private async rescheduleMatch(existing: Match, schedule: MatchSchedule): Promise<Match> {
    if (existing.groupId !== schedule.groupId || existing.competitionId !== schedule.competitionId) {
      this.logger.warn(`Ignoring pairing change for match ${existing.id}`);
    }

    const labels = {
      homeSide: schedule.homeSide === undefined ? existing.homeSide : schedule.homeSide,
      awaySide: schedule.awaySide === undefined ? existing.awaySide : schedule.awaySide,
    };
    const startChanged = existing.scheduledStart.getTime() !== schedule.scheduledStart.getTime();

    if (!startChanged) {
      if (labels.homeSide === existing.homeSide && labels.awaySide === existing.awaySide) {
        return existing;
      }
      const changes = { ...labels, version: existing.version + 1 };
      await this.guardedUpdate(existing, changes);
      return { ...existing, ...changes };
    }

    if (existing.status !== MatchStatus.SCHEDULED) {
      throw new DeadlineLockedError(`Match ${existing.id} can no longer be rescheduled`, {
        matchId: existing.id,
        status: existing.status,
      });
    }

    const newStart = schedule.scheduledStart;
    let deadline: Date;
    let deadlineOverridden: boolean;

    if (existing.deadlineLocked) {
      if (existing.deadline.getTime() >= newStart.getTime()) {
        throw new DeadlineLockedError(
          `Frozen deadline of match ${existing.id} would not precede the new start`,
          {
            matchId: existing.id,
            deadline: existing.deadline.toISOString(),
            scheduledStart: newStart.toISOString(),
          },
        );
      }
      deadline = existing.deadline;
      deadlineOverridden = existing.deadlineOverridden;
    } else if (existing.deadlineOverridden && existing.deadline.getTime() < newStart.getTime()) {
      deadline = existing.deadline;
      deadlineOverridden = true;
    } else {
      deadline = defaultDeadline(newStart, this.offsetMinutes);
      deadlineOverridden = false;
    }

    const changes = {
      ...labels,
      scheduledStart: newStart,
      deadline,
      deadlineOverridden,
      version: existing.version + 1,
    };
    await this.guardedUpdate(existing, changes);

    this.logger.log(
      `Match ${existing.id} rescheduled from ${existing.scheduledStart.toISOString()} to ${newStart.toISOString()}`,
    );
    return { ...existing, ...changes };
  }

  /**
   * Writes `changes` only if the row still has the version that was read.
   */
  private async guardedUpdate(
    match: Match,
    changes: Partial<Match>,
    criteria: FindOptionsWhere<Match> = {},
  ): Promise<void> {
    const result = await this.matchRepository.update(
      { ...criteria, id: match.id, version: match.version },
      changes,
    );
    if (!result.affected) {
      this.metricsService.incrementConcurrencyConflicts('match');
      throw new ConcurrentModificationError(`Match ${match.id} was modified concurrently`, {
        matchId: match.id,
        version: match.version,
      });
    }
  }

  private retryOptions(operation: string) {
    return { operation, maxRetries: this.maxRetries, logger: this.logger };
  }
}
