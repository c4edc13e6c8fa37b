import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { MatchResult } from './entities/match-result.entity';
import { ResultState, SettlementSummary } from './types/result.types';
import { SettlementService } from './settlement.service';
import { DeadlineService } from '../match/deadline.service';
import { MatchStatus } from '../match/types/deadline.types';
import { deriveWinner, isValidScore } from '../prediction/helpers/prediction.helper';
import { AuditService } from '../audit/audit.service';
import { AuditKind, AuditValue } from '../audit/types/audit.types';
import { NotificationService } from '../notification/notification.service';
import { MetricsService } from '../common/services/metrics.service';
import { Clock, CLOCK } from '../common/clock/clock';
import {
  ConcurrentModificationError,
  InvalidResultError,
  MatchCancelledError,
  ResultAlreadyFinalError,
} from '../common/errors/betting.errors';
import { isUniqueViolation, withOptimisticRetry } from '../common/helpers/optimistic-retry.helper';

export interface FinalizedResult {
  result: MatchResult;
  settlement: SettlementSummary;
}

export interface CancellationOutcome {
  matchId: string;
  voidedPredictions: number;
  alreadyCancelled: boolean;
}

interface ResultWrite {
  result: MatchResult;
  previous: MatchResult | null;
}

/**
 * Result lifecycle: NONE → PROVISIONAL → FINAL, with cancellation voiding the
 * match instead. FINAL is terminal and is the only state that triggers settlement.
 */
@Injectable()
export class ResultService {
  private readonly logger = new Logger(ResultService.name);
  private readonly maxRetries: number;

  constructor(
    @InjectRepository(MatchResult)
    private resultRepository: Repository<MatchResult>,
    private settlementService: SettlementService,
    private deadlineService: DeadlineService,
    private auditService: AuditService,
    private notificationService: NotificationService,
    private metricsService: MetricsService,
    private configService: ConfigService,
    @Inject(CLOCK) private clock: Clock,
  ) {
    this.maxRetries = this.configService.get<number>('betting.maxConcurrencyRetries') ?? 3;
  }

  async getResult(matchId: string): Promise<MatchResult | null> {
    return this.resultRepository.findOne({ where: { matchId } });
  }

  /**
   * Enters or corrects a provisional result. Triggers no settlement.
   */
  async recordProvisional(
    matchId: string,
    homeScore: number,
    awayScore: number,
    actorId: string,
  ): Promise<MatchResult> {
    this.assertValidScores(matchId, homeScore, awayScore);

    const { result, previous } = await withOptimisticRetry<ResultWrite>(
      this.retryOptions('recordProvisional'),
      async () => {
        await this.assertNotCancelled(matchId);
        const existing = await this.getResult(matchId);
        this.assertNotFinal(matchId, existing);

        const scores = { homeScore, awayScore, winner: deriveWinner(homeScore, awayScore) };
        const now = this.clock.now();

        if (existing) {
          const changes = { ...scores, enteredAt: now, enteredBy: actorId, version: existing.version + 1 };
          await this.guardedUpdate(existing, changes);
          return { result: { ...existing, ...changes }, previous: existing };
        }

        const created = await this.insert({
          matchId,
          ...scores,
          state: ResultState.PROVISIONAL,
          enteredAt: now,
          finalizedAt: null,
          enteredBy: actorId,
          version: 0,
        });
        return { result: created, previous: null };
      },
    );

    if (previous) {
      await this.auditService.record({
        actorId,
        kind: AuditKind.RESULT_CORRECTION,
        entityId: matchId,
        before: this.snapshot(previous),
        after: this.snapshot(result),
      });
    }
    this.metricsService.incrementResultTransitions(ResultState.PROVISIONAL);

    const match = await this.deadlineService.getMatch(matchId);
    await this.notificationService.publish({
      type: 'provisional_result_posted',
      matchId,
      groupId: match.groupId,
      homeScore,
      awayScore,
      correction: previous !== null,
    });

    this.logger.log(`Provisional result ${homeScore}-${awayScore} recorded for match ${matchId}`);
    return result;
  }

  /**
   * Completes the match, latches the result as FINAL and settles its predictions.
   * The match latch comes first: it is the row a concurrent cancellation
   * contends on, so at most one of the two can win.
   */
  async finalize(
    matchId: string,
    homeScore: number,
    awayScore: number,
    actorId: string,
  ): Promise<FinalizedResult> {
    this.assertValidScores(matchId, homeScore, awayScore);
    await this.deadlineService.updateStatus(matchId, MatchStatus.COMPLETED);

    const { result, previous } = await withOptimisticRetry<ResultWrite>(
      this.retryOptions('finalize'),
      async () => {
        const existing = await this.getResult(matchId);
        this.assertNotFinal(matchId, existing);

        const now = this.clock.now();
        const finalFields = {
          homeScore,
          awayScore,
          winner: deriveWinner(homeScore, awayScore),
          state: ResultState.FINAL,
          finalizedAt: now,
          enteredBy: actorId,
        };

        if (existing) {
          const changes = { ...finalFields, version: existing.version + 1 };
          await this.guardedUpdate(existing, changes);
          return { result: { ...existing, ...changes }, previous: existing };
        }

        const created = await this.insert({ matchId, ...finalFields, enteredAt: now, version: 0 });
        return { result: created, previous: null };
      },
    );

    await this.auditService.record({
      actorId,
      kind: AuditKind.RESULT_FINALIZED,
      entityId: matchId,
      before: previous ? this.snapshot(previous) : { state: 'NONE' },
      after: this.snapshot(result),
    });

    if (previous && (previous.homeScore !== homeScore || previous.awayScore !== awayScore)) {
      await this.auditService.record({
        actorId,
        kind: AuditKind.RESULT_CORRECTION,
        entityId: matchId,
        before: this.snapshot(previous),
        after: this.snapshot(result),
      });
    }
    this.metricsService.incrementResultTransitions(ResultState.FINAL);

    const settlement = await this.settlementService.settleMatch(matchId);

    const match = await this.deadlineService.getMatch(matchId);
    await this.notificationService.publish({
      type: 'result_finalized',
      matchId,
      groupId: match.groupId,
      homeScore,
      awayScore,
      newlySettled: settlement.newlySettled,
    });

    this.logger.log(`Result ${homeScore}-${awayScore} of match ${matchId} is final`);
    return { result, settlement };
  }

  /**
   * Cancels a match that has no final result and voids its predictions.
   * Repeating the call changes nothing. The status latch rejects a match that a
   * concurrent finalization already completed.
   */
  async cancelMatch(matchId: string, actorId: string): Promise<CancellationOutcome> {
    const match = await this.deadlineService.getMatch(matchId);
    this.assertNotFinal(matchId, await this.getResult(matchId));

    const { changed } = await this.deadlineService.updateStatus(matchId, MatchStatus.CANCELLED);
    const voided = await this.settlementService.voidMatch(matchId);

    if (changed) {
      await this.auditService.record({
        actorId,
        kind: AuditKind.MATCH_CANCELLED,
        entityId: matchId,
        before: { status: match.status },
        after: { status: MatchStatus.CANCELLED, voidedPredictions: voided },
      });
      this.metricsService.incrementResultTransitions('CANCELLED');
    }

    if (changed || voided > 0) {
      await this.notificationService.publish({
        type: 'match_cancelled',
        matchId,
        groupId: match.groupId,
        voidedPredictions: voided,
      });
    }

    return { matchId, voidedPredictions: voided, alreadyCancelled: !changed };
  }

  /**
   * Provisional results entered before `cutoff`.
   */
  async findOverdueProvisional(cutoff: Date): Promise<MatchResult[]> {
    const provisional = await this.resultRepository.find({
      where: { state: ResultState.PROVISIONAL },
      order: { enteredAt: 'ASC' },
    });
    return provisional.filter((r) => r.enteredAt.getTime() < cutoff.getTime());
  }

  private assertValidScores(matchId: string, homeScore: number, awayScore: number): void {
    if (!isValidScore(homeScore) || !isValidScore(awayScore)) {
      throw new InvalidResultError('Scores must be non-negative integers', {
        matchId,
        homeScore,
        awayScore,
      });
    }
  }

  private async assertNotCancelled(matchId: string): Promise<void> {
    const match = await this.deadlineService.getMatch(matchId);
    if (match.status === MatchStatus.CANCELLED) {
      throw new MatchCancelledError(`Match ${matchId} was cancelled`, { matchId });
    }
  }

  private assertNotFinal(matchId: string, existing: MatchResult | null): void {
    if (existing?.state === ResultState.FINAL) {
      throw new ResultAlreadyFinalError(`Result of match ${matchId} is already final`, {
        matchId,
        homeScore: existing.homeScore,
        awayScore: existing.awayScore,
      });
    }
  }

  private async insert(fields: Omit<MatchResult, 'id'>): Promise<MatchResult> {
    try {
      return await this.resultRepository.save(this.resultRepository.create(fields));
    } catch (error) {
      if (isUniqueViolation(error)) {
        throw new ConcurrentModificationError(`Result of match ${fields.matchId} was created concurrently`, {
          matchId: fields.matchId,
        });
      }
      throw error;
    }
  }

  /**
   * Only a PROVISIONAL row with the version that was read can be changed.
   */
  private async guardedUpdate(existing: MatchResult, changes: Partial<MatchResult>): Promise<void> {
    const result = await this.resultRepository.update(
      { id: existing.id, version: existing.version, state: ResultState.PROVISIONAL },
      changes,
    );
    if (!result.affected) {
      this.metricsService.incrementConcurrencyConflicts('result');
      throw new ConcurrentModificationError(`Result of match ${existing.matchId} was modified concurrently`, {
        matchId: existing.matchId,
        version: existing.version,
      });
    }
  }

  private snapshot(result: MatchResult): AuditValue {
    return {
      state: result.state,
      homeScore: result.homeScore,
      awayScore: result.awayScore,
      version: result.version,
    };
  }

  private retryOptions(operation: string) {
    return { operation, maxRetries: this.maxRetries, logger: this.logger };
  }
}
