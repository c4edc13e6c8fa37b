import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { MatchResult } from './entities/match-result.entity';
import { ResultState, SettlementSummary } from './types/result.types';
import { Prediction } from '../prediction/entities/prediction.entity';
import { SettlementState } from '../prediction/types/prediction.types';
import { Scoreline } from '../prediction/types/scoring.types';
import { toSettlementKey } from '../prediction/helpers/prediction.helper';
import { ScoringService } from '../prediction/scoring.service';
import { LeaderboardService } from '../leaderboard/leaderboard.service';
import { SettlementTransition } from '../leaderboard/types/leaderboard.types';
import { NotificationService } from '../notification/notification.service';
import { MetricsService } from '../common/services/metrics.service';
import { Clock, CLOCK } from '../common/clock/clock';
import { ConcurrentModificationError, ResultNotFinalError } from '../common/errors/betting.errors';
import { withOptimisticRetry } from '../common/helpers/optimistic-retry.helper';

type SettleOutcome =
  | { kind: 'void' }
  | { kind: 'already' }
  | { kind: 'settled'; groupId: string; transition: SettlementTransition };

/**
 * Scores every prediction of a finalized match exactly once per final result.
 *
 * Safe to run any number of times: predictions already settled against the
 * same result identity, and voided ones, are skipped.
 */
@Injectable()
export class SettlementService {
  private readonly logger = new Logger(SettlementService.name);
  private readonly maxRetries: number;

  constructor(
    @InjectRepository(MatchResult)
    private resultRepository: Repository<MatchResult>,
    @InjectRepository(Prediction)
    private predictionRepository: Repository<Prediction>,
    private scoringService: ScoringService,
    private leaderboardService: LeaderboardService,
    private notificationService: NotificationService,
    private metricsService: MetricsService,
    private configService: ConfigService,
    @Inject(CLOCK) private clock: Clock,
  ) {
    this.maxRetries = this.configService.get<number>('betting.maxConcurrencyRetries') ?? 3;
  }

  async settleMatch(matchId: string): Promise<SettlementSummary> {
    const startTime = Date.now();

    const result = await this.resultRepository.findOne({ where: { matchId } });
    if (!result || result.state !== ResultState.FINAL) {
      throw new ResultNotFinalError(`Match ${matchId} has no final result`, {
        matchId,
        state: result ? result.state : 'NONE',
      });
    }

    const resultKey = toSettlementKey(result.id, result.version);
    const outcome: Scoreline = {
      winner: result.winner,
      homeScore: result.homeScore,
      awayScore: result.awayScore,
    };

    const predictions = await this.predictionRepository.find({
      where: { matchId },
      order: { id: 'ASC' },
    });

    const summary: SettlementSummary = {
      matchId,
      resultKey,
      totalPredictions: predictions.length,
      newlySettled: 0,
      alreadySettled: 0,
      voided: 0,
      exactScoreHits: 0,
      correctWinnerHits: 0,
      misses: 0,
      pointsAwarded: 0,
      groups: [],
    };
    const transitionsByGroup = new Map<string, SettlementTransition[]>();

    for (const prediction of predictions) {
      const settled = await this.settleOne(prediction, resultKey, outcome);

      if (settled.kind === 'void') {
        summary.voided++;
        continue;
      }
      if (settled.kind === 'already') {
        summary.alreadySettled++;
        continue;
      }

      const { transition } = settled;
      summary.newlySettled++;
      summary.pointsAwarded += transition.points;
      if (transition.rule === 'EXACT_SCORE') summary.exactScoreHits++;
      else if (transition.rule === 'CORRECT_WINNER') summary.correctWinnerHits++;
      else summary.misses++;
      this.metricsService.incrementPredictionsSettled(transition.rule);

      const bucket = transitionsByGroup.get(settled.groupId) ?? [];
      bucket.push(transition);
      transitionsByGroup.set(settled.groupId, bucket);
    }

    for (const [groupId, transitions] of transitionsByGroup) {
      await this.leaderboardService.applyTransitions(groupId, transitions);
      await this.notificationService.publish({ type: 'leaderboard_changed', groupId, matchId });
    }
    summary.groups = [...transitionsByGroup.keys()].sort();

    this.metricsService.recordSettlementDuration((Date.now() - startTime) / 1000);
    this.logger.log(
      `Settled match ${matchId}: ${summary.newlySettled} new, ${summary.alreadySettled} already settled, ${summary.voided} void`,
    );

    return summary;
  }

  /**
   * Voids every prediction of a cancelled match with zero points. Returns how
   * many predictions changed.
   */
  async voidMatch(matchId: string): Promise<number> {
    const predictions = await this.predictionRepository.find({ where: { matchId } });
    const regroup = new Set<string>();
    let voided = 0;

    for (const prediction of predictions) {
      const outcome = await withOptimisticRetry(
        this.retryOptions('voidPrediction'),
        async (attempt) => {
          const current = attempt === 1 ? prediction : await this.reload(prediction.id);
          if (!current || current.settlementState === SettlementState.VOID) {
            return null;
          }

          await this.guardedUpdate(current, {
            settlementState: SettlementState.VOID,
            points: 0,
            scoreRule: null,
            settledResultKey: null,
            settledAt: this.clock.now(),
            version: current.version + 1,
          });
          return current;
        },
      );

      if (!outcome) continue;
      voided++;
      if (outcome.settlementState === SettlementState.SETTLED) {
        regroup.add(outcome.groupId);
      }
    }

    // Settled points that were voided must leave the standings
    for (const groupId of regroup) {
      await this.leaderboardService.rebuild(groupId, 'void');
    }

    this.metricsService.incrementPredictionsSettled('VOID', voided);
    return voided;
  }

  /**
   * Matches whose FINAL result still has pending predictions.
   */
  async findUnsettledFinalMatches(): Promise<string[]> {
    const finals = await this.resultRepository.find({ where: { state: ResultState.FINAL } });
    const unsettled: string[] = [];

    for (const result of finals) {
      const pending = await this.predictionRepository.count({
        where: { matchId: result.matchId, settlementState: SettlementState.PENDING },
      });
      if (pending > 0) {
        unsettled.push(result.matchId);
      }
    }

    return unsettled;
  }

  private async settleOne(
    prediction: Prediction,
    resultKey: string,
    outcome: Scoreline,
  ): Promise<SettleOutcome> {
    return withOptimisticRetry<SettleOutcome>(this.retryOptions('settlePrediction'), async (attempt) => {
      const current = attempt === 1 ? prediction : await this.reload(prediction.id);
      if (!current || current.settlementState === SettlementState.VOID) {
        return { kind: 'void' };
      }
      if (
        current.settlementState === SettlementState.SETTLED &&
        current.settledResultKey === resultKey
      ) {
        return { kind: 'already' };
      }

      const score = this.scoringService.scorePrediction(
        {
          winner: current.predictedWinner,
          homeScore: current.predictedHomeScore,
          awayScore: current.predictedAwayScore,
        },
        outcome,
      );

      await this.guardedUpdate(current, {
        points: score.score,
        scoreRule: score.rule,
        settlementState: SettlementState.SETTLED,
        settledResultKey: resultKey,
        settledAt: this.clock.now(),
        version: current.version + 1,
      });

      return {
        kind: 'settled',
        groupId: current.groupId,
        transition: {
          predictionId: current.id,
          userId: current.userId,
          settlementKey: resultKey,
          points: score.score,
          rule: score.rule,
        },
      };
    });
  }

  private async reload(predictionId: string): Promise<Prediction | null> {
    return this.predictionRepository.findOne({ where: { id: predictionId } });
  }

  private async guardedUpdate(prediction: Prediction, changes: Partial<Prediction>): Promise<void> {
    const result = await this.predictionRepository.update(
      { id: prediction.id, version: prediction.version },
      changes,
    );
    if (!result.affected) {
      this.metricsService.incrementConcurrencyConflicts('settlement');
      throw new ConcurrentModificationError(`Prediction ${prediction.id} was modified concurrently`, {
        predictionId: prediction.id,
      });
    }
  }

  private retryOptions(operation: string) {
    return { operation, maxRetries: this.maxRetries, logger: this.logger };
  }
}
