import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { Prediction } from './entities/prediction.entity';
import { PredictedWinner } from './types/scoring.types';
import {
  MatchDistribution,
  PlacePredictionCommand,
  PREDICTION_CONSTANTS,
  SettlementState,
  UserPredictionStats,
} from './types/prediction.types';
import { describeInconsistency } from './helpers/prediction.helper';
import { DeadlineService } from '../match/deadline.service';
import { DeadlineState, MatchStatus } from '../match/types/deadline.types';
import { GroupDirectoryService } from '../membership/group-directory.service';
import { MetricsService } from '../common/services/metrics.service';
import { Clock, CLOCK } from '../common/clock/clock';
import {
  BettingError,
  ConcurrentModificationError,
  DeadlinePassedError,
  InvalidPredictionError,
  NotGroupMemberError,
  PredictionsOpenError,
} from '../common/errors/betting.errors';
import { isUniqueViolation, withOptimisticRetry } from '../common/helpers/optimistic-retry.helper';

export interface PlacedPrediction {
  prediction: Prediction;
  created: boolean;
}

@Injectable()
export class PredictionService {
  private readonly logger = new Logger(PredictionService.name);
  private readonly maxRetries: number;

  constructor(
    @InjectRepository(Prediction)
    private predictionRepository: Repository<Prediction>,
    private deadlineService: DeadlineService,
    private groupDirectoryService: GroupDirectoryService,
    private metricsService: MetricsService,
    private configService: ConfigService,
    @Inject(CLOCK) private clock: Clock,
  ) {
    this.maxRetries = this.configService.get<number>('betting.maxConcurrencyRetries') ?? 3;
  }

  /**
   * Creates or fully overwrites the caller's single prediction for a match in a group.
   * The deadline is re-checked on every attempt, so a retry after a lost race
   * cannot slip past a deadline that passed meanwhile.
   */
  async placePrediction(cmd: PlacePredictionCommand): Promise<PlacedPrediction> {
    try {
      const placed = await this.place(cmd);
      this.metricsService.incrementPredictionsPlaced(placed.created ? 'created' : 'overwritten');
      return placed;
    } catch (error) {
      if (error instanceof BettingError) {
        this.metricsService.incrementPredictionsRejected(error.code);
      }
      throw error;
    }
  }

  async getPrediction(userId: string, matchId: string, groupId: string): Promise<Prediction | null> {
    return this.predictionRepository.findOne({ where: { userId, matchId, groupId } });
  }

  async listUserPredictions(
    userId: string,
    groupId?: string,
    limit: number = PREDICTION_CONSTANTS.DEFAULT_LIST_LIMIT,
  ): Promise<Prediction[]> {
    const take = Math.min(Math.max(limit, 1), PREDICTION_CONSTANTS.MAX_LIST_LIMIT);
    return this.predictionRepository.find({
      where: groupId ? { userId, groupId } : { userId },
      order: { placedAt: 'DESC', id: 'ASC' },
      take,
    });
  }

  async listMatchPredictions(matchId: string): Promise<Prediction[]> {
    return this.predictionRepository.find({
      where: { matchId },
      order: { placedAt: 'ASC', id: 'ASC' },
    });
  }

  /**
   * Totals over a user's predictions; rates and averages count settled predictions only.
   */
  async getUserStats(userId: string, groupId?: string): Promise<UserPredictionStats> {
    const predictions = await this.predictionRepository.find({
      where: groupId ? { userId, groupId } : { userId },
    });

    let pending = 0;
    let voided = 0;
    let exact = 0;
    let winnerOnly = 0;
    let wrong = 0;
    let totalPoints = 0;

    for (const prediction of predictions) {
      if (prediction.settlementState === SettlementState.PENDING) {
        pending++;
        continue;
      }
      if (prediction.settlementState === SettlementState.VOID) {
        voided++;
        continue;
      }

      totalPoints += prediction.points ?? 0;
      if (prediction.scoreRule === 'EXACT_SCORE') exact++;
      else if (prediction.scoreRule === 'CORRECT_WINNER') winnerOnly++;
      else wrong++;
    }

    const settled = exact + winnerOnly + wrong;

    return {
      userId,
      groupId: groupId ?? null,
      totalPredictions: predictions.length,
      pendingPredictions: pending,
      settledPredictions: settled,
      voidPredictions: voided,
      exactScoreCount: exact,
      correctWinnerCount: winnerOnly,
      wrongCount: wrong,
      totalPoints,
      winRate: settled > 0 ? Math.round(((exact + winnerOnly) / settled) * 1000) / 10 : 0,
      averagePoints: settled > 0 ? Math.round((totalPoints / settled) * 100) / 100 : 0,
    };
  }

  /**
   * How the group's members picked a match. Hidden while predictions are still accepted.
   */
  async getMatchDistribution(
    matchId: string,
    groupId: string,
    requesterId: string,
  ): Promise<MatchDistribution> {
    if (!(await this.groupDirectoryService.isMember(requesterId, groupId))) {
      throw new NotGroupMemberError(`User ${requesterId} is not a member of group ${groupId}`, {
        userId: requesterId,
        groupId,
      });
    }

    const evaluation = await this.deadlineService.getLockState(matchId);
    if (evaluation.state === DeadlineState.OPEN) {
      throw new PredictionsOpenError(`Match ${matchId} still accepts predictions`, {
        matchId,
        deadline: evaluation.deadline.toISOString(),
      });
    }

    const predictions = await this.predictionRepository.find({ where: { matchId, groupId } });
    const byWinner: Record<PredictedWinner, number> = {
      [PredictedWinner.HOME]: 0,
      [PredictedWinner.AWAY]: 0,
      [PredictedWinner.DRAW]: 0,
    };

    let total = 0;
    for (const prediction of predictions) {
      if (prediction.settlementState === SettlementState.VOID) continue;
      byWinner[prediction.predictedWinner]++;
      total++;
    }

    return { matchId, groupId, totalPredictions: total, byWinner };
  }

  private async place(cmd: PlacePredictionCommand): Promise<PlacedPrediction> {
    const problem = describeInconsistency({
      winner: cmd.predictedWinner,
      homeScore: cmd.predictedHomeScore,
      awayScore: cmd.predictedAwayScore,
    });
    if (problem) {
      throw new InvalidPredictionError(problem, {
        predictedWinner: cmd.predictedWinner,
        predictedHomeScore: cmd.predictedHomeScore,
        predictedAwayScore: cmd.predictedAwayScore,
      });
    }

    if (!(await this.groupDirectoryService.isMember(cmd.userId, cmd.groupId))) {
      throw new NotGroupMemberError(`User ${cmd.userId} is not a member of group ${cmd.groupId}`, {
        userId: cmd.userId,
        groupId: cmd.groupId,
      });
    }

    const match = await this.deadlineService.getMatch(cmd.matchId);
    if (match.groupId !== cmd.groupId) {
      throw new InvalidPredictionError(`Match ${cmd.matchId} is not played in group ${cmd.groupId}`, {
        matchId: cmd.matchId,
        groupId: cmd.groupId,
      });
    }

    const placed = await withOptimisticRetry<PlacedPrediction>(
      {
        operation: 'placePrediction',
        maxRetries: this.maxRetries,
        logger: this.logger,
        onConflict: () => this.metricsService.incrementConcurrencyConflicts('prediction'),
      },
      async () => {
        await this.deadlineService.assertAcceptingPredictions(cmd.matchId);

        const fields = {
          predictedWinner: cmd.predictedWinner,
          predictedHomeScore: cmd.predictedHomeScore,
          predictedAwayScore: cmd.predictedAwayScore,
          placedAt: this.clock.now(),
          points: null,
          scoreRule: null,
          settlementState: SettlementState.PENDING,
          settledResultKey: null,
          settledAt: null,
        };

        const existing = await this.getPrediction(cmd.userId, cmd.matchId, cmd.groupId);
        if (existing) {
          const changes = { ...fields, version: existing.version + 1 };
          const result = await this.predictionRepository.update(
            { id: existing.id, version: existing.version },
            changes,
          );
          if (!result.affected) {
            throw new ConcurrentModificationError('Prediction was modified concurrently', {
              predictionId: existing.id,
            });
          }
          return { prediction: { ...existing, ...changes }, created: false };
        }

        try {
          const saved = await this.predictionRepository.save(
            this.predictionRepository.create({
              userId: cmd.userId,
              matchId: cmd.matchId,
              groupId: cmd.groupId,
              ...fields,
              version: 0,
            }),
          );
          return { prediction: saved, created: true };
        } catch (error) {
          if (isUniqueViolation(error)) {
            throw new ConcurrentModificationError('Prediction was created concurrently', {
              userId: cmd.userId,
              matchId: cmd.matchId,
              groupId: cmd.groupId,
            });
          }
          throw error;
        }
      },
    );

    return this.confirmPlacement(placed);
  }

  /**
   * The write only counts if the match is still SCHEDULED once it is visible.
   * A cancellation or completion that latched in between may already have
   * scanned the match's predictions, so the write is voided and rejected
   * unless that scan settled it.
   */
  private async confirmPlacement(placed: PlacedPrediction): Promise<PlacedPrediction> {
    const match = await this.deadlineService.getMatch(placed.prediction.matchId);
    if (match.status === MatchStatus.SCHEDULED) {
      return placed;
    }

    const current = await this.withdraw(placed.prediction);
    if (current?.settlementState === SettlementState.SETTLED) {
      return { prediction: current, created: placed.created };
    }

    this.logger.warn(`Prediction ${placed.prediction.id} voided: match ${match.id} became ${match.status}`);
    throw new DeadlinePassedError(`Match ${match.id} no longer accepts predictions`, {
      matchId: match.id,
      state: DeadlineState.DEADLINE_PASSED,
      deadline: match.deadline.toISOString(),
      status: match.status,
    });
  }

  private async withdraw(prediction: Prediction): Promise<Prediction | null> {
    return withOptimisticRetry(
      { operation: 'withdrawPrediction', maxRetries: this.maxRetries, logger: this.logger },
      async (attempt) => {
        const current =
          attempt === 1
            ? prediction
            : await this.predictionRepository.findOne({ where: { id: prediction.id } });
        if (!current || current.settlementState !== SettlementState.PENDING) {
          return current;
        }

        const changes = {
          settlementState: SettlementState.VOID,
          points: 0,
          scoreRule: null,
          settledResultKey: null,
          settledAt: this.clock.now(),
          version: current.version + 1,
        };
        const result = await this.predictionRepository.update(
          { id: current.id, version: current.version },
          changes,
        );
        if (!result.affected) {
          throw new ConcurrentModificationError('Prediction was modified concurrently', {
            predictionId: current.id,
          });
        }
        return { ...current, ...changes };
      },
    );
  }
}
