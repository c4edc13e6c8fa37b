import { Inject, Injectable } from '@nestjs/common';
import {
  PredictedWinner,
  ScoreResult,
  Scoreline,
  ScoringPoints,
  SCORING_POINTS,
} from './types/scoring.types';
import { deriveWinner, formatScoreline, isValidScore } from './helpers/prediction.helper';
import { ScoringInvariantError } from '../common/errors/betting.errors';

/**
 * Scoring Service
 *
 * Pure function of a pick and a final outcome; reads no clock and no storage.
 *
 * Scoring Rules (Priority Order):
 * 1. exactScore: winner and both scores equal (replaces, never adds to, the winner points)
 * 2. correctWinner: same winner, different score
 * 3. miss: otherwise
 */
@Injectable()
export class ScoringService {
  constructor(@Inject(SCORING_POINTS) private points: ScoringPoints) {}

  scorePrediction(pick: Scoreline, outcome: Scoreline): ScoreResult {
    this.assertConsistentOutcome(outcome);

    const predicted = formatScoreline(pick);
    const actual = formatScoreline(outcome);

    if (pick.winner !== outcome.winner) {
      return {
        score: this.points.miss,
        rule: 'MISS',
        details: { description: 'Wrong winner', predicted, actual },
      };
    }

    if (pick.homeScore === outcome.homeScore && pick.awayScore === outcome.awayScore) {
      return {
        score: this.points.exactScore,
        rule: 'EXACT_SCORE',
        details: { description: 'Exact score', predicted, actual },
      };
    }

    return {
      score: this.points.correctWinner,
      rule: 'CORRECT_WINNER',
      details: { description: 'Correct winner, different score', predicted, actual },
    };
  }

  getPoints(): Readonly<ScoringPoints> {
    return this.points;
  }

  /**
   * A stored outcome whose winner disagrees with its scores is a corrupt result record.
   */
  private assertConsistentOutcome(outcome: Scoreline): void {
    const winners: readonly string[] = Object.values(PredictedWinner);
    const scoresValid = isValidScore(outcome.homeScore) && isValidScore(outcome.awayScore);

    if (!winners.includes(outcome.winner) || !scoresValid) {
      throw new ScoringInvariantError('Result record has no usable winner or scores', {
        winner: String(outcome.winner),
        homeScore: outcome.homeScore,
        awayScore: outcome.awayScore,
      });
    }

    const implied = deriveWinner(outcome.homeScore, outcome.awayScore);
    if (implied !== outcome.winner) {
      throw new ScoringInvariantError('Result winner contradicts its scores', {
        winner: outcome.winner,
        implied,
        homeScore: outcome.homeScore,
        awayScore: outcome.awayScore,
      });
    }
  }
}
