/**
 * Shared helper functions for predictions and results
 */
import { PredictedWinner, Scoreline } from '../types/scoring.types';
import { PREDICTION_CONSTANTS } from '../types/prediction.types';

/**
 * Winner implied by a scoreline.
 */
export function deriveWinner(homeScore: number, awayScore: number): PredictedWinner {
  if (homeScore > awayScore) return PredictedWinner.HOME;
  if (homeScore < awayScore) return PredictedWinner.AWAY;
  return PredictedWinner.DRAW;
}

export function isValidScore(score: number): boolean {
  return Number.isInteger(score) && score >= 0 && score <= PREDICTION_CONSTANTS.MAX_SCORE;
}

/**
 * Reason the pick is unusable, or null when the winner agrees with the scores.
 */
export function describeInconsistency(pick: Scoreline): string | null {
  if (!isValidScore(pick.homeScore) || !isValidScore(pick.awayScore)) {
    return `Scores must be integers between 0 and ${PREDICTION_CONSTANTS.MAX_SCORE}`;
  }

  const implied = deriveWinner(pick.homeScore, pick.awayScore);
  if (implied !== pick.winner) {
    return `Predicted winner ${pick.winner} contradicts score ${formatScoreline(pick)} (implies ${implied})`;
  }

  return null;
}

export function formatScoreline(line: Scoreline): string {
  return `${line.winner} ${line.homeScore}-${line.awayScore}`;
}

export function toSettlementKey(resultId: string, resultVersion: number): string {
  return `${resultId}:v${resultVersion}`;
}
