import { PredictedWinner } from './scoring.types';

export enum SettlementState {
  PENDING = 'PENDING',
  SETTLED = 'SETTLED',
  VOID = 'VOID',
}

export interface PlacePredictionCommand {
  userId: string;
  matchId: string;
  groupId: string;
  predictedWinner: PredictedWinner;
  predictedHomeScore: number;
  predictedAwayScore: number;
}

export interface UserPredictionStats {
  userId: string;
  groupId: string | null;
  totalPredictions: number;
  pendingPredictions: number;
  settledPredictions: number;
  voidPredictions: number;
  exactScoreCount: number;
  correctWinnerCount: number;
  wrongCount: number;
  totalPoints: number;
  /** Percentage of settled predictions that earned points, one decimal. */
  winRate: number;
  averagePoints: number;
}

export type WinnerDistribution = Record<PredictedWinner, number>;

export interface MatchDistribution {
  matchId: string;
  groupId: string;
  totalPredictions: number;
  byWinner: WinnerDistribution;
}

export const PREDICTION_CONSTANTS = {
  DEFAULT_LIST_LIMIT: 50,
  MAX_LIST_LIMIT: 200,
  MAX_SCORE: 99,
} as const;
