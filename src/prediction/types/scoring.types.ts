/**
 * Type definitions for the scoring system
 */

export enum PredictedWinner {
  HOME = 'HOME',
  AWAY = 'AWAY',
  DRAW = 'DRAW',
}

export type ScoreRule = 'EXACT_SCORE' | 'CORRECT_WINNER' | 'MISS';

export interface ScoringPoints {
  exactScore: number;
  correctWinner: number;
  miss: number;
}

export const SCORING_POINTS = Symbol('SCORING_POINTS');

/** A pick or an outcome: a winner together with the scoreline that implies it. */
export interface Scoreline {
  winner: PredictedWinner;
  homeScore: number;
  awayScore: number;
}

export interface ScoreResult {
  score: number;
  rule: ScoreRule;
  details: ScoreDetails;
}

export interface ScoreDetails {
  description: string;
  predicted: string;
  actual: string;
}

export const SCORING_CONSTANTS = {
  DEFAULT_POINTS: {
    exactScore: 3,
    correctWinner: 1,
    miss: 0,
  },
} as const;
