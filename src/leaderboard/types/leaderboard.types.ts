import { ScoreRule } from '../../prediction/types/scoring.types';

/** Points a single settled prediction contributes to its user's standing. */
export interface Contribution {
  userId: string;
  settlementKey: string;
  points: number;
  rule: ScoreRule;
}

export interface UserTotals {
  userId: string;
  totalPoints: number;
  exactScoreCount: number;
  correctWinnerCount: number;
  settledCount: number;
}

/**
 * Cached projection of a group's standings. `contributions` is keyed by
 * prediction id and makes re-applying a settlement a no-op.
 */
export interface LeaderboardArena {
  groupId: string;
  contributions: Record<string, Contribution>;
  totals: Record<string, UserTotals>;
}

export interface SettlementTransition {
  predictionId: string;
  userId: string;
  settlementKey: string;
  points: number;
  rule: ScoreRule;
}

export interface LeaderboardEntry {
  rank: number;
  userId: string;
  totalPoints: number;
  exactScoreCount: number;
  correctWinnerCount: number;
  settledCount: number;
  registeredAt: Date | null;
}

export type UnrankedEntry = Omit<LeaderboardEntry, 'rank'>;

export const LEADERBOARD_CONSTANTS = {
  CACHE_KEY_PREFIX: 'leaderboard:arena:',
  LOCK_KEY_PREFIX: 'leaderboard:lock:',
  LOCK_TTL_MS: 5000,
  LOCK_RETRY_MS: 20,
  LOCK_WAIT_MS: 10000,
  DEFAULT_LIMIT: 100,
  MAX_LIMIT: 1000,
} as const;
