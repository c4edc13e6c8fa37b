import {
  Contribution,
  LeaderboardArena,
  LeaderboardEntry,
  SettlementTransition,
  UnrankedEntry,
  UserTotals,
} from '../types/leaderboard.types';
import { ScoreRule } from '../../prediction/types/scoring.types';

export interface SettledPredictionRow {
  id: string;
  userId: string;
  points: number | null;
  scoreRule: ScoreRule | null;
  settledResultKey: string | null;
}

/**
 * Prototype-less record: user and prediction ids are caller-controlled and
 * must never resolve to inherited properties such as `__proto__`.
 */
function dictionary<V>(entries: Record<string, V> = {}): Record<string, V> {
  const target: Record<string, V> = Object.create(null);
  for (const [key, value] of Object.entries(entries)) {
    target[key] = value;
  }
  return target;
}

export function emptyArena(groupId: string): LeaderboardArena {
  return { groupId, contributions: dictionary(), totals: dictionary() };
}

/**
 * Copy of an arena read back from the cache, with prototype-less records.
 */
export function cloneArena(arena: LeaderboardArena): LeaderboardArena {
  return {
    groupId: arena.groupId,
    contributions: dictionary(arena.contributions),
    totals: dictionary(arena.totals),
  };
}

/**
 * Full recompute from the group's SETTLED predictions.
 */
export function buildArena(groupId: string, rows: readonly SettledPredictionRow[]): LeaderboardArena {
  const arena = emptyArena(groupId);

  for (const row of rows) {
    if (row.points === null || row.scoreRule === null || row.settledResultKey === null) continue;
    applyTransition(arena, {
      predictionId: row.id,
      userId: row.userId,
      settlementKey: row.settledResultKey,
      points: row.points,
      rule: row.scoreRule,
    });
  }

  return arena;
}

/**
 * Applies one settlement to the arena in place. Returns false when the same
 * settlement was already applied. A prediction re-settled under a different
 * key replaces its earlier contribution.
 */
export function applyTransition(arena: LeaderboardArena, transition: SettlementTransition): boolean {
  const previous = arena.contributions[transition.predictionId];
  if (previous && previous.settlementKey === transition.settlementKey) {
    return false;
  }

  if (previous) {
    adjustTotals(arena, previous, -1);
  }

  const contribution: Contribution = {
    userId: transition.userId,
    settlementKey: transition.settlementKey,
    points: transition.points,
    rule: transition.rule,
  };
  arena.contributions[transition.predictionId] = contribution;
  adjustTotals(arena, contribution, 1);

  return true;
}

function adjustTotals(arena: LeaderboardArena, contribution: Contribution, sign: 1 | -1): void {
  const totals: UserTotals = arena.totals[contribution.userId] ?? {
    userId: contribution.userId,
    totalPoints: 0,
    exactScoreCount: 0,
    correctWinnerCount: 0,
    settledCount: 0,
  };

  totals.totalPoints += sign * contribution.points;
  totals.settledCount += sign;
  if (contribution.rule === 'EXACT_SCORE') totals.exactScoreCount += sign;
  if (contribution.rule === 'CORRECT_WINNER') totals.correctWinnerCount += sign;

  if (totals.settledCount === 0) {
    delete arena.totals[contribution.userId];
  } else {
    arena.totals[contribution.userId] = totals;
  }
}

/**
 * Points desc, exact scores desc, winner-only hits desc, earlier registration
 * first (unknown last), then user id.
 */
export function compareEntries(a: UnrankedEntry, b: UnrankedEntry): number {
  if (a.totalPoints !== b.totalPoints) return b.totalPoints - a.totalPoints;
  if (a.exactScoreCount !== b.exactScoreCount) return b.exactScoreCount - a.exactScoreCount;
  if (a.correctWinnerCount !== b.correctWinnerCount) {
    return b.correctWinnerCount - a.correctWinnerCount;
  }

  const aTime = a.registeredAt?.getTime() ?? null;
  const bTime = b.registeredAt?.getTime() ?? null;
  if (aTime !== bTime) {
    if (aTime === null) return 1;
    if (bTime === null) return -1;
    return aTime - bTime;
  }

  if (a.userId < b.userId) return -1;
  if (a.userId > b.userId) return 1;
  return 0;
}

export function rankArena(
  arena: LeaderboardArena,
  registrationTimes: ReadonlyMap<string, Date>,
): LeaderboardEntry[] {
  const entries: UnrankedEntry[] = Object.values(arena.totals).map((totals) => ({
    ...totals,
    registeredAt: registrationTimes.get(totals.userId) ?? null,
  }));

  return entries.sort(compareEntries).map((entry, index) => ({ rank: index + 1, ...entry }));
}

const SCORE_RULES: readonly string[] = ['EXACT_SCORE', 'CORRECT_WINNER', 'MISS'];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isContribution(value: unknown): value is Contribution {
  return (
    isRecord(value) &&
    typeof value.userId === 'string' &&
    typeof value.settlementKey === 'string' &&
    typeof value.points === 'number' &&
    typeof value.rule === 'string' &&
    SCORE_RULES.includes(value.rule)
  );
}

function isUserTotals(value: unknown): value is UserTotals {
  return (
    isRecord(value) &&
    typeof value.userId === 'string' &&
    typeof value.totalPoints === 'number' &&
    typeof value.exactScoreCount === 'number' &&
    typeof value.correctWinnerCount === 'number' &&
    typeof value.settledCount === 'number'
  );
}

/**
 * Shape check for an arena read back from the cache.
 */
export function isLeaderboardArena(value: unknown, groupId: string): value is LeaderboardArena {
  if (!isRecord(value) || value.groupId !== groupId) return false;

  const { contributions, totals } = value;
  return (
    isRecord(contributions) &&
    isRecord(totals) &&
    Object.values(contributions).every(isContribution) &&
    Object.values(totals).every(isUserTotals)
  );
}
