import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { Prediction } from '../prediction/entities/prediction.entity';
import { SettlementState } from '../prediction/types/prediction.types';
import { GroupDirectoryService } from '../membership/group-directory.service';
import { RedisService } from '../redis/redis.service';
import { MetricsService } from '../common/services/metrics.service';
import { KeyedMutex } from '../common/helpers/keyed-mutex';
import {
  LeaderboardArena,
  LeaderboardEntry,
  LEADERBOARD_CONSTANTS,
  SettlementTransition,
} from './types/leaderboard.types';
import {
  applyTransition,
  buildArena,
  cloneArena,
  isLeaderboardArena,
  rankArena,
} from './helpers/leaderboard-arena';

const sleep = (ms: number) => new Promise((resolve) => setTimeout(resolve, ms));

/**
 * Per-group standings. The projection lives in Redis and is maintained
 * incrementally from settlement transitions; a cold or unreadable cache is
 * rebuilt from the SETTLED predictions, which yields the same ranking.
 *
 * Every write of the projection happens under a per-group Redis lock, since
 * the API and the scheduler process both settle matches.
 */
@Injectable()
export class LeaderboardService {
  private readonly logger = new Logger(LeaderboardService.name);
  private readonly cacheTtlSeconds: number;
  private readonly mutex = new KeyedMutex();

  constructor(
    @InjectRepository(Prediction)
    private predictionRepository: Repository<Prediction>,
    private groupDirectoryService: GroupDirectoryService,
    private redisService: RedisService,
    private metricsService: MetricsService,
    private configService: ConfigService,
  ) {
    this.cacheTtlSeconds = this.configService.get<number>('betting.leaderboardCacheTtlSeconds') || 86400;
  }

  async rank(groupId: string, limit?: number): Promise<LeaderboardEntry[]> {
    const arena =
      (await this.readCache(groupId)) ??
      (await this.withGroupLock(
        groupId,
        () => this.loadArena(groupId),
        () => this.computeArena(groupId),
      ));
    const registrationTimes = await this.groupDirectoryService.getRegistrationTimes(groupId);
    const entries = rankArena(arena, registrationTimes);

    if (limit === undefined) {
      return entries;
    }
    const bounded = Math.min(Math.max(limit, 1), LEADERBOARD_CONSTANTS.MAX_LIMIT);
    return entries.slice(0, bounded);
  }

  /**
   * Full recompute; overwrites the cached projection.
   */
  async rebuild(groupId: string, reason: string = 'manual'): Promise<LeaderboardArena> {
    return this.withGroupLock(
      groupId,
      () => this.rebuildUnlocked(groupId, reason),
      () => this.computeArena(groupId),
    );
  }

  /**
   * Folds newly settled predictions into the cached projection. Returns the
   * number of transitions that changed it.
   */
  async applyTransitions(groupId: string, transitions: readonly SettlementTransition[]): Promise<number> {
    if (transitions.length === 0) {
      return 0;
    }

    const apply = async () => {
      const cached = await this.readCache(groupId);
      if (!cached) {
        // The rebuild reads the already persisted settlements
        await this.rebuildUnlocked(groupId, 'cold_cache');
        return transitions.length;
      }

      let changed = 0;
      for (const transition of transitions) {
        if (applyTransition(cached, transition)) changed++;
      }

      if (changed > 0) {
        await this.redisService.setJson(this.cacheKey(groupId), this.cacheTtlSeconds, cached);
      }
      this.logger.debug(`Applied ${changed}/${transitions.length} transitions to group ${groupId}`);
      return changed;
    };

    return this.withGroupLock(groupId, apply, async () => {
      // The next read rebuilds from the persisted settlements
      await this.redisService.del(this.cacheKey(groupId));
      return 0;
    });
  }

  /**
   * Runs `work` while holding the group's lock. Falls back to `whenBusy` if the
   * lock cannot be taken within LOCK_WAIT_MS.
   */
  private async withGroupLock<T>(
    groupId: string,
    work: () => Promise<T>,
    whenBusy: () => Promise<T>,
  ): Promise<T> {
    return this.mutex.runExclusive(groupId, async () => {
      const lockKey = `${LEADERBOARD_CONSTANTS.LOCK_KEY_PREFIX}${groupId}`;
      const token = await this.acquireGroupLock(lockKey);
      if (!token) {
        this.logger.warn(`Leaderboard lock of group ${groupId} is busy, skipping cache write`);
        return whenBusy();
      }

      try {
        return await work();
      } finally {
        await this.redisService.releaseLock(lockKey, token);
      }
    });
  }

  private async acquireGroupLock(lockKey: string): Promise<string | null> {
    const giveUpAt = Date.now() + LEADERBOARD_CONSTANTS.LOCK_WAIT_MS;

    for (;;) {
      const token = await this.redisService.acquireLock(lockKey, LEADERBOARD_CONSTANTS.LOCK_TTL_MS);
      if (token || Date.now() >= giveUpAt) {
        return token;
      }
      await sleep(LEADERBOARD_CONSTANTS.LOCK_RETRY_MS);
    }
  }

  private async loadArena(groupId: string): Promise<LeaderboardArena> {
    const cached = await this.readCache(groupId);
    return cached ?? this.rebuildUnlocked(groupId, 'cold_cache');
  }

  private async rebuildUnlocked(groupId: string, reason: string): Promise<LeaderboardArena> {
    const arena = await this.computeArena(groupId);

    await this.redisService.setJson(this.cacheKey(groupId), this.cacheTtlSeconds, arena);
    this.metricsService.incrementLeaderboardRebuilds(reason);
    this.logger.log(`Rebuilt leaderboard of group ${groupId}`);

    return arena;
  }

  private async computeArena(groupId: string): Promise<LeaderboardArena> {
    const settled = await this.predictionRepository.find({
      where: { groupId, settlementState: SettlementState.SETTLED },
    });
    return buildArena(groupId, settled);
  }

  private async readCache(groupId: string): Promise<LeaderboardArena | null> {
    const value = await this.redisService.getJson(this.cacheKey(groupId));
    if (value === null) {
      return null;
    }
    if (!isLeaderboardArena(value, groupId)) {
      this.logger.warn(`Cached leaderboard of group ${groupId} has an unexpected shape, rebuilding`);
      return null;
    }
    return cloneArena(value);
  }

  private cacheKey(groupId: string): string {
    return `${LEADERBOARD_CONSTANTS.CACHE_KEY_PREFIX}${groupId}`;
  }
}
