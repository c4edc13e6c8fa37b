import { Controller, Get, HttpCode, HttpStatus, Param, Post, Query, UseGuards } from '@nestjs/common';
import { ApiHeader, ApiOperation, ApiQuery, ApiResponse, ApiTags } from '@nestjs/swagger';
import { LeaderboardService } from './leaderboard.service';
import { LEADERBOARD_CONSTANTS } from './types/leaderboard.types';
import { ActorGuard } from '../common/guards/actor.guard';
import { AdminGuard } from '../common/guards/admin.guard';
import { RateLimitingGuard } from '../common/guards/rate-limiting.guard';

@Controller('groups/:groupId/leaderboard')
@ApiTags('Leaderboard')
@ApiHeader({ name: 'x-actor-id', required: true })
export class LeaderboardController {
  constructor(private readonly leaderboardService: LeaderboardService) {}

  @Get()
  @UseGuards(ActorGuard, RateLimitingGuard)
  @ApiOperation({ summary: 'Group standings' })
  @ApiQuery({ name: 'limit', required: false, type: Number, description: 'Number of results' })
  @ApiResponse({ status: 200, description: 'Returns leaderboard' })
  async getLeaderboard(@Param('groupId') groupId: string, @Query('limit') limit?: string) {
    const parsed = limit ? parseInt(limit, 10) : LEADERBOARD_CONSTANTS.DEFAULT_LIMIT;
    const entries = await this.leaderboardService.rank(
      groupId,
      Number.isNaN(parsed) ? LEADERBOARD_CONSTANTS.DEFAULT_LIMIT : parsed,
    );

    return { groupId, leaderboard: entries };
  }

  @Post('rebuild')
  @UseGuards(ActorGuard, AdminGuard)
  @HttpCode(HttpStatus.OK)
  @ApiHeader({ name: 'x-actor-role', required: true, description: 'Must be admin' })
  @ApiOperation({ summary: 'Recompute the group standings from settled predictions (Admin only)' })
  @ApiResponse({ status: 200, description: 'Leaderboard rebuilt' })
  async rebuild(@Param('groupId') groupId: string) {
    const arena = await this.leaderboardService.rebuild(groupId);
    return {
      message: 'LEADERBOARD_REBUILT',
      groupId,
      rankedUsers: Object.keys(arena.totals).length,
      settledPredictions: Object.keys(arena.contributions).length,
    };
  }
}
