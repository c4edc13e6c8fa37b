import { Body, Controller, Get, Param, Put, UseGuards } from '@nestjs/common';
import { ApiHeader, ApiOperation, ApiResponse, ApiTags } from '@nestjs/swagger';
import { DeadlineService } from './deadline.service';
import { UpsertMatchDto } from './dto/upsert-match.dto';
import { SetDeadlineDto } from './dto/set-deadline.dto';
import { toLockStateResponse, toMatchResponse } from './mappers/match.mapper';
import { ActorGuard } from '../common/guards/actor.guard';
import { AdminGuard } from '../common/guards/admin.guard';
import { RateLimitingGuard } from '../common/guards/rate-limiting.guard';
import { CurrentActor } from '../common/decorators/current-actor.decorator';
import { Actor } from '../common/types/actor.types';

@Controller('matches')
@ApiTags('Matches')
@ApiHeader({ name: 'x-actor-id', required: true })
@ApiHeader({ name: 'x-actor-role', required: false })
export class MatchController {
  constructor(private readonly deadlineService: DeadlineService) {}

  @Put(':id')
  @UseGuards(ActorGuard, AdminGuard)
  @ApiOperation({ summary: 'Create or reschedule a match from the schedule feed (Admin only)' })
  @ApiResponse({ status: 200, description: 'Match stored' })
  @ApiResponse({ status: 409, description: 'Latched deadline would not precede the new start' })
  async upsertMatch(@Param('id') id: string, @Body() dto: UpsertMatchDto) {
    const match = await this.deadlineService.upsertMatch({
      id,
      groupId: dto.groupId,
      competitionId: dto.competitionId,
      scheduledStart: new Date(dto.scheduledStart),
      homeSide: dto.homeSide,
      awaySide: dto.awaySide,
    });
    return toMatchResponse(match);
  }

  @Get(':id/lock-state')
  @UseGuards(ActorGuard, RateLimitingGuard)
  @ApiOperation({ summary: 'Whether the match still accepts predictions' })
  @ApiResponse({ status: 200, description: 'Returns OPEN, NEXT_LOCKED or DEADLINE_PASSED' })
  @ApiResponse({ status: 404, description: 'Match not found' })
  async getLockState(@Param('id') id: string) {
    const evaluation = await this.deadlineService.getLockState(id);
    return toLockStateResponse(id, evaluation);
  }

  @Put(':id/deadline')
  @UseGuards(ActorGuard, AdminGuard)
  @ApiOperation({ summary: 'Override the prediction deadline (Admin only)' })
  @ApiResponse({ status: 200, description: 'Deadline changed' })
  @ApiResponse({ status: 400, description: 'Deadline not between now and kick-off' })
  @ApiResponse({ status: 409, description: 'Match is locked or its deadline passed' })
  async setDeadline(
    @Param('id') id: string,
    @Body() dto: SetDeadlineDto,
    @CurrentActor() actor: Actor,
  ) {
    const match = await this.deadlineService.setDeadline(id, new Date(dto.deadline), actor.id);
    return toMatchResponse(match);
  }
}
