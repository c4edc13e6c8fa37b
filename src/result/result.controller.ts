import { Body, Controller, Get, HttpCode, HttpStatus, Param, Post, Put, UseGuards } from '@nestjs/common';
import { ApiHeader, ApiOperation, ApiResponse, ApiTags } from '@nestjs/swagger';
import { ResultService } from './result.service';
import { SettlementService } from './settlement.service';
import { EnterResultDto } from './dto/enter-result.dto';
import { toResultResponse } from './mappers/result.mapper';
import { ActorGuard } from '../common/guards/actor.guard';
import { AdminGuard } from '../common/guards/admin.guard';
import { CurrentActor } from '../common/decorators/current-actor.decorator';
import { Actor } from '../common/types/actor.types';

@Controller('matches/:id')
@ApiTags('Results')
@ApiHeader({ name: 'x-actor-id', required: true })
@ApiHeader({ name: 'x-actor-role', required: false, description: 'admin for result entry' })
export class ResultController {
  constructor(
    private readonly resultService: ResultService,
    private readonly settlementService: SettlementService,
  ) {}

  @Get('result')
  @UseGuards(ActorGuard)
  @ApiOperation({ summary: 'Current result of a match' })
  @ApiResponse({ status: 200, description: 'Returns the result, or state NONE' })
  async getResult(@Param('id') matchId: string) {
    const result = await this.resultService.getResult(matchId);
    return result ? toResultResponse(result) : { matchId, state: 'NONE' };
  }

  @Put('result/provisional')
  @UseGuards(ActorGuard, AdminGuard)
  @ApiOperation({ summary: 'Enter or correct a provisional result (Admin only)' })
  @ApiResponse({ status: 200, description: 'Provisional result stored' })
  @ApiResponse({ status: 409, description: 'Result already final or match cancelled' })
  async recordProvisional(
    @Param('id') matchId: string,
    @Body() dto: EnterResultDto,
    @CurrentActor() actor: Actor,
  ) {
    const result = await this.resultService.recordProvisional(
      matchId,
      dto.homeScore,
      dto.awayScore,
      actor.id,
    );
    return toResultResponse(result);
  }

  @Post('result/finalize')
  @UseGuards(ActorGuard, AdminGuard)
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Finalize the result and settle predictions (Admin only)' })
  @ApiResponse({ status: 200, description: 'Result final, settlement summary returned' })
  @ApiResponse({ status: 409, description: 'Result already final or match cancelled' })
  async finalize(
    @Param('id') matchId: string,
    @Body() dto: EnterResultDto,
    @CurrentActor() actor: Actor,
  ) {
    const { result, settlement } = await this.resultService.finalize(
      matchId,
      dto.homeScore,
      dto.awayScore,
      actor.id,
    );
    return { result: toResultResponse(result), settlement };
  }

  @Post('cancel')
  @UseGuards(ActorGuard, AdminGuard)
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Cancel a match and void its predictions (Admin only)' })
  @ApiResponse({ status: 200, description: 'Match cancelled' })
  @ApiResponse({ status: 409, description: 'Result already final' })
  async cancel(@Param('id') matchId: string, @CurrentActor() actor: Actor) {
    return this.resultService.cancelMatch(matchId, actor.id);
  }

  @Post('settle')
  @UseGuards(ActorGuard, AdminGuard)
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Re-run settlement of a finalized match (Admin only)' })
  @ApiResponse({ status: 200, description: 'Settlement summary' })
  @ApiResponse({ status: 409, description: 'Result not final' })
  async settle(@Param('id') matchId: string) {
    return this.settlementService.settleMatch(matchId);
  }
}
