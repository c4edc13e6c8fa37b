import { Body, Controller, Get, HttpCode, HttpStatus, Param, Post, Query, UseGuards } from '@nestjs/common';
import { ApiHeader, ApiOperation, ApiQuery, ApiResponse, ApiTags } from '@nestjs/swagger';
import { PredictionService } from './prediction.service';
import { PlacePredictionDto } from './dto/place-prediction.dto';
import { ListPredictionsQueryDto } from './dto/list-predictions-query.dto';
import { toPredictionResponse } from './mappers/prediction.mapper';
import { ActorGuard } from '../common/guards/actor.guard';
import { AdminGuard } from '../common/guards/admin.guard';
import { RateLimitingGuard } from '../common/guards/rate-limiting.guard';
import { CurrentActor } from '../common/decorators/current-actor.decorator';
import { Actor } from '../common/types/actor.types';

@Controller()
@ApiTags('Prediction')
@ApiHeader({ name: 'x-actor-id', required: true })
@UseGuards(ActorGuard, RateLimitingGuard)
export class PredictionController {
  constructor(private readonly predictionService: PredictionService) {}

  @Post('predictions')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Place or overwrite a prediction for a match' })
  @ApiResponse({ status: 200, description: 'Prediction stored' })
  @ApiResponse({ status: 400, description: 'Winner and scores disagree' })
  @ApiResponse({ status: 403, description: 'Not a member of the group' })
  @ApiResponse({ status: 409, description: 'Match no longer accepts predictions' })
  async placePrediction(@Body() dto: PlacePredictionDto, @CurrentActor() actor: Actor) {
    const { prediction, created } = await this.predictionService.placePrediction({
      userId: actor.id,
      matchId: dto.matchId,
      groupId: dto.groupId,
      predictedWinner: dto.predictedWinner,
      predictedHomeScore: dto.predictedHomeScore,
      predictedAwayScore: dto.predictedAwayScore,
    });

    return {
      message: created ? 'PREDICTION_CREATED' : 'PREDICTION_UPDATED',
      prediction: toPredictionResponse(prediction),
    };
  }

  @Get('predictions/me')
  @ApiOperation({ summary: 'Predictions of the current user, newest first' })
  @ApiResponse({ status: 200, description: 'Returns predictions' })
  async listMine(@Query() query: ListPredictionsQueryDto, @CurrentActor() actor: Actor) {
    const predictions = await this.predictionService.listUserPredictions(
      actor.id,
      query.groupId,
      query.limit,
    );
    return { predictions: predictions.map(toPredictionResponse) };
  }

  @Get('predictions/stats')
  @ApiOperation({ summary: 'Prediction statistics of the current user' })
  @ApiQuery({ name: 'groupId', required: false })
  @ApiResponse({ status: 200, description: 'Returns statistics' })
  async getStats(@CurrentActor() actor: Actor, @Query('groupId') groupId?: string) {
    return this.predictionService.getUserStats(actor.id, groupId);
  }

  @Get('matches/:id/predictions')
  @UseGuards(AdminGuard)
  @ApiHeader({ name: 'x-actor-role', required: true, description: 'Must be admin' })
  @ApiOperation({ summary: 'Every prediction placed on a match, in placement order' })
  @ApiResponse({ status: 200, description: 'Returns predictions' })
  @ApiResponse({ status: 403, description: 'Admin role required' })
  async listForMatch(@Param('id') matchId: string) {
    const predictions = await this.predictionService.listMatchPredictions(matchId);
    return { predictions: predictions.map(toPredictionResponse) };
  }

  @Get('matches/:id/predictions/distribution')
  @ApiOperation({ summary: 'How the group picked a match, once predictions are closed' })
  @ApiQuery({ name: 'groupId', required: true })
  @ApiResponse({ status: 200, description: 'Returns counts per predicted winner' })
  @ApiResponse({ status: 409, description: 'Match still accepts predictions' })
  async getDistribution(
    @Param('id') matchId: string,
    @Query('groupId') groupId: string,
    @CurrentActor() actor: Actor,
  ) {
    return this.predictionService.getMatchDistribution(matchId, groupId, actor.id);
  }
}
