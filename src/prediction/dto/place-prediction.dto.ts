import { ApiProperty } from '@nestjs/swagger';
import { IsEnum, IsInt, IsNotEmpty, IsString, Max, MaxLength, Min } from 'class-validator';
import { PredictedWinner } from '../types/scoring.types';
import { PREDICTION_CONSTANTS } from '../types/prediction.types';

export class PlacePredictionDto {
  @ApiProperty({ example: 'match-1' })
  @IsString()
  @IsNotEmpty()
  @MaxLength(64)
  matchId!: string;

  @ApiProperty({ example: 'group-1' })
  @IsString()
  @IsNotEmpty()
  @MaxLength(64)
  groupId!: string;

  @ApiProperty({ enum: PredictedWinner, example: PredictedWinner.HOME })
  @IsEnum(PredictedWinner)
  predictedWinner!: PredictedWinner;

  @ApiProperty({ example: 2, minimum: 0 })
  @IsInt()
  @Min(0)
  @Max(PREDICTION_CONSTANTS.MAX_SCORE)
  predictedHomeScore!: number;

  @ApiProperty({ example: 1, minimum: 0 })
  @IsInt()
  @Min(0)
  @Max(PREDICTION_CONSTANTS.MAX_SCORE)
  predictedAwayScore!: number;
}
