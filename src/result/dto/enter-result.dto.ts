import { ApiProperty } from '@nestjs/swagger';
import { IsInt, Max, Min } from 'class-validator';
import { PREDICTION_CONSTANTS } from '../../prediction/types/prediction.types';

export class EnterResultDto {
  @ApiProperty({ example: 2, minimum: 0 })
  @IsInt()
  @Min(0)
  @Max(PREDICTION_CONSTANTS.MAX_SCORE)
  homeScore!: number;

  @ApiProperty({ example: 1, minimum: 0 })
  @IsInt()
  @Min(0)
  @Max(PREDICTION_CONSTANTS.MAX_SCORE)
  awayScore!: number;
}
