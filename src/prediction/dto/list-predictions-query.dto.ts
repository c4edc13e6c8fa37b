import { ApiPropertyOptional } from '@nestjs/swagger';
import { Type } from 'class-transformer';
import { IsInt, IsOptional, IsString, Max, Min } from 'class-validator';
import { PREDICTION_CONSTANTS } from '../types/prediction.types';

export class ListPredictionsQueryDto {
  @ApiPropertyOptional({ description: 'Restrict to one group' })
  @IsOptional()
  @IsString()
  groupId?: string;

  @ApiPropertyOptional({ default: PREDICTION_CONSTANTS.DEFAULT_LIST_LIMIT })
  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(1)
  @Max(PREDICTION_CONSTANTS.MAX_LIST_LIMIT)
  limit?: number;
}
