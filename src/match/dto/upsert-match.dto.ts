import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { IsDateString, IsNotEmpty, IsOptional, IsString, MaxLength } from 'class-validator';

export class UpsertMatchDto {
  @ApiProperty({ description: 'Group the match is played in', example: 'group-1' })
  @IsString()
  @IsNotEmpty()
  @MaxLength(64)
  groupId!: string;

  @ApiProperty({ description: 'Competition the match belongs to', example: 'spring-cup' })
  @IsString()
  @IsNotEmpty()
  @MaxLength(64)
  competitionId!: string;

  @ApiProperty({ description: 'Kick-off time (ISO 8601)', example: '2026-11-01T18:00:00.000Z' })
  @IsDateString()
  scheduledStart!: string;

  @ApiPropertyOptional({ example: 'Harbour FC' })
  @IsOptional()
  @IsString()
  homeSide?: string;

  @ApiPropertyOptional({ example: 'Valley United' })
  @IsOptional()
  @IsString()
  awaySide?: string;
}
