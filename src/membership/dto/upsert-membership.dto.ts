import { ApiPropertyOptional } from '@nestjs/swagger';
import { IsBoolean, IsDateString, IsOptional } from 'class-validator';

export class UpsertMembershipDto {
  @ApiPropertyOptional({ description: 'Whether the member may place predictions', default: true })
  @IsOptional()
  @IsBoolean()
  active?: boolean;

  @ApiPropertyOptional({
    description: 'When the user registered with the platform (ISO 8601)',
    example: '2026-01-15T09:30:00.000Z',
  })
  @IsOptional()
  @IsDateString()
  registeredAt?: string;
}
