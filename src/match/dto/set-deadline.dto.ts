import { ApiProperty } from '@nestjs/swagger';
import { IsDateString } from 'class-validator';

export class SetDeadlineDto {
  @ApiProperty({
    description: 'New prediction deadline; must be in the future and before kick-off',
    example: '2026-11-01T17:30:00.000Z',
  })
  @IsDateString()
  deadline!: string;
}
