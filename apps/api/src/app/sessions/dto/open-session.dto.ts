import { ApiPropertyOptional } from '@nestjs/swagger';
import { Type } from 'class-transformer';
import { IsInt, IsOptional } from 'class-validator';

// Bounds are checked by the service against the configured limits.
export class OpenSessionDto {
  @ApiPropertyOptional({ description: 'Defaults to SESSION_DEFAULT_MINUTES' })
  @IsOptional()
  @Type(() => Number)
  @IsInt()
  durationMinutes?: number;
}
