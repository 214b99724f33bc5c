import { ApiPropertyOptional } from '@nestjs/swagger';
import { Type } from 'class-transformer';
import { IsInt, IsOptional, Min } from 'class-validator';

export class ExtendSessionDto {
  @ApiPropertyOptional({ description: 'Defaults to SESSION_EXTEND_MINUTES' })
  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(1)
  minutes?: number;
}
