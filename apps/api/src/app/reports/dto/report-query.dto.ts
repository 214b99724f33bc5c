import { ApiPropertyOptional } from '@nestjs/swagger';
import { ReportGranularity, ReportView } from '@attendance/shared';
import { Transform } from 'class-transformer';
import { IsDateString, IsEnum, IsIn, IsOptional, IsUUID } from 'class-validator';

function toList({ value }: { value: unknown }): unknown {
  if (value === undefined || value === null || value === '') return undefined;
  const items = Array.isArray(value) ? value : [value];
  return items
    .flatMap((item) => String(item).split(','))
    .map((item) => item.trim())
    .filter(Boolean);
}

export class ReportQueryDto {
  @ApiPropertyOptional({ description: 'Inclusive; date-only values mean UTC midnight' })
  @IsOptional()
  @IsDateString()
  from?: string;

  @ApiPropertyOptional({ description: 'Exclusive; date-only values mean UTC midnight' })
  @IsOptional()
  @IsDateString()
  to?: string;

  @ApiPropertyOptional({ enum: ReportGranularity })
  @IsOptional()
  @IsEnum(ReportGranularity)
  granularity?: ReportGranularity;

  @ApiPropertyOptional({ description: 'Comma-separated course ids' })
  @IsOptional()
  @Transform(toList)
  @IsUUID('all', { each: true })
  courseIds?: string[];
}

export class ReportExportQueryDto extends ReportQueryDto {
  @ApiPropertyOptional({ enum: ReportView })
  @IsOptional()
  @IsEnum(ReportView)
  view?: ReportView;

  @ApiPropertyOptional({ enum: ['csv', 'xlsx'] })
  @IsOptional()
  @IsIn(['csv', 'xlsx'])
  format?: 'csv' | 'xlsx';
}
