import { Type } from 'class-transformer';
import {
  ArrayMaxSize,
  IsArray,
  IsOptional,
  IsString,
  ValidateNested,
} from 'class-validator';

// Fields stay optional: incomplete rows are skipped by the import, not rejected here.
export class BulkImportRowDto {
  @IsOptional()
  @IsString()
  course_code?: string;

  @IsOptional()
  @IsString()
  course_title?: string;

  @IsOptional()
  @IsString()
  instructor_name?: string;

  @IsOptional()
  @IsString()
  instructor_email?: string;
}

export class BulkImportDto {
  @IsArray()
  @ArrayMaxSize(5000)
  @ValidateNested({ each: true })
  @Type(() => BulkImportRowDto)
  rows!: BulkImportRowDto[];
}
