import { ApiPropertyOptional } from '@nestjs/swagger';
import { IsNotEmpty, IsOptional, IsString, MaxLength } from 'class-validator';

// Name and email are checked by the ledger so rejections carry its messages.
export class CheckInDto {
  @IsString()
  @IsNotEmpty()
  @MaxLength(64)
  session!: string;

  @ApiPropertyOptional()
  @IsOptional()
  @IsString()
  @MaxLength(200)
  name?: string;

  @ApiPropertyOptional({ description: 'Ignored when the caller is signed in' })
  @IsOptional()
  @IsString()
  @MaxLength(254)
  email?: string;
}
