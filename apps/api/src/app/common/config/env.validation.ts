import { plainToInstance, Type } from 'class-transformer';
import {
  IsIn,
  IsInt,
  IsOptional,
  IsString,
  Max,
  Min,
  validateSync,
} from 'class-validator';

export class EnvironmentVariables {
  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(1)
  @Max(65535)
  PORT?: number;

  @IsOptional()
  @IsIn(['manual', 'proxy', 'oauth'])
  AUTH_MODE?: string;

  @IsOptional()
  @IsString()
  OAUTH_USERINFO_URL?: string;

  @IsOptional()
  @IsString()
  EMAIL_DOMAIN?: string;

  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(1)
  SESSION_DEFAULT_MINUTES?: number;

  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(1)
  SESSION_MIN_MINUTES?: number;

  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(1)
  @Max(24 * 60)
  SESSION_MAX_MINUTES?: number;

  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(1)
  @Max(24 * 60)
  SESSION_EXTEND_MINUTES?: number;

  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(1)
  @Max(10)
  TOKEN_ISSUE_ATTEMPTS?: number;

  @IsOptional()
  @IsString()
  PUBLIC_BASE_URL?: string;

  @IsOptional()
  @IsString()
  REPORT_TIME_ZONE?: string;

  @IsOptional()
  @IsString()
  DISPLAY_TIME_ZONE?: string;
}

export function validateEnv(config: Record<string, unknown>) {
  const typed = plainToInstance(EnvironmentVariables, config);
  const errors = validateSync(typed, { skipMissingProperties: true });
  if (errors.length > 0) {
    const details = errors
      .map((e) => `${e.property}: ${Object.values(e.constraints ?? {}).join(', ')}`)
      .join('; ');
    throw new Error(`Invalid environment: ${details}`);
  }
  return config;
}
