import { plainToInstance, Transform, Type } from 'class-transformer';
import {
  IsBoolean,
  IsInt,
  IsOptional,
  IsString,
  Max,
  Min,
  MinLength,
  validateSync,
} from 'class-validator';

/**
 * 'true' (any case) enables a flag; any other string disables it
 */
function parseFlag({ value }: { value: unknown }): unknown {
  return typeof value === 'string' ? value.trim().toLowerCase() === 'true' : value;
}

/**
 * Environment variables read at startup
 */
export class EnvironmentVariables {
  @IsString()
  @MinLength(1)
  HOST: string = '0.0.0.0';

  @Type(() => Number)
  @IsInt()
  @Min(0)
  @Max(65535)
  PORT: number = 5000;

  @Transform(parseFlag)
  @IsBoolean()
  DEBUG: boolean = false;

  /**
   * Shared secret(s) for GitHub signatures; comma-separated for rotation
   */
  @IsOptional()
  @IsString()
  GITHUB_WEBHOOK_SECRET?: string;

  @Transform(parseFlag)
  @IsBoolean()
  VERIFY_SIGNATURES: boolean = false;

  @Type(() => Number)
  @IsInt()
  @Min(1)
  MAX_BODY_BYTES: number = 1024 * 1024;

  @Transform(parseFlag)
  @IsBoolean()
  ENABLE_SWAGGER: boolean = true;
}

/**
 * Validate process environment for ConfigModule.forRoot({ validate })
 */
export function validateEnvironment(config: Record<string, unknown>): EnvironmentVariables {
  const validated = plainToInstance(EnvironmentVariables, config);
  const errors = validateSync(validated, { skipMissingProperties: false });

  if (errors.length > 0) {
    const details = errors
      .map((error) => `${error.property}: ${Object.values(error.constraints ?? {}).join(', ')}`)
      .join('; ');
    throw new Error(`Invalid environment configuration: ${details}`);
  }

  return validated;
}
