import { plainToInstance } from 'class-transformer';
import { IsInt, IsOptional, IsString, Max, Min, validateSync } from 'class-validator';
import * as path from 'path';

export const DEFAULT_MODEL_PATH = path.resolve(__dirname, '../../models/rps-predictor-trained.json');

export class EnvironmentVariables {
  @IsInt()
  @Min(0)
  @Max(65535)
  PORT: number = 3001;

  @IsString()
  RPS_TRAINED_MODEL_PATH: string = DEFAULT_MODEL_PATH;

  @IsOptional()
  @IsInt()
  RPS_RANDOM_SEED?: number;

  @IsInt()
  @Min(1)
  RPS_MAX_SESSIONS: number = 1000;
}

/**
 * 환경 변수 검증 (ConfigModule.forRoot 의 validate)
 */
export function validate(config: Record<string, unknown>): EnvironmentVariables {
  const validatedConfig = plainToInstance(EnvironmentVariables, config, {
    enableImplicitConversion: true,
  });
  const errors = validateSync(validatedConfig, { skipMissingProperties: false });

  if (errors.length > 0) {
    throw new Error(errors.map((error) => error.toString()).join('\n'));
  }
  return validatedConfig;
}
