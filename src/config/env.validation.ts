import { plainToInstance } from 'class-transformer';
import {
  IsIn,
  IsInt,
  IsNotEmpty,
  IsNumber,
  IsOptional,
  IsString,
  Max,
  Min,
  validateSync,
} from 'class-validator';

export class EnvironmentVariables {
  @IsIn(['development', 'production', 'test'])
  NODE_ENV: string = 'development';

  @IsInt()
  @Min(1)
  @Max(65535)
  PORT: number = 8000;

  @IsString()
  DATABASE: string = 'mongodb://localhost:27017/weather-travel';

  @IsString()
  @IsNotEmpty()
  JWT_SECRET!: string;

  @IsInt()
  @Min(1)
  ACCESS_TOKEN_EXPIRE_MINUTES: number = 30;

  @IsInt()
  @Min(1)
  REFRESH_TOKEN_EXPIRE_DAYS: number = 7;

  @IsOptional()
  @IsString()
  WEATHER_API_KEY?: string;

  @IsString()
  WEATHER_API_URL: string = 'http://api.weatherapi.com/v1';

  @IsOptional()
  @IsString()
  KMA_API_KEY?: string;

  @IsOptional()
  @IsString()
  PUBLIC_DATA_API_KEY?: string;

  @IsOptional()
  @IsString()
  NAVER_CLIENT_ID?: string;

  @IsOptional()
  @IsString()
  NAVER_CLIENT_SECRET?: string;

  @IsOptional()
  @IsString()
  GOOGLE_API_KEY?: string;

  @IsOptional()
  @IsString()
  KOREA_TOURISM_API_KEY?: string;

  @IsOptional()
  @IsString()
  OPENAI_API_KEY?: string;

  @IsString()
  OPENAI_MODEL: string = 'gpt-4o-mini';

  @IsInt()
  @Min(1)
  OPENAI_MAX_TOKENS: number = 1500;

  @IsNumber()
  @Min(0)
  @Max(2)
  OPENAI_TEMPERATURE: number = 0.7;

  @IsOptional()
  @IsString()
  FRONTEND_URL?: string;
}

/**
 * Passed to ConfigModule.forRoot; the returned object replaces process.env
 * inside ConfigService, so defaults declared above are visible through get().
 */
export function validate(config: Record<string, unknown>): EnvironmentVariables {
  const validated = plainToInstance(EnvironmentVariables, config, {
    enableImplicitConversion: true,
    exposeDefaultValues: true,
  });
  const errors = validateSync(validated, { skipMissingProperties: false });

  if (errors.length > 0) {
    const messages = errors.flatMap((error) => Object.values(error.constraints ?? {}));
    throw new Error(`Invalid environment configuration: ${messages.join('; ')}`);
  }
  return validated;
}
