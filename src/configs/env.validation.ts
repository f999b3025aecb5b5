import { plainToInstance, Transform, TransformFnParams } from 'class-transformer';
import {
  IsBoolean,
  IsIn,
  IsInt,
  IsOptional,
  IsString,
  IsUrl,
  Max,
  Min,
  validateSync,
} from 'class-validator';

// Reads the raw input: implicit conversion has already turned 'false' into true by now.
const toBoolean = ({ obj, key }: TransformFnParams): boolean => {
  const raw: unknown = obj[key];
  return raw === true || raw === 'true' || raw === '1';
};

export class EnvironmentVariables {
  @IsIn(['development', 'production', 'test'])
  NODE_ENV: string = 'development';

  @IsInt()
  @Min(1)
  PORT: number = 4000;

  @IsString()
  DB_HOST: string = 'localhost';

  @IsInt()
  DB_PORT: number = 5432;

  @IsString()
  DB_USERNAME: string = 'postgres';

  @IsString()
  DB_PASSWORD: string = 'postgres';

  @IsString()
  DB_DATABASE: string = 'review_quest';

  @Transform(toBoolean)
  @IsBoolean()
  DB_SSL: boolean = false;

  @IsInt()
  @Min(1)
  DB_POOL_MAX: number = 10;

  @Transform(toBoolean)
  @IsBoolean()
  ENABLE_ORM_LOGS: boolean = false;

  @Transform(toBoolean)
  @IsBoolean()
  RUN_MIGRATIONS: boolean = false;

  @IsOptional()
  @IsString()
  GITHUB_TOKEN?: string;

  @IsUrl({ require_tld: false })
  GITHUB_API_URL: string = 'https://api.github.com';

  @IsInt()
  @Min(1)
  GITHUB_PAGE_LIMIT: number = 50;

  @Transform(toBoolean)
  @IsBoolean()
  SYNC_ENABLED: boolean = true;

  @IsInt()
  @Min(1)
  SYNC_LOOKBACK_DAYS: number = 365;

  @IsInt()
  @Min(1)
  @Max(20)
  SYNC_MAX_ATTEMPTS: number = 5;

  @IsInt()
  @Min(0)
  SYNC_BACKOFF_BASE_MS: number = 1000;

  @IsInt()
  @Min(0)
  SYNC_BACKOFF_MAX_MS: number = 60_000;

  @IsInt()
  @Min(1)
  SYNC_CONCURRENCY: number = 2;

  @IsOptional()
  @IsString()
  CLASSIFIER_API_KEY?: string;

  @IsUrl({ require_tld: false })
  CLASSIFIER_API_URL: string = 'https://api.openai.com/v1/chat/completions';

  @IsString()
  CLASSIFIER_MODEL: string = 'gpt-4o-mini';

  @IsInt()
  @Min(1)
  CLASSIFIER_BATCH_SIZE: number = 20;

  @IsInt()
  @Min(1)
  CLASSIFIER_MAX_ATTEMPTS: number = 3;
}

export function validate(config: Record<string, unknown>): EnvironmentVariables {
  const validated = plainToInstance(EnvironmentVariables, config, {
    enableImplicitConversion: true,
  });
  const errors = validateSync(validated, { skipMissingProperties: false });
  if (errors.length > 0) {
    const messages = errors.flatMap((e) => Object.values(e.constraints ?? {}));
    throw new Error(`Invalid environment: ${messages.join('; ')}`);
  }
  return validated;
}
