import { registerAs } from '@nestjs/config';
import { validate } from './env.validation';

export const databaseConfig = registerAs('database', () => {
  const env = validate(process.env);
  return {
    host: env.DB_HOST,
    port: env.DB_PORT,
    username: env.DB_USERNAME,
    password: env.DB_PASSWORD,
    database: env.DB_DATABASE,
    ssl: env.DB_SSL,
    poolMax: env.DB_POOL_MAX,
    logging: env.ENABLE_ORM_LOGS,
    migrationsRun: env.RUN_MIGRATIONS,
    synchronize: env.NODE_ENV !== 'production',
  };
});

export const githubConfig = registerAs('github', () => {
  const env = validate(process.env);
  return {
    token: env.GITHUB_TOKEN ?? '',
    apiUrl: env.GITHUB_API_URL,
    pageLimit: env.GITHUB_PAGE_LIMIT,
  };
});

export const syncConfig = registerAs('sync', () => {
  const env = validate(process.env);
  return {
    enabled: env.SYNC_ENABLED,
    lookbackDays: env.SYNC_LOOKBACK_DAYS,
    maxAttempts: env.SYNC_MAX_ATTEMPTS,
    backoffBaseMs: env.SYNC_BACKOFF_BASE_MS,
    backoffMaxMs: env.SYNC_BACKOFF_MAX_MS,
    concurrency: env.SYNC_CONCURRENCY,
  };
});

export const classifierConfig = registerAs('classifier', () => {
  const env = validate(process.env);
  return {
    apiKey: env.CLASSIFIER_API_KEY ?? '',
    apiUrl: env.CLASSIFIER_API_URL,
    model: env.CLASSIFIER_MODEL,
    batchSize: env.CLASSIFIER_BATCH_SIZE,
    maxAttempts: env.CLASSIFIER_MAX_ATTEMPTS,
  };
});
