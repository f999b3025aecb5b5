import { classifierConfig, databaseConfig, syncConfig } from './configuration';

describe('configuration namespaces', () => {
  const saved = { ...process.env };

  afterEach(() => {
    process.env = { ...saved };
  });

  it('reads booleans set to false as false', () => {
    process.env.SYNC_ENABLED = 'false';
    process.env.DB_SSL = 'false';
    process.env.ENABLE_ORM_LOGS = 'true';

    expect(syncConfig().enabled).toBe(false);
    expect(databaseConfig()).toMatchObject({ ssl: false, logging: true });
  });

  it('takes numbers from the validated environment', () => {
    process.env.SYNC_CONCURRENCY = '3';
    process.env.CLASSIFIER_BATCH_SIZE = '5';
    delete process.env.CLASSIFIER_API_KEY;

    expect(syncConfig().concurrency).toBe(3);
    expect(classifierConfig()).toMatchObject({ apiKey: '', batchSize: 5, maxAttempts: 3 });
  });

  it('refuses an environment that does not validate', () => {
    process.env.SYNC_CONCURRENCY = '0';

    expect(() => syncConfig()).toThrow('SYNC_CONCURRENCY must not be less than 1');
  });
});
