import { Test } from '@nestjs/testing';
import { getRepositoryToken } from '@nestjs/typeorm';
import { DataSource } from 'typeorm';
import { AUTHOR, MINUTE, PR, T0, comment, commit } from '../../../test/event-builders';
import { ScriptedEventSource } from '../../../test/scripted-event-source';
import { createStore, Store } from '../../../test/store';
import { syncConfig } from '../../configs/configuration';
import { RateLimitedError, SourceRequestError, SourceUnavailableError } from '../../utils/github.errors';
import { AchievementEvaluator } from '../achievements/achievement.evaluator';
import { ProgressionService } from '../recalculation/progression.service';
import { RepositoryLocks } from '../recalculation/repository-locks';
import { RepositoryEntity } from '../repositories/entities/repository.entity';
import { EVENT_SOURCE_ADAPTER } from './event-source.adapter';
import { SyncError } from './sync.errors';
import { SyncService } from './sync.service';

const DAY = 24 * 60 * 60 * 1000;
const LOOKBACK_DAYS = 36_500;

const config = {
  enabled: true,
  lookbackDays: LOOKBACK_DAYS,
  maxAttempts: 3,
  backoffBaseMs: 0,
  backoffMaxMs: 0,
  concurrency: 2,
};

/** Commit at T0; bob comments 3 times at T0+30m, carol 7 times at T0+45m. */
function reviewScenario() {
  return [
    commit({ at: T0, sha: 'base' }),
    ...Array.from({ length: 3 }, (_, i) => comment({ at: T0 + 30 * MINUTE + i * 1000, actor: 'bob' })),
    ...Array.from({ length: 7 }, (_, i) => comment({ at: T0 + 45 * MINUTE + i * 1000, actor: 'carol' })),
  ];
}

async function build(store: Store, source: ScriptedEventSource, syncSettings: typeof config): Promise<SyncService> {
  const moduleRef = await Test.createTestingModule({
    providers: [
      SyncService,
      ProgressionService,
      RepositoryLocks,
      AchievementEvaluator,
      { provide: DataSource, useValue: store.dataSource },
      { provide: getRepositoryToken(RepositoryEntity), useValue: store.repositories },
      { provide: EVENT_SOURCE_ADAPTER, useValue: source },
      { provide: syncConfig.KEY, useValue: syncSettings },
    ],
  }).compile();
  return moduleRef.get(SyncService);
}

const tick = () => new Promise<void>((resolve) => setImmediate(resolve));

describe('SyncService', () => {
  let store: Store;
  let source: ScriptedEventSource;
  let service: SyncService;

  beforeEach(async () => {
    store = createStore();
    source = new ScriptedEventSource();
    source.pullRequests = [{ number: PR, author: AUTHOR, updatedAt: new Date(T0) }];
    source.events = reviewScenario();
    store.repositories.seed([{ owner: 'octo-org', name: 'octo-repo', fullName: 'octo-org/octo-repo' }]);

    service = await build(store, source, config);
  });

  const cursor = () => {
    const [repo] = store.repositories.all();
    return { lastSyncedAt: repo.lastSyncedAt, syncCursor: repo.syncCursor };
  };

  it('stores events, scores sessions and advances the cursor', async () => {
    const before = Date.now();
    const report = await service.sync('octo-org', 'octo-repo');

    expect(report).toMatchObject({
      repository: 'octo-org/octo-repo',
      force: false,
      pullRequests: 1,
      fetchedEvents: 11,
      newEvents: 11,
      duplicateEvents: 0,
      retries: 0,
      sessions: 2,
      unlocks: 2,
      cursor: '2026-03-05T00:00:00Z',
    });
    expect(store.events.all()).toHaveLength(11);

    const xp = new Map(store.sessions.all().map((s): [unknown, unknown] => [s.reviewer, s.xpEarned]));
    expect(xp).toEqual(new Map([['bob', 35], ['carol', 60]]));

    const users = new Map(store.users.all().map((u): [unknown, unknown] => [u.login, u.xp]));
    expect(users).toEqual(new Map([['bob', 35], ['carol', 60]]));

    const { lastSyncedAt, syncCursor } = cursor();
    expect(lastSyncedAt).toEqual(report.to);
    expect(report.to.getTime()).toBeGreaterThanOrEqual(before);
    expect(syncCursor).toBe('2026-03-05T00:00:00Z');
  });

  it('follows page tokens until the source runs out of pull requests', async () => {
    source.pullRequests = [7, 8, 9].map((number) => ({ number, author: AUTHOR, updatedAt: new Date(T0) }));
    source.pageSize = 2;

    const report = await service.sync('octo-org', 'octo-repo');

    expect(source.pageTokens).toEqual([null, '2']);
    expect(report.pullRequests).toBe(3);
    expect(report.fetchedEvents).toBe(11);
  });

  it('starts the next pass at the previous cursor and does not double-count redelivered events', async () => {
    const first = await service.sync('octo-org', 'octo-repo');
    const second = await service.sync('octo-org', 'octo-repo');

    expect(source.windows[0]).toEqual(first.from);
    expect(source.windows[1]).toEqual(first.to);
    expect(second).toMatchObject({ newEvents: 0, duplicateEvents: 11, sessions: 0, unlocks: 0 });
    expect(store.events.all()).toHaveLength(11);
    expect(store.sessions.all()).toHaveLength(2);
    expect(store.users.all().find((u) => u.login === 'bob')?.xp).toBe(35);
  });

  it('rebuilds a pull request when new activity arrives', async () => {
    await service.sync('octo-org', 'octo-repo');
    source.events = [
      ...source.events,
      commit({ at: T0 + 2 * 60 * MINUTE, sha: 'fix' }),
      comment({ at: T0 + 2 * 60 * MINUTE + 10 * MINUTE, actor: 'bob' }),
    ];

    const report = await service.sync('octo-org', 'octo-repo');

    expect(report.newEvents).toBe(2);
    expect(report.sessions).toBe(3);
    expect(store.users.all().find((u) => u.login === 'bob')).toMatchObject({
      xp: 35 + 25,
      reviewSessionCount: 2,
    });
  });

  it('re-requests the whole lookback window when forced', async () => {
    const first = await service.sync('octo-org', 'octo-repo');
    const forced = await service.sync('octo-org', 'octo-repo', true);

    expect(forced.force).toBe(true);
    expect(source.windows[1].getTime()).toBeLessThan(first.to.getTime());
    expect(forced.from.getTime()).toBe(forced.to.getTime() - LOOKBACK_DAYS * DAY);
    expect(cursor().lastSyncedAt).toEqual(forced.to);
  });

  it('retries rate limits and network failures inside the pass', async () => {
    source.failures.push(new RateLimitedError(0), new SourceUnavailableError('socket hang up'));

    const report = await service.sync('octo-org', 'octo-repo');

    expect(report.retries).toBe(2);
    expect(report.newEvents).toBe(11);
  });

  it.each([
    ['rate_limited', () => new RateLimitedError(0)],
    ['network', () => new SourceUnavailableError('timeout')],
  ])('fails with %s after the last attempt and leaves the cursor untouched', async (kind, failure) => {
    await service.sync('octo-org', 'octo-repo');
    const before = cursor();
    source.events = [...source.events, comment({ at: T0 + DAY, actor: 'dave' })];
    source.failures.push(failure(), failure(), failure());

    const error = await service.sync('octo-org', 'octo-repo').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(SyncError);
    expect(error).toMatchObject({ kind });
    expect(cursor()).toEqual(before);
    expect(store.events.all()).toHaveLength(11);
  });

  it('rolls back stored events when the rebuild fails', async () => {
    store.sessions.failNext('save', new Error('disk full'));

    await expect(service.sync('octo-org', 'octo-repo')).rejects.toMatchObject({
      name: 'SyncError',
      kind: 'storage',
      message: 'disk full',
    });
    expect(store.events.all()).toEqual([]);
    expect(cursor()).toEqual({ lastSyncedAt: null, syncCursor: null });

    await service.sync('octo-org', 'octo-repo');
    expect(store.events.all()).toHaveLength(11);
  });

  it('rejects repositories that are not tracked', async () => {
    await expect(service.sync('octo-org', 'unknown')).rejects.toMatchObject({ kind: 'not_tracked' });
    expect(source.calls).toBe(0);
  });

  it('reports a pass in progress and runs passes for one repository one at a time', async () => {
    let release: () => void = () => undefined;
    source.gate = new Promise<void>((resolve) => {
      release = resolve;
    });
    const started = new Promise<void>((resolve) => {
      source.onListPullRequests = resolve;
    });

    const first = service.sync('octo-org', 'octo-repo');
    const second = service.sync('octo-org', 'octo-repo');
    await started;

    const during = await service.getStatus('octo-org', 'octo-repo');
    expect(during.isSyncInProgress).toBe(true);
    expect(during.lastSyncedAt).toBeNull();
    expect(source.windows).toHaveLength(1);

    source.gate = null;
    release();
    const [a, b] = await Promise.all([first, second]);

    expect(source.windows[1]).toEqual(a.to);
    expect(b.newEvents).toBe(0);
    const after = await service.getStatus('octo-org', 'octo-repo');
    expect(after.isSyncInProgress).toBe(false);
    expect(after.lastSyncedAt).toEqual(b.to);
  });

  it('collects per-repository failures when syncing everything', async () => {
    source.failures.push(new SourceRequestError('GitHub responded 422', 422));

    const failing = await service.syncAll();
    const passing = await service.syncAll();

    expect(failing.succeeded).toEqual([]);
    expect(failing.failed.map((f) => [f.repository, f.error.kind])).toEqual([['octo-org/octo-repo', 'source']]);
    expect(passing.succeeded.map((r) => r.newEvents)).toEqual([11]);
    expect(passing.failed).toEqual([]);
  });
});

describe('SyncService concurrency', () => {
  it('runs no more passes at once than the configured limit across repositories', async () => {
    const store = createStore();
    const source = new ScriptedEventSource();
    store.repositories.seed([
      { owner: 'octo-org', name: 'first', fullName: 'octo-org/first' },
      { owner: 'octo-org', name: 'second', fullName: 'octo-org/second' },
    ]);
    let release: () => void = () => undefined;
    source.gate = new Promise<void>((resolve) => {
      release = resolve;
    });
    const service = await build(store, source, { ...config, concurrency: 1 });

    const first = service.sync('octo-org', 'first');
    const second = service.sync('octo-org', 'second');
    for (let i = 0; i < 5; i++) await tick();

    expect(source.windows).toHaveLength(1);
    expect((await service.getStatus('octo-org', 'second')).isSyncInProgress).toBe(false);

    release();
    const reports = await Promise.all([first, second]);

    expect(source.windows).toHaveLength(2);
    expect(reports.map((r) => r.repository)).toEqual(['octo-org/first', 'octo-org/second']);
  });
});
