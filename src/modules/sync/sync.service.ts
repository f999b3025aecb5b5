import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import { InjectRepository } from '@nestjs/typeorm';
import pLimit from 'p-limit';
import { DataSource, In, Repository } from 'typeorm';
import { syncConfig } from '../../configs/configuration';
import { isTransient } from '../../utils/github.errors';
import { retryWithBackoff } from '../../utils/retry';
import { RawEventEntity } from '../events/entities/raw-event.entity';
import { toRawEventRow } from '../events/raw-event.mapper';
import { RawEvent } from '../events/raw-event.types';
import { ProgressionService } from '../recalculation/progression.service';
import { RepositoryLocks } from '../recalculation/repository-locks';
import { RepositoryEntity } from '../repositories/entities/repository.entity';
import {
  EVENT_SOURCE_ADAPTER,
  EventSourceAdapter,
  PullRequestPage,
  PullRequestRef,
  RepositoryRef,
} from './event-source.adapter';
import { SyncError } from './sync.errors';

const DAY_MS = 24 * 60 * 60 * 1000;
const KEY_CHUNK = 500;

export interface SyncReport {
  repository: string;
  force: boolean;
  from: Date;
  to: Date;
  pullRequests: number;
  fetchedEvents: number;
  newEvents: number;
  duplicateEvents: number;
  retries: number;
  sessions: number;
  droppedEvents: number;
  unlocks: number;
  cursor: string | null;
}

export interface SyncStatus {
  repository: string;
  lastSyncedAt: Date | null;
  trackedSince: Date;
  isSyncInProgress: boolean;
}

interface FetchResult {
  pullRequests: PullRequestRef[];
  events: RawEvent[];
  resumeToken: string | null;
  retries: number;
}

@Injectable()
export class SyncService {
  private readonly logger = new Logger(SyncService.name);
  private readonly globalLimit: ReturnType<typeof pLimit>;
  private readonly inProgress = new Set<number>();

  constructor(
    private readonly dataSource: DataSource,
    @InjectRepository(RepositoryEntity)
    private readonly repoRepository: Repository<RepositoryEntity>,
    @Inject(EVENT_SOURCE_ADAPTER)
    private readonly adapter: EventSourceAdapter,
    private readonly progression: ProgressionService,
    private readonly locks: RepositoryLocks,
    @Inject(syncConfig.KEY)
    private readonly config: ConfigType<typeof syncConfig>,
  ) {
    this.globalLimit = pLimit(Math.max(1, config.concurrency));
  }

  /**
   * One incremental pass: fetch everything in `[from, now)`, store new events,
   * rebuild the touched pull requests and advance the cursor, all or nothing.
   */
  async sync(owner: string, name: string, force = false): Promise<SyncReport> {
    try {
      const repo = await this.findTracked(owner, name);
      return await this.locks.run(repo.id, () => this.globalLimit(() => this.runPass(repo.id, force)));
    } catch (err) {
      throw SyncError.fromStorage(err);
    }
  }

  /** Syncs every tracked repository; one failure does not stop the others. */
  async syncAll(): Promise<{ succeeded: SyncReport[]; failed: { repository: string; error: SyncError }[] }> {
    const repos = await this.repoRepository.find({ order: { id: 'ASC' } });
    const succeeded: SyncReport[] = [];
    const failed: { repository: string; error: SyncError }[] = [];

    await Promise.all(
      repos.map(async (repo) => {
        try {
          succeeded.push(await this.sync(repo.owner, repo.name));
        } catch (err) {
          failed.push({ repository: repo.fullName, error: SyncError.fromStorage(err) });
        }
      }),
    );
    return { succeeded, failed };
  }

  async getStatus(owner: string, name: string): Promise<SyncStatus> {
    const repo = await this.findTracked(owner, name);
    return {
      repository: repo.fullName,
      lastSyncedAt: repo.lastSyncedAt,
      trackedSince: repo.trackedSince,
      isSyncInProgress: this.inProgress.has(repo.id),
    };
  }

  private async findTracked(owner: string, name: string): Promise<RepositoryEntity> {
    const repo = await this.repoRepository.findOne({ where: { fullName: `${owner}/${name}` } });
    if (!repo) throw new SyncError('not_tracked', `Repository ${owner}/${name} is not tracked`);
    return repo;
  }

  private async runPass(repositoryId: number, force: boolean): Promise<SyncReport> {
    // Re-read under the lock: a pass queued behind another must see its cursor.
    const repo = await this.repoRepository.findOne({ where: { id: repositoryId } });
    if (!repo) throw new SyncError('not_tracked', `Repository ${repositoryId} is no longer tracked`);

    const to = new Date();
    const from =
      !force && repo.lastSyncedAt
        ? new Date(repo.lastSyncedAt)
        : new Date(to.getTime() - this.config.lookbackDays * DAY_MS);

    this.inProgress.add(repo.id);
    this.logger.log(`Sync ${repo.fullName} from ${from.toISOString()}${force ? ' (forced)' : ''}`);
    try {
      let fetched: FetchResult;
      try {
        fetched = await this.fetchWindow({ id: repo.id, owner: repo.owner, name: repo.name }, from);
      } catch (err) {
        throw SyncError.fromFetch(err);
      }

      let report: SyncReport;
      try {
        report = await this.persist(repo, fetched, from, to, force);
      } catch (err) {
        throw SyncError.fromStorage(err);
      }

      this.logger.log(
        `Sync ${repo.fullName} done: ${report.newEvents} new events, ${report.sessions} sessions rebuilt`,
      );
      return report;
    } catch (err) {
      const error = SyncError.fromStorage(err);
      this.logger.error(`Sync ${repo.fullName} failed (${error.kind}): ${error.message}`);
      throw error;
    } finally {
      this.inProgress.delete(repo.id);
    }
  }

  private async fetchWindow(repo: RepositoryRef, from: Date): Promise<FetchResult> {
    let retries = 0;
    const call = <T>(label: string, fn: () => Promise<T>): Promise<T> =>
      retryWithBackoff(fn, isTransient, {
        maxAttempts: this.config.maxAttempts,
        baseDelayMs: this.config.backoffBaseMs,
        maxDelayMs: this.config.backoffMaxMs,
        onRetry: (error, attempt, delayMs) => {
          retries += 1;
          const message = error instanceof Error ? error.message : String(error);
          this.logger.warn(`${label} attempt ${attempt} failed (${message}); retrying in ${delayMs}ms`);
        },
      });

    const pullRequests: PullRequestRef[] = [];
    let resumeToken: string | null = null;
    let pageToken: string | null = null;
    do {
      const token: string | null = pageToken;
      const page: PullRequestPage = await call(`list pull requests page ${token ?? '1'}`, () =>
        this.adapter.listPullRequests(repo, from, token),
      );
      pullRequests.push(...page.pullRequests);
      resumeToken = newestToken(resumeToken, page.resumeToken);
      pageToken = page.nextPageToken;
    } while (pageToken !== null);

    const events: RawEvent[] = [];
    for (const pr of pullRequests) {
      events.push(...(await call(`commits #${pr.number}`, () => this.adapter.listCommits(repo, pr, from))));
      events.push(...(await call(`reviews #${pr.number}`, () => this.adapter.listReviews(repo, pr))));
      events.push(
        ...(await call(`review comments #${pr.number}`, () => this.adapter.listReviewComments(repo, pr))),
      );
    }
    return { pullRequests, events, resumeToken, retries };
  }

  private persist(
    repo: RepositoryEntity,
    fetched: FetchResult,
    from: Date,
    to: Date,
    force: boolean,
  ): Promise<SyncReport> {
    return this.dataSource.transaction(async (manager) => {
      const eventRepo = manager.getRepository(RawEventEntity);

      const unique = new Map<string, RawEvent>();
      for (const event of fetched.events) unique.set(event.key, event);
      const keys = [...unique.keys()];

      const known = new Set<string>();
      for (let i = 0; i < keys.length; i += KEY_CHUNK) {
        const rows = await eventRepo.find({ where: { eventKey: In(keys.slice(i, i + KEY_CHUNK)) } });
        for (const row of rows) known.add(row.eventKey);
      }

      const fresh = [...unique.values()].filter((e) => !known.has(e.key));
      if (fresh.length > 0) await eventRepo.save(fresh.map(toRawEventRow));

      const touched = [...new Set(fresh.map((e) => e.pullRequest))].sort((a, b) => a - b);
      const progression = await this.progression.rebuildPullRequests(manager, repo.id, touched);

      const cursor = fetched.resumeToken ?? repo.syncCursor;
      await manager
        .getRepository(RepositoryEntity)
        .update({ id: repo.id }, { lastSyncedAt: to, syncCursor: cursor });

      return {
        repository: repo.fullName,
        force,
        from,
        to,
        pullRequests: fetched.pullRequests.length,
        fetchedEvents: fetched.events.length,
        newEvents: fresh.length,
        duplicateEvents: fetched.events.length - fresh.length,
        retries: fetched.retries,
        sessions: progression.sessions,
        droppedEvents: progression.droppedEvents.length,
        unlocks: progression.unlocks.length,
        cursor,
      };
    });
  }
}

function newestToken(current: string | null, candidate: string | null): string | null {
  if (candidate === null) return current;
  if (current === null) return candidate;
  return Date.parse(candidate) > Date.parse(current) ? candidate : current;
}
