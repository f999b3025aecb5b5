import { Inject, Injectable, Logger, NotFoundException } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { SourceRequestError } from '../../utils/github.errors';
import { RepositoryLocks } from '../recalculation/repository-locks';
import { EVENT_SOURCE_ADAPTER, EventSourceAdapter } from '../sync/event-source.adapter';
import { SyncError } from '../sync/sync.errors';
import { RepositoryEntity } from './entities/repository.entity';

@Injectable()
export class RepositoriesService {
  private readonly logger = new Logger(RepositoriesService.name);

  constructor(
    @InjectRepository(RepositoryEntity)
    private readonly repoRepository: Repository<RepositoryEntity>,
    @Inject(EVENT_SOURCE_ADAPTER)
    private readonly adapter: EventSourceAdapter,
    private readonly locks: RepositoryLocks,
  ) {}

  findAll(): Promise<RepositoryEntity[]> {
    return this.repoRepository.find({ order: { fullName: 'ASC' } });
  }

  /** Registers a repository for syncing. Tracking an already tracked repository returns it unchanged. */
  async track(owner: string, name: string): Promise<RepositoryEntity> {
    const fullName = `${owner}/${name}`;
    const existing = await this.repoRepository.findOne({ where: { fullName } });
    if (existing) return existing;

    let githubId: number;
    try {
      githubId = (await this.adapter.getRepository(owner, name)).githubId;
    } catch (err) {
      if (err instanceof SourceRequestError && err.status === 404) {
        throw new NotFoundException(`Repository ${fullName} does not exist on GitHub`);
      }
      throw SyncError.fromFetch(err);
    }

    const saved = await this.repoRepository.save(
      this.repoRepository.create({ owner, name, fullName, githubId, lastSyncedAt: null, syncCursor: null }),
    );
    this.logger.log(`Tracking ${fullName}`);
    return saved;
  }

  /**
   * Stops syncing; stored events and derived rows stay. Waits for a sync pass
   * or recalculation already holding the repository.
   */
  async untrack(owner: string, name: string): Promise<void> {
    const fullName = `${owner}/${name}`;
    const existing = await this.repoRepository.findOne({ where: { fullName } });
    if (!existing) throw new NotFoundException(`Repository ${fullName} is not tracked`);
    await this.locks.run(existing.id, () => this.repoRepository.delete({ id: existing.id }));
    this.logger.log(`Stopped tracking ${fullName}`);
  }
}
