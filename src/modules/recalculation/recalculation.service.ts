import { Injectable, Logger } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { DataSource, Repository } from 'typeorm';
import { RepositoryEntity } from '../repositories/entities/repository.entity';
import { ProgressionService } from './progression.service';
import { RepositoryLocks } from './repository-locks';

export interface RecalculationReport {
  events: number;
  droppedEvents: number;
  sessions: number;
  users: number;
  totalXp: number;
  newUnlocks: number;
  durationMs: number;
}

@Injectable()
export class RecalculationService {
  private readonly logger = new Logger(RecalculationService.name);

  constructor(
    private readonly dataSource: DataSource,
    @InjectRepository(RepositoryEntity)
    private readonly repoRepository: Repository<RepositoryEntity>,
    private readonly progression: ProgressionService,
    private readonly locks: RepositoryLocks,
  ) {}

  /**
   * Discards every derived session and aggregate and replays the stored event
   * log. Holds every repository's lock so no sync pass writes meanwhile; the
   * rebuild commits as one transaction or not at all.
   */
  async recalculateAll(): Promise<RecalculationReport> {
    const repos = await this.repoRepository.find({ order: { id: 'ASC' } });
    const started = Date.now();

    return this.locks.runAll(
      repos.map((r) => r.id),
      async () => {
        this.logger.log(`Recalculation started over ${repos.length} tracked repositories`);
        try {
          const result = await this.dataSource.transaction((manager) =>
            this.progression.rebuildAll(manager),
          );
          const report: RecalculationReport = {
            events: result.events,
            droppedEvents: result.droppedEvents.length,
            sessions: result.sessions,
            users: result.users,
            totalXp: result.totalXp,
            newUnlocks: result.unlocks.length,
            durationMs: Date.now() - started,
          };
          this.logger.log(
            `Recalculation done: ${report.sessions} sessions, ${report.users} users, ${report.totalXp} XP`,
          );
          return report;
        } catch (err) {
          const message = err instanceof Error ? err.message : String(err);
          this.logger.error(`Recalculation failed, previous state kept: ${message}`);
          throw err;
        }
      },
    );
  }
}
