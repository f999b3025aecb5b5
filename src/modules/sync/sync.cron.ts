import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import { Cron, CronExpression } from '@nestjs/schedule';
import { syncConfig } from '../../configs/configuration';
import { SyncService } from './sync.service';

@Injectable()
export class SyncCron {
  private readonly logger = new Logger(SyncCron.name);

  constructor(
    private readonly syncService: SyncService,
    @Inject(syncConfig.KEY)
    private readonly config: ConfigType<typeof syncConfig>,
  ) {}

  @Cron(CronExpression.EVERY_6_HOURS)
  async handleSync(): Promise<void> {
    if (!this.config.enabled) return;

    this.logger.log('Scheduled sync started');
    const { succeeded, failed } = await this.syncService.syncAll();
    for (const { repository, error } of failed) {
      this.logger.error(`Scheduled sync of ${repository} failed (${error.kind}): ${error.message}`);
    }
    this.logger.log(`Scheduled sync completed: ${succeeded.length} ok, ${failed.length} failed`);
  }
}
