import { Module } from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import { TypeOrmModule } from '@nestjs/typeorm';
import { githubConfig } from '../../configs/configuration';
import { GitHubUtils } from '../../utils/github.utils';
import { RawEventEntity } from '../events/entities/raw-event.entity';
import { RecalculationModule } from '../recalculation/recalculation.module';
import { RepositoryEntity } from '../repositories/entities/repository.entity';
import { EVENT_SOURCE_ADAPTER } from './event-source.adapter';
import { SyncCron } from './sync.cron';
import { SyncService } from './sync.service';

@Module({
  imports: [TypeOrmModule.forFeature([RepositoryEntity, RawEventEntity]), RecalculationModule],
  providers: [
    SyncService,
    SyncCron,
    {
      provide: EVENT_SOURCE_ADAPTER,
      inject: [githubConfig.KEY],
      useFactory: (config: ConfigType<typeof githubConfig>) => new GitHubUtils(config),
    },
  ],
  exports: [SyncService, EVENT_SOURCE_ADAPTER],
})
export class SyncModule {}
