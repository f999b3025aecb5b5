import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { RecalculationModule } from '../recalculation/recalculation.module';
import { SyncModule } from '../sync/sync.module';
import { RepositoryEntity } from './entities/repository.entity';
import { RepositoriesController } from './repositories.controller';
import { RepositoriesService } from './repositories.service';

@Module({
  imports: [TypeOrmModule.forFeature([RepositoryEntity]), RecalculationModule, SyncModule],
  controllers: [RepositoriesController],
  providers: [RepositoriesService],
})
export class RepositoriesModule {}
