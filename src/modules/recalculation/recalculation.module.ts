import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { AchievementsModule } from '../achievements/achievements.module';
import { RepositoryEntity } from '../repositories/entities/repository.entity';
import { ProgressionService } from './progression.service';
import { RecalculationController } from './recalculation.controller';
import { RecalculationService } from './recalculation.service';
import { RepositoryLocks } from './repository-locks';

@Module({
  imports: [TypeOrmModule.forFeature([RepositoryEntity]), AchievementsModule],
  controllers: [RecalculationController],
  providers: [ProgressionService, RecalculationService, RepositoryLocks],
  exports: [ProgressionService, RepositoryLocks],
})
export class RecalculationModule {}
