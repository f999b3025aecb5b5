import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { AchievementEvaluator } from './achievement.evaluator';
import { AchievementsController } from './achievements.controller';
import { AchievementsService } from './achievements.service';
import { UserAchievementEntity } from './entities/user-achievement.entity';

@Module({
  imports: [TypeOrmModule.forFeature([UserAchievementEntity])],
  controllers: [AchievementsController],
  providers: [AchievementEvaluator, AchievementsService],
  exports: [AchievementEvaluator, AchievementsService],
})
export class AchievementsModule {}
