import { Injectable, Logger } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { In, IsNull, Repository } from 'typeorm';
import { ACHIEVEMENT_CATALOG, findAchievement } from './achievement.catalog';
import { AchievementDefinition } from './achievement.types';
import { UserAchievementEntity } from './entities/user-achievement.entity';

export interface UnlockedAchievement {
  user: string;
  achievement: AchievementDefinition;
  unlockedAt: Date;
  notifiedAt: Date | null;
}

@Injectable()
export class AchievementsService {
  private readonly logger = new Logger(AchievementsService.name);

  constructor(
    @InjectRepository(UserAchievementEntity)
    private readonly unlockRepository: Repository<UserAchievementEntity>,
  ) {}

  catalog(): readonly AchievementDefinition[] {
    return ACHIEVEMENT_CATALOG;
  }

  async forUser(user: string): Promise<UnlockedAchievement[]> {
    const rows = await this.unlockRepository.find({
      where: { user },
      order: { unlockedAt: 'ASC', achievementId: 'ASC' },
    });
    return this.describe(rows);
  }

  /** Unlocks the notification bot has not announced yet, oldest first. */
  async pending(): Promise<UnlockedAchievement[]> {
    const rows = await this.unlockRepository.find({
      where: { notifiedAt: IsNull() },
      order: { unlockedAt: 'ASC', user: 'ASC', achievementId: 'ASC' },
    });
    return this.describe(rows);
  }

  /** Flags unlocks as announced. Already-flagged or unknown ids are ignored. */
  async markNotified(user: string, achievementIds: string[]): Promise<{ updated: number }> {
    const result = await this.unlockRepository.update(
      { user, achievementId: In(achievementIds), notifiedAt: IsNull() },
      { notifiedAt: new Date() },
    );
    const updated = result.affected ?? 0;
    this.logger.log(`Marked ${updated} unlocks of ${user} as notified`);
    return { updated };
  }

  private describe(rows: UserAchievementEntity[]): UnlockedAchievement[] {
    const unlocked: UnlockedAchievement[] = [];
    for (const row of rows) {
      const achievement = findAchievement(row.achievementId);
      if (!achievement) {
        this.logger.warn(`Unlock ${row.achievementId} of ${row.user} is not in the catalog`);
        continue;
      }
      unlocked.push({
        user: row.user,
        achievement,
        unlockedAt: row.unlockedAt,
        notifiedAt: row.notifiedAt,
      });
    }
    return unlocked;
  }
}
