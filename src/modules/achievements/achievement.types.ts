import { CounterMetric, SpecialCondition, StreakMetric } from '../users/user-progress.types';

export type AchievementRarity = 'common' | 'uncommon' | 'rare' | 'epic' | 'legendary';

export type AchievementRule =
  | { kind: 'milestone'; metric: CounterMetric; threshold: number }
  | { kind: 'streak'; metric: StreakMetric; days: number }
  | { kind: 'special'; condition: SpecialCondition; threshold: number };

export interface AchievementDefinition {
  id: string;
  name: string;
  description: string;
  emoji: string;
  rule: AchievementRule;
  xpReward: number;
  rarity: AchievementRarity;
}

export interface UnlockRecord {
  user: string;
  achievementId: string;
  unlockedAt: Date;
}
