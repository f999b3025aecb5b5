import { Injectable, Logger } from '@nestjs/common';
import { UserProgress } from '../users/user-progress.types';
import { ACHIEVEMENT_CATALOG } from './achievement.catalog';
import { AchievementDefinition, AchievementRule, UnlockRecord } from './achievement.types';

export class AchievementPredicateError extends Error {
  constructor(achievementId: string, detail: string) {
    super(`Achievement ${achievementId}: ${detail}`);
    this.name = 'AchievementPredicateError';
  }
}

@Injectable()
export class AchievementEvaluator {
  private readonly logger = new Logger(AchievementEvaluator.name);

  /**
   * Returns unlocks for catalog entries that are not in `unlocked` and whose
   * rule holds for `progress`. A rule that cannot be evaluated is skipped for
   * this cycle.
   */
  evaluate(
    progress: UserProgress,
    unlocked: ReadonlySet<string>,
    unlockedAt: Date,
    catalog: readonly AchievementDefinition[] = ACHIEVEMENT_CATALOG,
  ): UnlockRecord[] {
    const unlocks: UnlockRecord[] = [];
    for (const achievement of catalog) {
      if (unlocked.has(achievement.id)) continue;
      try {
        if (ruleHolds(achievement.id, achievement.rule, progress)) {
          unlocks.push({ user: progress.user, achievementId: achievement.id, unlockedAt });
        }
      } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        this.logger.warn(`Skipping ${achievement.id} for ${progress.user}: ${message}`);
      }
    }
    return unlocks;
  }
}

export function ruleHolds(id: string, rule: AchievementRule, progress: UserProgress): boolean {
  switch (rule.kind) {
    case 'milestone':
      return read(id, rule.metric, progress.counters[rule.metric]) >= rule.threshold;
    case 'streak':
      return read(id, rule.metric, progress.streaks[rule.metric]) >= rule.days;
    case 'special':
      return read(id, rule.condition, progress.special[rule.condition]) >= rule.threshold;
  }
}

function read(id: string, name: string, value: number | undefined): number {
  if (value === undefined || !Number.isFinite(value)) {
    throw new AchievementPredicateError(id, `counter "${name}" is unavailable`);
  }
  return value;
}
