import { AchievementDefinition } from './achievement.types';

export const ACHIEVEMENT_CATALOG: readonly AchievementDefinition[] = [
  {
    id: 'first_review',
    name: 'First Blood',
    description: 'Complete your first review session',
    emoji: '🩸',
    rule: { kind: 'milestone', metric: 'review_sessions', threshold: 1 },
    xpReward: 50,
    rarity: 'common',
  },
  {
    id: 'review_10',
    name: 'Getting Started',
    description: 'Complete 10 review sessions',
    emoji: '📝',
    rule: { kind: 'milestone', metric: 'review_sessions', threshold: 10 },
    xpReward: 100,
    rarity: 'common',
  },
  {
    id: 'review_50',
    name: 'Reviewer',
    description: 'Complete 50 review sessions',
    emoji: '👁️',
    rule: { kind: 'milestone', metric: 'review_sessions', threshold: 50 },
    xpReward: 250,
    rarity: 'uncommon',
  },
  {
    id: 'review_100',
    name: 'Centurion',
    description: 'Complete 100 review sessions',
    emoji: '💯',
    rule: { kind: 'milestone', metric: 'review_sessions', threshold: 100 },
    xpReward: 500,
    rarity: 'rare',
  },
  {
    id: 'speed_demon',
    name: 'Speed Demon',
    description: 'Start 10 sessions within an hour of a push',
    emoji: '⚡',
    rule: { kind: 'milestone', metric: 'fast_reviews', threshold: 10 },
    xpReward: 200,
    rarity: 'uncommon',
  },
  {
    id: 'deep_diver',
    name: 'Deep Diver',
    description: 'Leave more than 10 comments in a single session, 5 times',
    emoji: '🤿',
    rule: { kind: 'milestone', metric: 'deep_reviews', threshold: 5 },
    xpReward: 250,
    rarity: 'rare',
  },
  {
    id: 'night_owl',
    name: 'Night Owl',
    description: 'Start 10 sessions between midnight and 5am UTC',
    emoji: '🦉',
    rule: { kind: 'milestone', metric: 'night_sessions', threshold: 10 },
    xpReward: 150,
    rarity: 'uncommon',
  },
  {
    id: 'review_streak_7',
    name: 'On Fire',
    description: 'Review on 7 consecutive days',
    emoji: '🔥',
    rule: { kind: 'streak', metric: 'review_days', days: 7 },
    xpReward: 300,
    rarity: 'rare',
  },
  {
    id: 'marathon',
    name: 'Marathon',
    description: 'Complete 5 review sessions in one calendar day',
    emoji: '🏃',
    rule: { kind: 'special', condition: 'sessions_in_one_day', threshold: 5 },
    xpReward: 300,
    rarity: 'epic',
  },
  {
    id: 'level_10',
    name: 'Veteran',
    description: 'Reach level 10',
    emoji: '🏆',
    rule: { kind: 'milestone', metric: 'level', threshold: 10 },
    xpReward: 500,
    rarity: 'legendary',
  },
];

export function findAchievement(id: string): AchievementDefinition | undefined {
  return ACHIEVEMENT_CATALOG.find((a) => a.id === id);
}
