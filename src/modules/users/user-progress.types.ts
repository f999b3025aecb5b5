export type CounterMetric =
  | 'review_sessions'
  | 'fast_reviews'
  | 'thorough_reviews'
  | 'deep_reviews'
  | 'night_sessions'
  | 'xp'
  | 'level';

export type StreakMetric = 'review_days';

export type SpecialCondition = 'sessions_in_one_day' | 'best_session_xp';

/** Cumulative state of one reviewer after folding their sessions in order. */
export interface UserProgress {
  user: string;
  counters: Record<CounterMetric, number>;
  /** Current streak lengths; reset on a qualifying gap. */
  streaks: Record<StreakMetric, number>;
  longestStreaks: Record<StreakMetric, number>;
  special: Record<SpecialCondition, number>;
  /** UTC day (YYYY-MM-DD) of the last folded session. */
  lastActiveDay: string | null;
  sessionsOnLastActiveDay: number;
  lastSessionAt: Date | null;
}

export function emptyProgress(user: string): UserProgress {
  return {
    user,
    counters: {
      review_sessions: 0,
      fast_reviews: 0,
      thorough_reviews: 0,
      deep_reviews: 0,
      night_sessions: 0,
      xp: 0,
      level: 1,
    },
    streaks: { review_days: 0 },
    longestStreaks: { review_days: 0 },
    special: { sessions_in_one_day: 0, best_session_xp: 0 },
    lastActiveDay: null,
    sessionsOnLastActiveDay: 0,
    lastSessionAt: null,
  };
}
