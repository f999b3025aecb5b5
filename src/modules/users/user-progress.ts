import { AchievementEvaluator } from '../achievements/achievement.evaluator';
import { UnlockRecord } from '../achievements/achievement.types';
import { isDeep, isFastReview, isThorough, ScoredSession } from '../scoring/scoring.engine';
import { levelForXp } from '../scoring/leveling';
import { emptyProgress, UserProgress } from './user-progress.types';

const DAY_MS = 24 * 60 * 60 * 1000;
const NIGHT_END_HOUR_UTC = 5;

export type FoldableSession = Pick<
  ScoredSession,
  | 'repositoryId'
  | 'pullRequest'
  | 'windowStart'
  | 'windowEnd'
  | 'xpEarned'
  | 'commentCount'
  | 'elapsedSinceLastCommitMs'
>;

export function utcDay(date: Date): string {
  return date.toISOString().slice(0, 10);
}

export function compareForReplay(a: FoldableSession, b: FoldableSession): number {
  return (
    a.windowStart.getTime() - b.windowStart.getTime() ||
    a.repositoryId - b.repositoryId ||
    a.pullRequest - b.pullRequest
  );
}

/** Adds one session to the running totals. Sessions must arrive in replay order. */
export function foldSession(progress: UserProgress, session: FoldableSession): UserProgress {
  const day = utcDay(session.windowStart);
  let streak = progress.streaks.review_days;
  let sessionsOnDay = progress.sessionsOnLastActiveDay;

  if (progress.lastActiveDay === day) {
    sessionsOnDay += 1;
  } else {
    const gapDays =
      progress.lastActiveDay === null
        ? Infinity
        : Math.round((Date.parse(day) - Date.parse(progress.lastActiveDay)) / DAY_MS);
    streak = gapDays === 1 ? streak + 1 : 1;
    sessionsOnDay = 1;
  }

  const xp = progress.counters.xp + session.xpEarned;
  const night = session.windowStart.getUTCHours() < NIGHT_END_HOUR_UTC;

  return {
    user: progress.user,
    counters: {
      review_sessions: progress.counters.review_sessions + 1,
      fast_reviews: progress.counters.fast_reviews + (isFastReview(session) ? 1 : 0),
      thorough_reviews: progress.counters.thorough_reviews + (isThorough(session) ? 1 : 0),
      deep_reviews: progress.counters.deep_reviews + (isDeep(session) ? 1 : 0),
      night_sessions: progress.counters.night_sessions + (night ? 1 : 0),
      xp,
      level: levelForXp(xp),
    },
    streaks: { review_days: streak },
    longestStreaks: { review_days: Math.max(progress.longestStreaks.review_days, streak) },
    special: {
      sessions_in_one_day: Math.max(progress.special.sessions_in_one_day, sessionsOnDay),
      best_session_xp: Math.max(progress.special.best_session_xp, session.xpEarned),
    },
    lastActiveDay: day,
    sessionsOnLastActiveDay: sessionsOnDay,
    lastSessionAt: session.windowEnd,
  };
}

export interface ReplayResult {
  progress: UserProgress;
  unlocks: UnlockRecord[];
}

/**
 * Folds every session of one user from scratch, evaluating achievements after
 * each step so an unlock is stamped with the session that earned it.
 */
export function replayUser(
  user: string,
  sessions: readonly FoldableSession[],
  alreadyUnlocked: ReadonlySet<string>,
  evaluator: AchievementEvaluator,
): ReplayResult {
  const unlocked = new Set(alreadyUnlocked);
  const unlocks: UnlockRecord[] = [];
  let progress = emptyProgress(user);

  for (const session of [...sessions].sort(compareForReplay)) {
    progress = foldSession(progress, session);
    for (const record of evaluator.evaluate(progress, unlocked, session.windowEnd)) {
      unlocked.add(record.achievementId);
      unlocks.push(record);
    }
  }
  return { progress, unlocks };
}
