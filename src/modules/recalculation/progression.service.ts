import { Injectable, Logger } from '@nestjs/common';
import { DeepPartial, EntityManager, In } from 'typeorm';
import { AchievementEvaluator } from '../achievements/achievement.evaluator';
import { UnlockRecord } from '../achievements/achievement.types';
import { UserAchievementEntity } from '../achievements/entities/user-achievement.entity';
import { CommentClassificationEntity } from '../classifications/entities/comment-classification.entity';
import { RawEventEntity } from '../events/entities/raw-event.entity';
import { fromRawEventRow } from '../events/raw-event.mapper';
import { RawEvent } from '../events/raw-event.types';
import { ScoredSession, scoreSessions } from '../scoring/scoring.engine';
import { ReviewSessionEntity } from '../sessions/entities/review-session.entity';
import { segmentEvents } from '../sessions/session.segmenter';
import { DroppedEvent } from '../sessions/session.types';
import { UserEntity } from '../users/entities/user.entity';
import { FoldableSession, replayUser } from '../users/user-progress';
import { UserProgress } from '../users/user-progress.types';

export interface ProgressionReport {
  events: number;
  droppedEvents: DroppedEvent[];
  sessions: number;
  totalXp: number;
  users: number;
  unlocks: UnlockRecord[];
}

/**
 * Runs stored raw events through segmentation, scoring, aggregation and
 * achievement evaluation, writing the derived rows through the given manager.
 * Callers own the transaction.
 */
@Injectable()
export class ProgressionService {
  private readonly logger = new Logger(ProgressionService.name);

  constructor(private readonly evaluator: AchievementEvaluator) {}

  /** Rebuilds sessions for the given pull requests and refreshes every reviewer touched. */
  async rebuildPullRequests(
    manager: EntityManager,
    repositoryId: number,
    pullRequests: number[],
  ): Promise<ProgressionReport> {
    if (pullRequests.length === 0) return emptyReport();

    const eventRows = await manager.getRepository(RawEventEntity).find({
      where: { repositoryId, pullRequest: In(pullRequests) },
      order: { id: 'ASC' },
    });
    const { events, dropped } = this.toEvents(eventRows);
    const scored = await this.score(manager, events, dropped);

    const sessionRepo = manager.getRepository(ReviewSessionEntity);
    const previous = await sessionRepo.find({
      where: { repositoryId, pullRequest: In(pullRequests) },
    });
    await sessionRepo.delete({ repositoryId, pullRequest: In(pullRequests) });
    await sessionRepo.save(scored.sessions.map(toSessionRow));

    const touched = new Set<string>([
      ...previous.map((s) => s.reviewer),
      ...scored.sessions.map((s) => s.reviewer),
    ]);
    const { users, unlocks } = await this.refreshUsers(manager, [...touched].sort());

    return {
      events: eventRows.length,
      droppedEvents: scored.dropped,
      sessions: scored.sessions.length,
      totalXp: sumXp(scored.sessions),
      users,
      unlocks,
    };
  }

  /** Discards every derived session and aggregate and replays the whole event log. */
  async rebuildAll(manager: EntityManager): Promise<ProgressionReport> {
    const eventRows = await manager.getRepository(RawEventEntity).find({ order: { id: 'ASC' } });
    const { events, dropped } = this.toEvents(eventRows);
    const scored = await this.score(manager, events, dropped);

    const sessionRepo = manager.getRepository(ReviewSessionEntity);
    await sessionRepo.clear();
    await manager.getRepository(UserEntity).clear();
    await sessionRepo.save(scored.sessions.map(toSessionRow));

    const reviewers = [...new Set(scored.sessions.map((s) => s.reviewer))].sort();
    const { users, unlocks } = await this.refreshUsers(manager, reviewers);

    return {
      events: eventRows.length,
      droppedEvents: scored.dropped,
      sessions: scored.sessions.length,
      totalXp: sumXp(scored.sessions),
      users,
      unlocks,
    };
  }

  private toEvents(rows: RawEventEntity[]): { events: RawEvent[]; dropped: DroppedEvent[] } {
    const events: RawEvent[] = [];
    const dropped: DroppedEvent[] = [];
    for (const row of rows) {
      const event = fromRawEventRow(row);
      if (event) events.push(event);
      else dropped.push({ key: row.eventKey, reason: 'malformed stored event' });
    }
    return { events, dropped };
  }

  private async score(
    manager: EntityManager,
    events: RawEvent[],
    dropped: DroppedEvent[],
  ): Promise<{ sessions: ScoredSession[]; dropped: DroppedEvent[] }> {
    const segmented = segmentEvents(events);
    const allDropped = [...dropped, ...segmented.dropped];
    for (const d of allDropped) this.logger.warn(`Dropped event ${d.key}: ${d.reason}`);

    const commentIds = segmented.sessions.flatMap((s) => s.comments.map((c) => c.id));
    const quality = new Map<string, CommentClassificationEntity>();
    if (commentIds.length > 0) {
      const rows = await manager
        .getRepository(CommentClassificationEntity)
        .find({ where: { commentId: In(commentIds), status: 'classified' } });
      for (const row of rows) quality.set(row.commentId, row);
    }
    return { sessions: scoreSessions(segmented.sessions, quality), dropped: allDropped };
  }

  private async refreshUsers(
    manager: EntityManager,
    logins: string[],
  ): Promise<{ users: number; unlocks: UnlockRecord[] }> {
    if (logins.length === 0) return { users: 0, unlocks: [] };

    const sessionRows = await manager
      .getRepository(ReviewSessionEntity)
      .find({ where: { reviewer: In(logins) } });
    const unlockRepo = manager.getRepository(UserAchievementEntity);
    const existing = await unlockRepo.find({ where: { user: In(logins) } });

    const userRepo = manager.getRepository(UserEntity);
    const unlocks: UnlockRecord[] = [];
    const aggregates: DeepPartial<UserEntity>[] = [];
    const idle: string[] = [];

    for (const login of logins) {
      const sessions = sessionRows.filter((s) => s.reviewer === login).map(toFoldable);
      if (sessions.length === 0) {
        idle.push(login);
        continue;
      }
      const unlocked = new Set(existing.filter((u) => u.user === login).map((u) => u.achievementId));
      const result = replayUser(login, sessions, unlocked, this.evaluator);
      aggregates.push(toUserRow(result.progress));
      unlocks.push(...result.unlocks);
    }

    if (idle.length > 0) await userRepo.delete({ login: In(idle) });
    await userRepo.save(aggregates);
    await unlockRepo.save(
      unlocks.map((u) => ({
        user: u.user,
        achievementId: u.achievementId,
        unlockedAt: u.unlockedAt,
        notifiedAt: null,
      })),
    );
    for (const u of unlocks) {
      this.logger.log(`Achievement unlocked: ${u.achievementId} for ${u.user}`);
    }
    return { users: aggregates.length, unlocks };
  }
}

function emptyReport(): ProgressionReport {
  return { events: 0, droppedEvents: [], sessions: 0, totalXp: 0, users: 0, unlocks: [] };
}

function sumXp(sessions: ScoredSession[]): number {
  return sessions.reduce((total, s) => total + s.xpEarned, 0);
}

export function toSessionRow(session: ScoredSession): DeepPartial<ReviewSessionEntity> {
  return {
    repositoryId: session.repositoryId,
    pullRequest: session.pullRequest,
    reviewer: session.reviewer,
    windowStart: session.windowStart,
    windowEnd: session.windowEnd,
    commentCount: session.commentCount,
    substantiveCommentCount: session.substantiveCommentCount,
    stateChange: session.stateChange,
    elapsedSinceLastCommitMs: session.elapsedSinceLastCommitMs,
    comments: session.comments,
    xpEarned: session.xpEarned,
    breakdown: session.breakdown,
  };
}

export function toFoldable(row: ReviewSessionEntity): FoldableSession {
  return {
    repositoryId: row.repositoryId,
    pullRequest: row.pullRequest,
    windowStart: new Date(row.windowStart),
    windowEnd: new Date(row.windowEnd),
    xpEarned: row.xpEarned,
    commentCount: row.commentCount,
    elapsedSinceLastCommitMs: row.elapsedSinceLastCommitMs,
  };
}

function toUserRow(progress: UserProgress): DeepPartial<UserEntity> {
  return {
    login: progress.user,
    xp: progress.counters.xp,
    level: progress.counters.level,
    reviewSessionCount: progress.counters.review_sessions,
    fastReviewCount: progress.counters.fast_reviews,
    thoroughReviewCount: progress.counters.thorough_reviews,
    deepReviewCount: progress.counters.deep_reviews,
    nightSessionCount: progress.counters.night_sessions,
    currentStreakDays: progress.streaks.review_days,
    longestStreakDays: progress.longestStreaks.review_days,
    maxSessionsInOneDay: progress.special.sessions_in_one_day,
    bestSessionXp: progress.special.best_session_xp,
    lastActiveDay: progress.lastActiveDay,
    lastSessionAt: progress.lastSessionAt,
  };
}
