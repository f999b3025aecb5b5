import { Injectable, NotFoundException } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { And, FindOptionsWhere, LessThan, MoreThanOrEqual, Repository } from 'typeorm';
import { XpBreakdown } from '../scoring/scoring.engine';
import { RepositoryEntity } from '../repositories/entities/repository.entity';
import { ReviewSessionEntity } from './entities/review-session.entity';
import { Period, periodStart } from './period';
import { SessionStateChange } from './session.types';

export interface SessionView {
  repository: string;
  pullRequest: number;
  reviewer: string;
  windowStart: Date;
  windowEnd: Date;
  commentCount: number;
  substantiveCommentCount: number;
  stateChange: SessionStateChange | null;
  elapsedSinceLastCommitMs: number | null;
  xpEarned: number;
  breakdown: XpBreakdown;
}

export interface SessionFilter {
  user?: string;
  repo?: string;
  period: Period;
  /** Half-open `[from, to)` window on the session start; applied on top of `period`. */
  range?: { from: Date; to: Date };
}

@Injectable()
export class SessionsService {
  constructor(
    @InjectRepository(ReviewSessionEntity)
    private readonly sessionRepository: Repository<ReviewSessionEntity>,
    @InjectRepository(RepositoryEntity)
    private readonly repoRepository: Repository<RepositoryEntity>,
  ) {}

  /** Scored sessions of one reviewer, newest first. */
  async getSessions(user: string, repo: string | undefined, period: Period): Promise<SessionView[]> {
    const rows = await this.find({ user, repo, period });
    const names = await this.repositoryNames();
    return rows.map((row) => toView(row, names.get(row.repositoryId) ?? String(row.repositoryId)));
  }

  /** Raw session rows matching the filter, newest first. */
  async find(filter: SessionFilter, now: Date = new Date()): Promise<ReviewSessionEntity[]> {
    const where: FindOptionsWhere<ReviewSessionEntity> = {};
    if (filter.user) where.reviewer = filter.user;
    if (filter.repo) where.repositoryId = await this.resolveRepositoryId(filter.repo);
    const since = periodStart(filter.period, now);
    if (filter.range) {
      const from = since && since > filter.range.from ? since : filter.range.from;
      where.windowStart = And(MoreThanOrEqual(from), LessThan(filter.range.to));
    } else if (since) {
      where.windowStart = MoreThanOrEqual(since);
    }

    return this.sessionRepository.find({
      where,
      order: { windowStart: 'DESC', repositoryId: 'ASC', pullRequest: 'ASC' },
    });
  }

  async resolveRepositoryId(fullName: string): Promise<number> {
    const repo = await this.repoRepository.findOne({ where: { fullName } });
    if (!repo) throw new NotFoundException(`Repository ${fullName} is not tracked`);
    return repo.id;
  }

  private async repositoryNames(): Promise<Map<number, string>> {
    const repos = await this.repoRepository.find();
    return new Map(repos.map((r) => [r.id, r.fullName]));
  }
}

function toView(row: ReviewSessionEntity, repository: string): SessionView {
  return {
    repository,
    pullRequest: row.pullRequest,
    reviewer: row.reviewer,
    windowStart: row.windowStart,
    windowEnd: row.windowEnd,
    commentCount: row.commentCount,
    substantiveCommentCount: row.substantiveCommentCount,
    stateChange: row.stateChange,
    elapsedSinceLastCommitMs: row.elapsedSinceLastCommitMs,
    xpEarned: row.xpEarned,
    breakdown: row.breakdown,
  };
}
