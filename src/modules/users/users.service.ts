import { Injectable, NotFoundException } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { In, Repository } from 'typeorm';
import { AchievementsService, UnlockedAchievement } from '../achievements/achievements.service';
import { levelForXp, xpForLevel } from '../scoring/leveling';
import { Period } from '../sessions/period';
import { SessionFilter, SessionsService } from '../sessions/sessions.service';
import { UserEntity } from './entities/user.entity';

export interface UserAggregate {
  user: string;
  repository: string | null;
  period: Period;
  /** XP earned inside the repository and period filter. */
  xp: number;
  /** Always the all-time level. */
  level: number;
  /** All-time XP still missing for the next level. */
  xpToNextLevel: number;
  sessions: number;
  currentStreakDays: number;
  longestStreakDays: number;
  achievements: UnlockedAchievement[];
}

export interface LeaderboardEntry {
  rank: number;
  user: string;
  xp: number;
  sessions: number;
  level: number;
}

@Injectable()
export class UsersService {
  constructor(
    @InjectRepository(UserEntity)
    private readonly userRepository: Repository<UserEntity>,
    private readonly sessionsService: SessionsService,
    private readonly achievementsService: AchievementsService,
  ) {}

  async getUserAggregate(login: string, repo: string | undefined, period: Period): Promise<UserAggregate> {
    const user = await this.userRepository.findOne({ where: { login } });
    if (!user) throw new NotFoundException(`No review activity recorded for ${login}`);

    const achievements = await this.achievementsService.forUser(login);
    const base = {
      user: login,
      repository: repo ?? null,
      period,
      level: user.level,
      xpToNextLevel: xpForLevel(user.level + 1) - user.xp,
      currentStreakDays: user.currentStreakDays,
      longestStreakDays: user.longestStreakDays,
      achievements,
    };
    if (!repo && period === 'all') {
      return { ...base, xp: user.xp, sessions: user.reviewSessionCount };
    }

    const sessions = await this.sessionsService.find({ user: login, repo, period });
    return {
      ...base,
      xp: sessions.reduce((total, s) => total + s.xpEarned, 0),
      sessions: sessions.length,
    };
  }

  /** Ranks reviewers by XP in the window; ties go to more sessions, then login. */
  getLeaderboard(repo: string | undefined, period: Period, limit: number): Promise<LeaderboardEntry[]> {
    return this.rankReviewers({ repo, period }, limit);
  }

  /** Leaderboard over any session filter; seasons rank through this too. */
  async rankReviewers(filter: Omit<SessionFilter, 'user'>, limit: number): Promise<LeaderboardEntry[]> {
    const sessions = await this.sessionsService.find(filter);

    const totals = new Map<string, { xp: number; sessions: number }>();
    for (const s of sessions) {
      const entry = totals.get(s.reviewer) ?? { xp: 0, sessions: 0 };
      entry.xp += s.xpEarned;
      entry.sessions += 1;
      totals.set(s.reviewer, entry);
    }

    const ranked = [...totals.entries()]
      .map(([user, t]) => ({ user, ...t }))
      .sort(
        (a, b) =>
          b.xp - a.xp || b.sessions - a.sessions || (a.user < b.user ? -1 : a.user > b.user ? 1 : 0),
      )
      .slice(0, limit);

    const users = await this.userRepository.find({ where: { login: In(ranked.map((r) => r.user)) } });
    const levels = new Map(users.map((u) => [u.login, u.level]));

    return ranked.map((r, index) => ({
      rank: index + 1,
      user: r.user,
      xp: r.xp,
      sessions: r.sessions,
      level: levels.get(r.user) ?? levelForXp(r.xp),
    }));
  }
}
