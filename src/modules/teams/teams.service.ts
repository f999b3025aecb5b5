import { ConflictException, Injectable, Logger, NotFoundException } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { DataSource, In, Repository } from 'typeorm';
import { Period } from '../sessions/period';
import { SessionsService } from '../sessions/sessions.service';
import { UserEntity } from '../users/entities/user.entity';
import { CreateTeamDto } from './dto/create-team.dto';
import { TeamMemberEntity } from './entities/team-member.entity';
import { TeamEntity } from './entities/team.entity';

export interface TeamMember {
  login: string;
  xp: number;
  level: number;
}

export interface TeamDetails extends TeamEntity {
  members: TeamMember[];
}

export interface TeamLeaderboardEntry {
  rank: number;
  team: TeamEntity;
  xp: number;
  sessions: number;
  memberCount: number;
}

@Injectable()
export class TeamsService {
  private readonly logger = new Logger(TeamsService.name);

  constructor(
    private readonly dataSource: DataSource,
    @InjectRepository(TeamEntity)
    private readonly teamRepository: Repository<TeamEntity>,
    @InjectRepository(TeamMemberEntity)
    private readonly memberRepository: Repository<TeamMemberEntity>,
    @InjectRepository(UserEntity)
    private readonly userRepository: Repository<UserEntity>,
    private readonly sessionsService: SessionsService,
  ) {}

  async create(dto: CreateTeamDto): Promise<TeamEntity> {
    const existing = await this.teamRepository.findOne({ where: { name: dto.name } });
    if (existing) throw new ConflictException(`Team ${dto.name} already exists`);

    const team = await this.teamRepository.save(
      this.teamRepository.create({
        name: dto.name,
        description: dto.description ?? null,
        color: dto.color ?? '#6366f1',
      }),
    );
    this.logger.log(`Created team ${team.name}`);
    return team;
  }

  findAll(): Promise<TeamEntity[]> {
    return this.teamRepository.find({ order: { name: 'ASC' } });
  }

  /** The team with its members, highest all-time XP first. */
  async get(name: string): Promise<TeamDetails> {
    const team = await this.findByName(name);
    const memberships = await this.memberRepository.find({ where: { teamId: team.id } });
    const logins = memberships.map((m) => m.login);
    const users = await this.userRepository.find({ where: { login: In(logins) } });
    const byLogin = new Map(users.map((u) => [u.login, u] as const));

    const members = logins
      .map((login) => {
        const user = byLogin.get(login);
        return { login, xp: user?.xp ?? 0, level: user?.level ?? 1 };
      })
      .sort((a, b) => b.xp - a.xp || (a.login < b.login ? -1 : a.login > b.login ? 1 : 0));
    return { ...team, members };
  }

  /** Adding an existing member is a no-op. */
  async addMember(name: string, login: string): Promise<void> {
    const team = await this.findByName(name);
    const existing = await this.memberRepository.findOne({ where: { teamId: team.id, login } });
    if (existing) return;
    await this.memberRepository.save(this.memberRepository.create({ teamId: team.id, login }));
  }

  async removeMember(name: string, login: string): Promise<void> {
    const team = await this.findByName(name);
    const { affected } = await this.memberRepository.delete({ teamId: team.id, login });
    if (!affected) throw new NotFoundException(`${login} is not a member of ${name}`);
  }

  async remove(name: string): Promise<void> {
    const team = await this.findByName(name);
    await this.dataSource.transaction(async (manager) => {
      await manager.getRepository(TeamMemberEntity).delete({ teamId: team.id });
      await manager.getRepository(TeamEntity).delete({ id: team.id });
    });
    this.logger.log(`Deleted team ${name}`);
  }

  /**
   * Ranks teams by the summed XP their members earned in the window. Teams
   * without members are left out; ties go to more sessions, then name.
   */
  async getLeaderboard(repo: string | undefined, period: Period, limit: number): Promise<TeamLeaderboardEntry[]> {
    const [teams, memberships, sessions] = await Promise.all([
      this.teamRepository.find(),
      this.memberRepository.find(),
      this.sessionsService.find({ repo, period }),
    ]);

    const perReviewer = new Map<string, { xp: number; sessions: number }>();
    for (const s of sessions) {
      const entry = perReviewer.get(s.reviewer) ?? { xp: 0, sessions: 0 };
      entry.xp += s.xpEarned;
      entry.sessions += 1;
      perReviewer.set(s.reviewer, entry);
    }

    const rows = teams.flatMap((team) => {
      const members = memberships.filter((m) => m.teamId === team.id);
      if (members.length === 0) return [];
      let xp = 0;
      let count = 0;
      for (const m of members) {
        const totals = perReviewer.get(m.login);
        xp += totals?.xp ?? 0;
        count += totals?.sessions ?? 0;
      }
      return [{ team, xp, sessions: count, memberCount: members.length }];
    });

    return rows
      .sort(
        (a, b) =>
          b.xp - a.xp ||
          b.sessions - a.sessions ||
          (a.team.name < b.team.name ? -1 : a.team.name > b.team.name ? 1 : 0),
      )
      .slice(0, limit)
      .map((row, index) => ({ rank: index + 1, ...row }));
  }

  private async findByName(name: string): Promise<TeamEntity> {
    const team = await this.teamRepository.findOne({ where: { name } });
    if (!team) throw new NotFoundException(`Team ${name} does not exist`);
    return team;
  }
}
