import { Injectable, Logger, NotFoundException } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { LeaderboardEntry, UsersService } from '../users/users.service';
import { SeasonEntity } from './entities/season.entity';
import { monthlySeason } from './season.calendar';

@Injectable()
export class SeasonsService {
  private readonly logger = new Logger(SeasonsService.name);

  constructor(
    @InjectRepository(SeasonEntity)
    private readonly seasonRepository: Repository<SeasonEntity>,
    private readonly usersService: UsersService,
  ) {}

  /** Returns the season of the month containing `now`, creating it on first use. */
  async ensureCurrentSeason(now: Date = new Date()): Promise<SeasonEntity> {
    const window = monthlySeason(now);
    const existing = await this.seasonRepository.findOne({ where: { number: window.number } });
    if (existing) return existing;

    const created = await this.seasonRepository.save(this.seasonRepository.create(window));
    this.logger.log(`Opened season ${created.number} (${created.name})`);
    return created;
  }

  findAll(): Promise<SeasonEntity[]> {
    return this.seasonRepository.find({ order: { number: 'DESC' } });
  }

  async findByNumber(number: number): Promise<SeasonEntity> {
    const season = await this.seasonRepository.findOne({ where: { number } });
    if (!season) throw new NotFoundException(`Season ${number} does not exist`);
    return season;
  }

  /** Reviewer ranking over sessions that started inside the season. */
  async getLeaderboard(number: number, repo: string | undefined, limit: number): Promise<LeaderboardEntry[]> {
    const season = await this.findByNumber(number);
    return this.usersService.rankReviewers(
      { repo, period: 'all', range: { from: season.startsAt, to: season.endsAt } },
      limit,
    );
  }
}
