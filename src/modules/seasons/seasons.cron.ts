import { Injectable } from '@nestjs/common';
import { Cron, CronExpression } from '@nestjs/schedule';
import { SeasonsService } from './seasons.service';

@Injectable()
export class SeasonsCron {
  constructor(private readonly seasonsService: SeasonsService) {}

  @Cron(CronExpression.EVERY_1ST_DAY_OF_MONTH_AT_MIDNIGHT, { timeZone: 'UTC' })
  async openSeason(): Promise<void> {
    await this.seasonsService.ensureCurrentSeason();
  }
}
