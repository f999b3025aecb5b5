import { Controller, Get, Param, ParseIntPipe, Post, Query } from '@nestjs/common';
import { ApiOkResponse, ApiTags } from '@nestjs/swagger';
import { LeaderboardEntry } from '../users/users.service';
import { SeasonLeaderboardQueryDto } from './dto/season-leaderboard-query.dto';
import { SeasonEntity } from './entities/season.entity';
import { SeasonsService } from './seasons.service';

@ApiTags('seasons')
@Controller('seasons')
export class SeasonsController {
  constructor(private readonly seasonsService: SeasonsService) {}

  @Get()
  list(): Promise<SeasonEntity[]> {
    return this.seasonsService.findAll();
  }

  @Get('current')
  @ApiOkResponse({ description: 'Season of the current UTC month, opened on first request' })
  current(): Promise<SeasonEntity> {
    return this.seasonsService.ensureCurrentSeason();
  }

  @Post('ensure')
  ensure(): Promise<SeasonEntity> {
    return this.seasonsService.ensureCurrentSeason();
  }

  @Get(':number/leaderboard')
  leaderboard(
    @Param('number', ParseIntPipe) number: number,
    @Query() query: SeasonLeaderboardQueryDto,
  ): Promise<LeaderboardEntry[]> {
    return this.seasonsService.getLeaderboard(number, query.repo, query.limit);
  }
}
