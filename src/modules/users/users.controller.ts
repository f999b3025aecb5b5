import { Controller, Get, Param, Query } from '@nestjs/common';
import { ApiOkResponse, ApiTags } from '@nestjs/swagger';
import { PeriodQueryDto } from '../sessions/dto/sessions-query.dto';
import { LeaderboardQueryDto } from './dto/leaderboard-query.dto';
import { LeaderboardEntry, UserAggregate, UsersService } from './users.service';

@ApiTags('users')
@Controller()
export class UsersController {
  constructor(private readonly usersService: UsersService) {}

  @Get('users/:login')
  @ApiOkResponse({ description: 'XP, level, session count and achievements of one reviewer' })
  aggregate(@Param('login') login: string, @Query() query: PeriodQueryDto): Promise<UserAggregate> {
    return this.usersService.getUserAggregate(login, query.repo, query.period);
  }

  @Get('leaderboard')
  leaderboard(@Query() query: LeaderboardQueryDto): Promise<LeaderboardEntry[]> {
    return this.usersService.getLeaderboard(query.repo, query.period, query.limit);
  }
}
