import { Body, Controller, Delete, Get, HttpCode, HttpStatus, Param, Post, Put, Query } from '@nestjs/common';
import { ApiOkResponse, ApiTags } from '@nestjs/swagger';
import { LeaderboardQueryDto } from '../users/dto/leaderboard-query.dto';
import { CreateTeamDto } from './dto/create-team.dto';
import { TeamEntity } from './entities/team.entity';
import { TeamDetails, TeamLeaderboardEntry, TeamsService } from './teams.service';

@ApiTags('teams')
@Controller('teams')
export class TeamsController {
  constructor(private readonly teamsService: TeamsService) {}

  @Post()
  create(@Body() body: CreateTeamDto): Promise<TeamEntity> {
    return this.teamsService.create(body);
  }

  @Get()
  list(): Promise<TeamEntity[]> {
    return this.teamsService.findAll();
  }

  @Get('leaderboard')
  @ApiOkResponse({ description: 'Teams ranked by the XP their members earned in the window' })
  leaderboard(@Query() query: LeaderboardQueryDto): Promise<TeamLeaderboardEntry[]> {
    return this.teamsService.getLeaderboard(query.repo, query.period, query.limit);
  }

  @Get(':name')
  get(@Param('name') name: string): Promise<TeamDetails> {
    return this.teamsService.get(name);
  }

  @Delete(':name')
  @HttpCode(HttpStatus.NO_CONTENT)
  remove(@Param('name') name: string): Promise<void> {
    return this.teamsService.remove(name);
  }

  @Put(':name/members/:login')
  @HttpCode(HttpStatus.NO_CONTENT)
  addMember(@Param('name') name: string, @Param('login') login: string): Promise<void> {
    return this.teamsService.addMember(name, login);
  }

  @Delete(':name/members/:login')
  @HttpCode(HttpStatus.NO_CONTENT)
  removeMember(@Param('name') name: string, @Param('login') login: string): Promise<void> {
    return this.teamsService.removeMember(name, login);
  }
}
