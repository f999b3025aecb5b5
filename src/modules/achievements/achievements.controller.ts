import { Body, Controller, Get, HttpCode, HttpStatus, Post } from '@nestjs/common';
import { ApiOkResponse, ApiTags } from '@nestjs/swagger';
import { AchievementDefinition } from './achievement.types';
import { AchievementsService, UnlockedAchievement } from './achievements.service';
import { MarkNotifiedDto } from './dto/mark-notified.dto';

@ApiTags('achievements')
@Controller('achievements')
export class AchievementsController {
  constructor(private readonly achievementsService: AchievementsService) {}

  @Get()
  @ApiOkResponse({ description: 'Achievement catalog' })
  catalog(): readonly AchievementDefinition[] {
    return this.achievementsService.catalog();
  }

  @Get('pending')
  @ApiOkResponse({ description: 'Unlocks not yet announced' })
  pending(): Promise<UnlockedAchievement[]> {
    return this.achievementsService.pending();
  }

  @Post('notified')
  @HttpCode(HttpStatus.OK)
  markNotified(@Body() body: MarkNotifiedDto): Promise<{ updated: number }> {
    return this.achievementsService.markNotified(body.user, body.achievementIds);
  }
}
