import { ApiPropertyOptional } from '@nestjs/swagger';
import { Type } from 'class-transformer';
import { IsInt, IsOptional, Matches, Max, Min } from 'class-validator';
import { REPO_PATTERN } from '../../sessions/dto/sessions-query.dto';

export class SeasonLeaderboardQueryDto {
  @ApiPropertyOptional({ example: 'octo-org/octo-repo', description: 'owner/name' })
  @IsOptional()
  @Matches(REPO_PATTERN, { message: 'repo must look like owner/name' })
  repo?: string;

  @ApiPropertyOptional({ default: 10, minimum: 1, maximum: 100 })
  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(1)
  @Max(100)
  limit: number = 10;
}
