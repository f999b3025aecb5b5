import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { IsIn, IsNotEmpty, IsOptional, IsString, Matches } from 'class-validator';
import { PERIODS, Period } from '../period';

export const REPO_PATTERN = /^[\w.-]+\/[\w.-]+$/;

export class PeriodQueryDto {
  @ApiPropertyOptional({ example: 'octo-org/octo-repo', description: 'owner/name' })
  @IsOptional()
  @Matches(REPO_PATTERN, { message: 'repo must look like owner/name' })
  repo?: string;

  @ApiPropertyOptional({ enum: PERIODS, default: 'all' })
  @IsOptional()
  @IsIn(PERIODS)
  period: Period = 'all';
}

export class SessionsQueryDto extends PeriodQueryDto {
  @ApiProperty({ example: 'octocat' })
  @IsString()
  @IsNotEmpty()
  user!: string;
}
