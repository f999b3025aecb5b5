import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { IsOptional, IsString, Matches, MaxLength } from 'class-validator';

export class CreateTeamDto {
  @ApiProperty({ example: 'platform' })
  @Matches(/^[\w.-]{1,64}$/, { message: 'name may contain letters, digits, ".", "-" and "_" only' })
  name!: string;

  @ApiPropertyOptional({ example: 'Build and deploy tooling' })
  @IsOptional()
  @IsString()
  @MaxLength(500)
  description?: string;

  @ApiPropertyOptional({ example: '#6366f1', default: '#6366f1' })
  @IsOptional()
  @Matches(/^#[0-9a-fA-F]{6}$/, { message: 'color must be a hex color like #6366f1' })
  color?: string;
}
