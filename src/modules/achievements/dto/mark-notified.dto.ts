import { ApiProperty } from '@nestjs/swagger';
import { ArrayNotEmpty, IsArray, IsNotEmpty, IsString } from 'class-validator';

export class MarkNotifiedDto {
  @ApiProperty({ example: 'octocat' })
  @IsString()
  @IsNotEmpty()
  user!: string;

  @ApiProperty({ example: ['first_review'], type: [String] })
  @IsArray()
  @ArrayNotEmpty()
  @IsString({ each: true })
  achievementIds!: string[];
}
