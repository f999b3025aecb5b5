import { ApiProperty } from '@nestjs/swagger';
import { Matches } from 'class-validator';

const SEGMENT = /^[\w.-]+$/;

export class TrackRepositoryDto {
  @ApiProperty({ example: 'octo-org' })
  @Matches(SEGMENT, { message: 'owner may contain letters, digits, ".", "-" and "_" only' })
  owner!: string;

  @ApiProperty({ example: 'octo-repo' })
  @Matches(SEGMENT, { message: 'name may contain letters, digits, ".", "-" and "_" only' })
  name!: string;
}
