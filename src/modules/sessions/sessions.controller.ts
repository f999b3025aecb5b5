import { Controller, Get, Query } from '@nestjs/common';
import { ApiOkResponse, ApiTags } from '@nestjs/swagger';
import { SessionsQueryDto } from './dto/sessions-query.dto';
import { SessionView, SessionsService } from './sessions.service';

@ApiTags('sessions')
@Controller('sessions')
export class SessionsController {
  constructor(private readonly sessionsService: SessionsService) {}

  @Get()
  @ApiOkResponse({ description: 'Scored review sessions of one reviewer' })
  list(@Query() query: SessionsQueryDto): Promise<SessionView[]> {
    return this.sessionsService.getSessions(query.user, query.repo, query.period);
  }
}
