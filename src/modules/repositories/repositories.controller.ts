import {
  Body,
  Controller,
  DefaultValuePipe,
  Delete,
  Get,
  HttpCode,
  HttpStatus,
  Param,
  ParseBoolPipe,
  Post,
  Query,
} from '@nestjs/common';
import { ApiOkResponse, ApiQuery, ApiTags } from '@nestjs/swagger';
import { SyncReport, SyncService, SyncStatus } from '../sync/sync.service';
import { TrackRepositoryDto } from './dto/track-repository.dto';
import { RepositoryEntity } from './entities/repository.entity';
import { RepositoriesService } from './repositories.service';

@ApiTags('repositories')
@Controller('repos')
export class RepositoriesController {
  constructor(
    private readonly repositoriesService: RepositoriesService,
    private readonly syncService: SyncService,
  ) {}

  @Post()
  track(@Body() body: TrackRepositoryDto): Promise<RepositoryEntity> {
    return this.repositoriesService.track(body.owner, body.name);
  }

  @Get()
  list(): Promise<RepositoryEntity[]> {
    return this.repositoriesService.findAll();
  }

  @Delete(':owner/:name')
  @HttpCode(HttpStatus.NO_CONTENT)
  untrack(@Param('owner') owner: string, @Param('name') name: string): Promise<void> {
    return this.repositoriesService.untrack(owner, name);
  }

  @Get(':owner/:name/status')
  @ApiOkResponse({ description: 'Cursor timestamp, tracking date and whether a pass is running' })
  status(@Param('owner') owner: string, @Param('name') name: string): Promise<SyncStatus> {
    return this.syncService.getStatus(owner, name);
  }

  @Post(':owner/:name/sync')
  @HttpCode(HttpStatus.OK)
  @ApiQuery({ name: 'force', required: false, type: Boolean })
  sync(
    @Param('owner') owner: string,
    @Param('name') name: string,
    @Query('force', new DefaultValuePipe(false), ParseBoolPipe) force: boolean,
  ): Promise<SyncReport> {
    return this.syncService.sync(owner, name, force);
  }
}
