import { Controller, HttpCode, HttpStatus, Post } from '@nestjs/common';
import { ApiOkResponse, ApiTags } from '@nestjs/swagger';
import { ClassificationBatchReport, ClassificationsService } from './classifications.service';

@ApiTags('classifications')
@Controller('classifications')
export class ClassificationsController {
  constructor(private readonly classificationsService: ClassificationsService) {}

  @Post('run')
  @HttpCode(HttpStatus.OK)
  @ApiOkResponse({ description: 'Rates one batch of unclassified review comments' })
  run(): Promise<ClassificationBatchReport> {
    return this.classificationsService.runBatch();
  }
}
