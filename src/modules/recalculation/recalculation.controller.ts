import { Controller, HttpCode, HttpStatus, Post } from '@nestjs/common';
import { ApiOkResponse, ApiTags } from '@nestjs/swagger';
import { RecalculationReport, RecalculationService } from './recalculation.service';

@ApiTags('recalculation')
@Controller('recalculate')
export class RecalculationController {
  constructor(private readonly recalculationService: RecalculationService) {}

  @Post()
  @HttpCode(HttpStatus.OK)
  @ApiOkResponse({ description: 'Every derived session and aggregate rebuilt from stored events' })
  recalculate(): Promise<RecalculationReport> {
    return this.recalculationService.recalculateAll();
  }
}
