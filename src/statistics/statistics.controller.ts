import {
  Controller,
  Get,
  Logger,
  Param,
  ParseIntPipe,
  Query,
} from '@nestjs/common';
import { ZodValidationPipe } from '../common/pipes/zod-validation.pipe';
import {
  DateRangeQuery,
  dateRangeQuerySchema,
} from '../common/validation/query.schemas';
import {
  AggregationOutcome,
  TemplateStatisticsReport,
} from './aggregation.types';
import { StatisticsService } from './statistics.service';

/**
 * StatisticsController
 *
 * Endpoints:
 * - GET /statistics/templates/:templateId - every criterion of a template
 * - GET /statistics/templates/:templateId/criteria/:criterionId - one criterion
 *
 * Both accept optional `start` / `end` ISO dates on record creation time.
 */
@Controller('statistics')
export class StatisticsController {
  private readonly logger = new Logger(StatisticsController.name);

  constructor(private readonly statisticsService: StatisticsService) {}

  @Get('templates/:templateId')
  async getTemplateStatistics(
    @Param('templateId', ParseIntPipe) templateId: number,
    @Query(new ZodValidationPipe(dateRangeQuerySchema)) range: DateRangeQuery,
  ): Promise<TemplateStatisticsReport> {
    this.logger.log(`GET /statistics/templates/${templateId}`);
    return this.statisticsService.templateReport(templateId, range);
  }

  @Get('templates/:templateId/criteria/:criterionId')
  async getCriterionStatistics(
    @Param('templateId', ParseIntPipe) templateId: number,
    @Param('criterionId', ParseIntPipe) criterionId: number,
    @Query(new ZodValidationPipe(dateRangeQuerySchema)) range: DateRangeQuery,
  ): Promise<AggregationOutcome> {
    return this.statisticsService.criterionReport(templateId, criterionId, range);
  }
}
