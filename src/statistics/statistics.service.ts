import { Inject, Injectable, Logger, NotFoundException } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { CriterionDefinition } from '../compliance/compliance.types';
import { Environment } from '../config/env.validation';
import {
  DateRange,
  MEASUREMENT_STORE,
  MeasurementStore,
  RecordWithItems,
} from '../store/measurement-store.interface';
import { aggregate } from './aggregation.engine';
import {
  AggregationOutcome,
  TemplateStatisticsReport,
} from './aggregation.types';

/**
 * StatisticsService
 *
 * Loads a template's criteria and its most recent records from the
 * measurement store and runs the aggregation engine per criterion.
 */
@Injectable()
export class StatisticsService {
  private readonly logger = new Logger(StatisticsService.name);

  constructor(
    @Inject(MEASUREMENT_STORE) private readonly store: MeasurementStore,
    private readonly configService: ConfigService<Environment, true>,
  ) {}

  async templateReport(
    templateId: number,
    range: DateRange = {},
  ): Promise<TemplateStatisticsReport> {
    const criteria = await this.requireCriteria(templateId);
    const records = await this.loadRecords(templateId, range);

    this.logger.debug(
      `Aggregating ${criteria.length} criteria over ${records.length} records of template ${templateId}`,
    );

    return {
      templateId,
      recordCount: records.length,
      dateRange: {
        start: range.start?.toISOString() ?? null,
        end: range.end?.toISOString() ?? null,
      },
      criteria: criteria.map((criterion) => aggregate(criterion, records)),
    };
  }

  async criterionReport(
    templateId: number,
    criterionId: number,
    range: DateRange = {},
  ): Promise<AggregationOutcome> {
    const criteria = await this.requireCriteria(templateId);
    const criterion = criteria.find((candidate) => candidate.id === criterionId);
    if (!criterion) {
      throw new NotFoundException(
        `Criterion ${criterionId} is not part of template ${templateId}`,
      );
    }
    const records = await this.loadRecords(templateId, range);
    return aggregate(criterion, records);
  }

  private async requireCriteria(
    templateId: number,
  ): Promise<CriterionDefinition[]> {
    const criteria = await this.store.getTemplateCriteria(templateId);
    if (!criteria) {
      throw new NotFoundException(`Template ${templateId} not found`);
    }
    return criteria;
  }

  private async loadRecords(
    templateId: number,
    range: DateRange,
  ): Promise<RecordWithItems[]> {
    const limit = this.configService.get('STATISTICS_MAX_RECORDS', {
      infer: true,
    });
    const records = await this.store.getRecordsForTemplate(templateId, {
      ...range,
      limit,
    });
    return Promise.all(
      records.map(async (record) => ({
        record,
        items: await this.store.getItemsForRecord(record.id),
      })),
    );
  }
}
