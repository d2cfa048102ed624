import { Injectable, Logger } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { percentage } from '../common/utils/number-utils';
import { InspectionRecord } from '../database/entities/inspection-record.entity';
import { MeasurementItem } from '../database/entities/measurement-item.entity';
import { NonConformance } from '../database/entities/non-conformance.entity';
import { Template } from '../database/entities/template.entity';
import { DateRange } from '../store/measurement-store.interface';
import { dateRangeOperator } from '../store/typeorm-measurement.store';
import {
  complianceTrend,
  dashboardSummary,
  dashboardWindowStart,
  departmentPerformance,
  findOverdue,
  inspectorPerformance,
  RECENT_RECORD_LIMIT,
  summarizeCompliance,
  summarizeNonConformances,
  templateUsage,
} from './reports.calculations';
import {
  ComplianceSummaryReport,
  CriterionFailureRow,
  DashboardSummary,
  DepartmentPerformanceRow,
  InspectorPerformanceRow,
  NonConformanceSummaryReport,
  OverdueNonConformance,
  TemplateUsageRow,
  TrendPeriod,
  TrendPoint,
} from './reports.types';

interface CriterionFailureRaw {
  criterionId: number;
  code: string;
  title: string;
  severity: string;
  failedCount: number | string;
  totalCount: number | string;
}

/**
 * ReportsService
 *
 * Read-only aggregates over records and non-conformances. Loads the
 * rows once per request and leaves the arithmetic to reports.calculations.
 */
@Injectable()
export class ReportsService {
  private readonly logger = new Logger(ReportsService.name);

  constructor(
    @InjectRepository(InspectionRecord)
    private readonly recordRepository: Repository<InspectionRecord>,
    @InjectRepository(MeasurementItem)
    private readonly itemRepository: Repository<MeasurementItem>,
    @InjectRepository(NonConformance)
    private readonly ncRepository: Repository<NonConformance>,
    @InjectRepository(Template)
    private readonly templateRepository: Repository<Template>,
  ) {}

  async complianceSummary(
    range: DateRange = {},
    department?: string,
  ): Promise<ComplianceSummaryReport> {
    const records = await this.recordRepository.find({
      where: { createdAt: dateRangeOperator(range), department },
    });
    return summarizeCompliance(records);
  }

  async departments(
    range: DateRange = {},
  ): Promise<DepartmentPerformanceRow[]> {
    const records = await this.recordRepository.find({
      where: { createdAt: dateRangeOperator(range) },
    });
    return departmentPerformance(records);
  }

  async inspectors(range: DateRange = {}): Promise<InspectorPerformanceRow[]> {
    const records = await this.recordRepository.find({
      where: { createdAt: dateRangeOperator(range) },
    });
    return inspectorPerformance(records);
  }

  async dashboard(now: Date = new Date()): Promise<DashboardSummary> {
    const [windowRecords, latestRecords, openNcs] = await Promise.all([
      this.recordRepository.find({
        where: {
          createdAt: dateRangeOperator({
            start: dashboardWindowStart(now),
            end: now,
          }),
        },
      }),
      this.recordRepository.find({
        order: { createdAt: 'DESC', id: 'DESC' },
        take: RECENT_RECORD_LIMIT,
      }),
      this.ncRepository
        .createQueryBuilder('nc')
        .where('nc.status != :closed', { closed: 'closed' })
        .getMany(),
    ]);

    const records = new Map<number, InspectionRecord>();
    for (const record of [...windowRecords, ...latestRecords]) {
      records.set(record.id, record);
    }
    return dashboardSummary([...records.values()], openNcs, now);
  }

  async trend(period: TrendPeriod, limit: number): Promise<TrendPoint[]> {
    const records = await this.recordRepository.find({
      order: { createdAt: 'ASC' },
    });
    return complianceTrend(records, period, limit);
  }

  /**
   * Criteria ordered by how often their items failed.
   */
  async criteriaFailures(top: number): Promise<CriterionFailureRow[]> {
    const rows = await this.itemRepository
      .createQueryBuilder('item')
      .innerJoin('item.criterion', 'criterion')
      .select('criterion.id', 'criterionId')
      .addSelect('criterion.code', 'code')
      .addSelect('criterion.title', 'title')
      .addSelect('criterion.severity', 'severity')
      .addSelect(
        "SUM(CASE WHEN item.compliance = 'fail' THEN 1 ELSE 0 END)",
        'failedCount',
      )
      .addSelect('COUNT(item.id)', 'totalCount')
      .groupBy('criterion.id')
      .having("SUM(CASE WHEN item.compliance = 'fail' THEN 1 ELSE 0 END) > 0")
      .orderBy('failedCount', 'DESC')
      .addOrderBy('criterion.code', 'ASC')
      .limit(top)
      .getRawMany<CriterionFailureRaw>();

    this.logger.debug(`Found ${rows.length} criteria with failures`);

    return rows.map((row) => {
      const failedCount = Number(row.failedCount);
      const totalCount = Number(row.totalCount);
      return {
        criterionId: Number(row.criterionId),
        code: row.code,
        title: row.title,
        severity: row.severity,
        failedCount,
        totalCount,
        failureRate: percentage(failedCount, totalCount),
      };
    });
  }

  async nonConformanceSummary(
    range: DateRange = {},
  ): Promise<NonConformanceSummaryReport> {
    const ncs = await this.ncRepository.find({
      where: { detectedDate: dateRangeOperator(range) },
    });
    return summarizeNonConformances(ncs);
  }

  async overdueNonConformances(
    now: Date = new Date(),
  ): Promise<OverdueNonConformance[]> {
    const unclosed = await this.ncRepository
      .createQueryBuilder('nc')
      .where('nc.status != :closed', { closed: 'closed' })
      .andWhere('nc.targetClosureDate IS NOT NULL')
      .getMany();
    return findOverdue(unclosed, now);
  }

  async templateUsage(): Promise<TemplateUsageRow[]> {
    const [templates, records] = await Promise.all([
      this.templateRepository.find(),
      this.recordRepository.find(),
    ]);
    return templateUsage(templates, records);
  }
}
