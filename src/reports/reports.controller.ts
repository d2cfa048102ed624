import { Controller, Get, Query } from '@nestjs/common';
import { ZodValidationPipe } from '../common/pipes/zod-validation.pipe';
import {
  DateRangeQuery,
  dateRangeQuerySchema,
} from '../common/validation/query.schemas';
import {
  ComplianceSummaryQuery,
  complianceSummaryQuerySchema,
  CriteriaFailuresQuery,
  criteriaFailuresQuerySchema,
  TrendQuery,
  trendQuerySchema,
} from './dto/report.schemas';
import { ReportsService } from './reports.service';
import {
  ComplianceSummaryReport,
  CriterionFailureRow,
  DashboardSummary,
  DepartmentPerformanceRow,
  InspectorPerformanceRow,
  NonConformanceSummaryReport,
  OverdueNonConformance,
  TemplateUsageRow,
  TrendPoint,
} from './reports.types';

/**
 * ReportsController
 *
 * JSON data behind the dashboard and printed reports.
 */
@Controller('reports')
export class ReportsController {
  constructor(private readonly reportsService: ReportsService) {}

  @Get('compliance-summary')
  async complianceSummary(
    @Query(new ZodValidationPipe(complianceSummaryQuerySchema))
    query: ComplianceSummaryQuery,
  ): Promise<ComplianceSummaryReport> {
    const { department, ...range } = query;
    return this.reportsService.complianceSummary(range, department);
  }

  @Get('dashboard')
  async dashboard(): Promise<DashboardSummary> {
    return this.reportsService.dashboard();
  }

  @Get('departments')
  async departments(
    @Query(new ZodValidationPipe(dateRangeQuerySchema)) range: DateRangeQuery,
  ): Promise<DepartmentPerformanceRow[]> {
    return this.reportsService.departments(range);
  }

  @Get('inspectors')
  async inspectors(
    @Query(new ZodValidationPipe(dateRangeQuerySchema)) range: DateRangeQuery,
  ): Promise<InspectorPerformanceRow[]> {
    return this.reportsService.inspectors(range);
  }

  @Get('trend')
  async trend(
    @Query(new ZodValidationPipe(trendQuerySchema)) query: TrendQuery,
  ): Promise<TrendPoint[]> {
    return this.reportsService.trend(query.period, query.limit);
  }

  @Get('criteria-failures')
  async criteriaFailures(
    @Query(new ZodValidationPipe(criteriaFailuresQuerySchema))
    query: CriteriaFailuresQuery,
  ): Promise<CriterionFailureRow[]> {
    return this.reportsService.criteriaFailures(query.top);
  }

  @Get('non-conformances')
  async nonConformanceSummary(
    @Query(new ZodValidationPipe(dateRangeQuerySchema)) range: DateRangeQuery,
  ): Promise<NonConformanceSummaryReport> {
    return this.reportsService.nonConformanceSummary(range);
  }

  @Get('non-conformances/overdue')
  async overdue(): Promise<OverdueNonConformance[]> {
    return this.reportsService.overdueNonConformances();
  }

  @Get('template-usage')
  async templateUsage(): Promise<TemplateUsageRow[]> {
    return this.reportsService.templateUsage();
  }
}
