import { average, percentage, roundTo } from '../common/utils/number-utils';
import {
  ComplianceSummaryReport,
  DashboardSummary,
  DepartmentPerformanceRow,
  GroupPerformance,
  InspectorPerformanceRow,
  NonConformanceSummaryReport,
  OverdueNonConformance,
  TemplateUsageRow,
  TrendPeriod,
  TrendPoint,
  VerdictLabel,
} from './reports.types';

const DAY_MS = 24 * 60 * 60 * 1000;
const UNCATEGORIZED = 'uncategorized';

export const DASHBOARD_WINDOW_DAYS = 30;
export const RECENT_RECORD_LIMIT = 5;

export interface RecordFacts {
  templateId: number;
  status: string;
  category: string | null;
  complianceScore: number;
  overallCompliance: boolean | null;
  createdAt: Date;
}

export interface AttributedRecordFacts extends RecordFacts {
  department: string | null;
  createdBy: string | null;
}

export interface ListedRecordFacts extends RecordFacts {
  id: number;
  recordNumber: string;
  title: string | null;
}

export interface NonConformanceFacts {
  id: number;
  ncNumber: string;
  title: string;
  severity: string;
  status: string;
  category: string | null;
  detectedDate: Date;
  targetClosureDate: Date | null;
  closedDate: Date | null;
  costImpact: number | null;
  customerImpact: boolean;
}

function countBy<T>(rows: readonly T[], key: (row: T) => string): Record<string, number> {
  const counts: Record<string, number> = {};
  for (const row of rows) {
    const bucket = key(row);
    counts[bucket] = (counts[bucket] ?? 0) + 1;
  }
  return counts;
}

export function summarizeCompliance(
  records: readonly RecordFacts[],
): ComplianceSummaryReport {
  const passed = records.filter((r) => r.overallCompliance === true).length;
  const failed = records.filter((r) => r.overallCompliance === false).length;
  return {
    totalRecords: records.length,
    passed,
    failed,
    pending: records.length - passed - failed,
    passRate: percentage(passed, passed + failed),
    averageScore: roundTo(average(records.map((r) => r.complianceScore)), 2),
    byStatus: countBy(records, (r) => r.status),
    byCategory: countBy(records, (r) => r.category ?? UNCATEGORIZED),
  };
}

/** UTC bucket key: YYYY-MM-DD, YYYY-MM or YYYY */
export function periodKey(date: Date, period: TrendPeriod): string {
  const iso = date.toISOString();
  switch (period) {
    case 'day':
      return iso.slice(0, 10);
    case 'month':
      return iso.slice(0, 7);
    case 'year':
      return iso.slice(0, 4);
  }
}

/**
 * Per-period totals, oldest first, keeping only the latest `limit` periods.
 * The pass rate here is over all records of the period.
 */
export function complianceTrend(
  records: readonly RecordFacts[],
  period: TrendPeriod,
  limit: number,
): TrendPoint[] {
  const buckets = new Map<string, RecordFacts[]>();
  for (const record of records) {
    const key = periodKey(record.createdAt, period);
    const bucket = buckets.get(key) ?? [];
    bucket.push(record);
    buckets.set(key, bucket);
  }

  return [...buckets.entries()]
    .sort(([a], [b]) => a.localeCompare(b))
    .slice(-limit)
    .map(([key, rows]) => {
      const passed = rows.filter((r) => r.overallCompliance === true).length;
      const failed = rows.filter((r) => r.overallCompliance === false).length;
      return {
        period: key,
        total: rows.length,
        passed,
        failed,
        passRate: percentage(passed, rows.length),
        averageScore: roundTo(average(rows.map((r) => r.complianceScore)), 2),
      };
    });
}

export function summarizeNonConformances(
  ncs: readonly NonConformanceFacts[],
): NonConformanceSummaryReport {
  const closed = ncs.filter((nc) => nc.status === 'closed');
  const closureDays = ncs.flatMap((nc) =>
    nc.closedDate
      ? [Math.floor((nc.closedDate.getTime() - nc.detectedDate.getTime()) / DAY_MS)]
      : [],
  );

  return {
    total: ncs.length,
    open: ncs.length - closed.length,
    closed: closed.length,
    closureRate: percentage(closed.length, ncs.length),
    averageClosureDays: roundTo(average(closureDays), 1),
    bySeverity: countBy(ncs, (nc) => nc.severity),
    byStatus: countBy(ncs, (nc) => nc.status),
    byCategory: countBy(ncs, (nc) => nc.category ?? UNCATEGORIZED),
    customerImpactCount: ncs.filter((nc) => nc.customerImpact).length,
    totalCostImpact: roundTo(
      ncs.reduce((sum, nc) => sum + (nc.costImpact ?? 0), 0),
      2,
    ),
  };
}

/** Unclosed NCs past their target date, oldest target first */
export function findOverdue(
  ncs: readonly NonConformanceFacts[],
  now: Date,
): OverdueNonConformance[] {
  const overdue: OverdueNonConformance[] = [];
  for (const nc of ncs) {
    if (nc.status === 'closed' || !nc.targetClosureDate) continue;
    if (nc.targetClosureDate.getTime() >= now.getTime()) continue;
    overdue.push({
      id: nc.id,
      ncNumber: nc.ncNumber,
      title: nc.title,
      severity: nc.severity,
      status: nc.status,
      targetClosureDate: nc.targetClosureDate.toISOString(),
      daysOverdue: Math.floor(
        (now.getTime() - nc.targetClosureDate.getTime()) / DAY_MS,
      ),
    });
  }
  return overdue.sort((a, b) =>
    a.targetClosureDate.localeCompare(b.targetClosureDate),
  );
}

export function templateUsage(
  templates: ReadonlyArray<{ id: number; code: string; name: string }>,
  records: readonly RecordFacts[],
): TemplateUsageRow[] {
  return templates
    .map((template) => {
      const used = records.filter((r) => r.templateId === template.id);
      return {
        templateId: template.id,
        code: template.code,
        name: template.name,
        usageCount: used.length,
        averageScore: roundTo(average(used.map((r) => r.complianceScore)), 2),
      };
    })
    .sort((a, b) => b.usageCount - a.usageCount || a.code.localeCompare(b.code));
}

function groupPerformance<T extends RecordFacts>(
  records: readonly T[],
  key: (record: T) => string | null,
): Array<[string, GroupPerformance]> {
  const groups = new Map<string, T[]>();
  for (const record of records) {
    const name = key(record);
    if (name === null) continue;
    const group = groups.get(name) ?? [];
    group.push(record);
    groups.set(name, group);
  }

  return [...groups.entries()].map(([name, rows]): [string, GroupPerformance] => {
    const passed = rows.filter((r) => r.overallCompliance === true).length;
    const failed = rows.filter((r) => r.overallCompliance === false).length;
    return [
      name,
      {
        total: rows.length,
        passed,
        failed,
        passRate: percentage(passed, rows.length),
        averageScore: roundTo(average(rows.map((r) => r.complianceScore)), 2),
      },
    ];
  });
}

/** Best average score first; records without a department are left out */
export function departmentPerformance(
  records: readonly AttributedRecordFacts[],
): DepartmentPerformanceRow[] {
  return groupPerformance(records, (r) => r.department)
    .map(([department, figures]) => ({ department, ...figures }))
    .sort(
      (a, b) =>
        b.averageScore - a.averageScore ||
        a.department.localeCompare(b.department),
    );
}

/** Busiest inspector first; records without a creator are left out */
export function inspectorPerformance(
  records: readonly AttributedRecordFacts[],
): InspectorPerformanceRow[] {
  return groupPerformance(records, (r) => r.createdBy)
    .map(([inspector, figures]) => ({ inspector, ...figures }))
    .sort((a, b) => b.total - a.total || a.inspector.localeCompare(b.inspector));
}

export function verdictLabel(overallCompliance: boolean | null): VerdictLabel {
  if (overallCompliance === null) return 'Pending';
  return overallCompliance ? 'Pass' : 'Fail';
}

export function dashboardWindowStart(now: Date): Date {
  return new Date(now.getTime() - DASHBOARD_WINDOW_DAYS * DAY_MS);
}

/**
 * Landing-page figures. `records` may span any dates: only those created
 * within the window before `now` are counted, while the most recent ones
 * are listed regardless of age.
 */
export function dashboardSummary(
  records: readonly ListedRecordFacts[],
  ncs: ReadonlyArray<Pick<NonConformanceFacts, 'status' | 'severity'>>,
  now: Date,
): DashboardSummary {
  const windowStart = dashboardWindowStart(now).getTime();
  const inWindow = records.filter(
    (r) =>
      r.createdAt.getTime() >= windowStart &&
      r.createdAt.getTime() <= now.getTime(),
  );
  const open = ncs.filter((nc) => nc.status !== 'closed');

  const recentRecords = [...records]
    .sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime() || b.id - a.id)
    .slice(0, RECENT_RECORD_LIMIT)
    .map((r) => ({
      id: r.id,
      recordNumber: r.recordNumber,
      title: r.title,
      status: r.status,
      createdAt: r.createdAt.toISOString(),
      compliance: verdictLabel(r.overallCompliance),
    }));

  return {
    windowDays: DASHBOARD_WINDOW_DAYS,
    recordCount: inWindow.length,
    averageScore: roundTo(average(inWindow.map((r) => r.complianceScore)), 2),
    openNonConformances: open.length,
    openCriticalNonConformances: open.filter(
      (nc) => nc.severity === 'critical',
    ).length,
    recentRecords,
  };
}
