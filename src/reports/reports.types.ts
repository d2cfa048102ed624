export const TREND_PERIODS = ['day', 'month', 'year'] as const;
export type TrendPeriod = (typeof TREND_PERIODS)[number];

export interface ComplianceSummaryReport {
  totalRecords: number;
  passed: number;
  failed: number;
  /** Records without a pass/fail verdict yet */
  pending: number;
  passRate: number;
  averageScore: number;
  byStatus: Record<string, number>;
  byCategory: Record<string, number>;
}

export interface TrendPoint {
  period: string;
  total: number;
  passed: number;
  failed: number;
  passRate: number;
  averageScore: number;
}

export interface CriterionFailureRow {
  criterionId: number;
  code: string;
  title: string;
  severity: string;
  failedCount: number;
  totalCount: number;
  failureRate: number;
}

export interface NonConformanceSummaryReport {
  total: number;
  open: number;
  closed: number;
  closureRate: number;
  averageClosureDays: number;
  bySeverity: Record<string, number>;
  byStatus: Record<string, number>;
  byCategory: Record<string, number>;
  customerImpactCount: number;
  totalCostImpact: number;
}

export interface OverdueNonConformance {
  id: number;
  ncNumber: string;
  title: string;
  severity: string;
  status: string;
  targetClosureDate: string;
  daysOverdue: number;
}

export interface TemplateUsageRow {
  templateId: number;
  code: string;
  name: string;
  usageCount: number;
  averageScore: number;
}

export interface GroupPerformance {
  total: number;
  passed: number;
  failed: number;
  /** Over all records of the group, pending ones included */
  passRate: number;
  averageScore: number;
}

export interface DepartmentPerformanceRow extends GroupPerformance {
  department: string;
}

export interface InspectorPerformanceRow extends GroupPerformance {
  inspector: string;
}

export type VerdictLabel = 'Pass' | 'Fail' | 'Pending';

export interface RecentRecord {
  id: number;
  recordNumber: string;
  title: string | null;
  status: string;
  createdAt: string;
  compliance: VerdictLabel;
}

export interface DashboardSummary {
  windowDays: number;
  recordCount: number;
  averageScore: number;
  openNonConformances: number;
  openCriticalNonConformances: number;
  recentRecords: RecentRecord[];
}
