import { roundTo } from '../common/utils/number-utils';
import { ComplianceFlag } from './compliance.types';

export interface ComplianceSummary {
  complianceScore: number;
  /** null until at least one item has a pass/fail verdict */
  overallCompliance: boolean | null;
  failedCount: number;
  passedCount: number;
  evaluatedCount: number;
}

/**
 * Derive a record's summary from its items. Items with an `unknown`
 * verdict count towards neither side.
 */
export function recompute(
  items: ReadonlyArray<{ readonly compliance: ComplianceFlag }>,
  precision = 2,
): ComplianceSummary {
  const passedCount = items.filter((item) => item.compliance === 'pass').length;
  const failedCount = items.filter((item) => item.compliance === 'fail').length;
  const evaluatedCount = passedCount + failedCount;

  return {
    complianceScore:
      evaluatedCount > 0
        ? roundTo((passedCount / evaluatedCount) * 100, precision)
        : 0,
    overallCompliance: evaluatedCount > 0 ? failedCount === 0 : null,
    failedCount,
    passedCount,
    evaluatedCount,
  };
}
