export const CRITERION_DATA_TYPES = [
  'numeric',
  'boolean',
  'select',
  'multiselect',
  'text',
] as const;
export type CriterionDataType = (typeof CRITERION_DATA_TYPES)[number];

export const REQUIREMENT_TYPES = ['mandatory', 'conditional', 'optional'] as const;
export type RequirementType = (typeof REQUIREMENT_TYPES)[number];

export const SEVERITIES = ['critical', 'major', 'minor'] as const;
export type Severity = (typeof SEVERITIES)[number];

export const COMPLIANCE_FLAGS = ['pass', 'fail', 'unknown'] as const;
export type ComplianceFlag = (typeof COMPLIANCE_FLAGS)[number];

/** Verdict a user may force on a free-text criterion. */
export type ComplianceOverride = Exclude<ComplianceFlag, 'unknown'>;

/**
 * Read-only view of a criterion, as the evaluator and aggregation
 * engine see it. Limits are `null` when unbounded.
 */
export interface CriterionDefinition {
  readonly id: number;
  readonly code: string;
  readonly title: string;
  readonly dataType: CriterionDataType;
  readonly requirementType: RequirementType;
  readonly severity: Severity;
  readonly limitMin: number | null;
  readonly limitMax: number | null;
  readonly unit: string | null;
  readonly acceptableOptions: readonly string[] | null;
}

export interface Evaluation {
  numericValue: number | null;
  compliance: ComplianceFlag;
  /** Signed distance to the violated limit; 0 on pass, null when not numeric. */
  deviation: number | null;
}

export interface EvaluateOptions {
  override?: ComplianceOverride;
  /** Takes precedence over the criterion's own allow-list. */
  acceptableOptions?: readonly string[];
}
