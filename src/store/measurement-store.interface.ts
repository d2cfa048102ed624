import {
  ComplianceFlag,
  CriterionDefinition,
} from '../compliance/compliance.types';

export const MEASUREMENT_STORE = Symbol('MEASUREMENT_STORE');

export const RECORD_STATUSES = ['draft', 'in_progress', 'completed'] as const;
export type RecordStatus = (typeof RECORD_STATUSES)[number];

/** Inclusive bounds on record creation time */
export interface DateRange {
  start?: Date;
  end?: Date;
}

export interface RecordQuery extends DateRange {
  /** Keep only the most recent N records (still returned oldest first). */
  limit?: number;
}

export interface RecordSnapshot {
  readonly id: number;
  readonly recordNumber: string;
  readonly templateId: number;
  readonly status: RecordStatus;
  readonly createdAt: Date;
  readonly completedAt: Date | null;
}

export interface MeasurementItemSnapshot {
  readonly id: number;
  readonly recordId: number;
  readonly criterionId: number;
  readonly value: string | null;
  readonly numericValue: number | null;
  readonly compliance: ComplianceFlag;
  readonly deviation: number | null;
  readonly measuredAt: Date;
  readonly measuredBy: string | null;
}

export interface RecordWithItems {
  readonly record: RecordSnapshot;
  readonly items: readonly MeasurementItemSnapshot[];
}

/**
 * Read side used by the statistics pipeline. Implementations hand out
 * plain value objects, never live ORM entities.
 */
export interface MeasurementStore {
  /** Chronological: creation time ascending, id as tie-break. */
  getRecordsForTemplate(
    templateId: number,
    query?: RecordQuery,
  ): Promise<RecordSnapshot[]>;

  /** Items in stored order. */
  getItemsForRecord(recordId: number): Promise<MeasurementItemSnapshot[]>;

  /** Criteria in template field order, or null when the template is unknown. */
  getTemplateCriteria(templateId: number): Promise<CriterionDefinition[] | null>;
}
