import { CriterionDefinition } from '../compliance/compliance.types';

export interface SamplePoint {
  recordId: number;
  recordLabel: string;
  recordedAt: Date;
  value: number;
  /** Outside the 3-sigma control limits */
  flagged: boolean;
}

export interface MovingRangePoint {
  recordId: number;
  recordLabel: string;
  value: number;
  /** Above the moving-range upper control limit */
  flagged: boolean;
}

export interface CriterionStatistics {
  kind: 'statistics';
  criterion: CriterionDefinition;
  sampleCount: number;
  mean: number;
  stddev: number;
  min: number;
  max: number;
  range: number;
  ucl: number;
  lcl: number;
  meanMovingRange: number;
  uclR: number;
  lclR: number;
  lowerLimit: number | null;
  upperLimit: number | null;
  unit: string | null;
  /** Values outside the criterion's own limits */
  outOfSpecCount: number;
  sampleSeries: SamplePoint[];
  movingRangeSeries: MovingRangePoint[];
}

export interface InsufficientData {
  kind: 'insufficient-data';
  criterion: CriterionDefinition;
  sampleCount: number;
  reason: string;
}

export type AggregationOutcome = CriterionStatistics | InsufficientData;

export interface TemplateStatisticsReport {
  templateId: number;
  recordCount: number;
  dateRange: { start: string | null; end: string | null };
  criteria: AggregationOutcome[];
}
