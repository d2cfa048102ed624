import { CriterionDefinition } from '../compliance/compliance.types';
import { RecordWithItems } from '../store/measurement-store.interface';
import {
  AggregationOutcome,
  InsufficientData,
  MovingRangePoint,
  SamplePoint,
} from './aggregation.types';
import {
  mean,
  movingRanges,
  sampleStandardDeviation,
} from './descriptive-statistics';

/** Control-chart constant D4 for moving ranges of two consecutive points */
export const D4_MOVING_RANGE = 3.267;
export const CONTROL_LIMIT_SIGMA = 3;
export const MIN_SAMPLE_COUNT = 2;

interface Sample {
  recordId: number;
  recordLabel: string;
  recordedAt: Date;
  value: number;
}

/**
 * First numeric value per record for the criterion, in record order.
 * Records without one do not contribute.
 */
export function collectSamples(
  criterionId: number,
  records: readonly RecordWithItems[],
): Sample[] {
  const samples: Sample[] = [];
  for (const { record, items } of records) {
    const item = items.find(
      (candidate) =>
        candidate.criterionId === criterionId &&
        candidate.numericValue !== null &&
        Number.isFinite(candidate.numericValue),
    );
    if (!item || item.numericValue === null) continue;
    samples.push({
      recordId: record.id,
      recordLabel: record.recordNumber,
      recordedAt: record.completedAt ?? record.createdAt,
      value: item.numericValue,
    });
  }
  return samples;
}

/**
 * Individuals / moving-range (I-MR) statistics for one numeric criterion.
 *
 * `records` must be chronological; moving ranges follow that order.
 * Returns an insufficient-data outcome instead of throwing.
 */
export function aggregate(
  criterion: CriterionDefinition,
  records: readonly RecordWithItems[],
): AggregationOutcome {
  if (criterion.dataType !== 'numeric') {
    return insufficient(criterion, 0, 'Criterion is not numeric');
  }

  const samples = collectSamples(criterion.id, records);
  if (samples.length < MIN_SAMPLE_COUNT) {
    return insufficient(
      criterion,
      samples.length,
      `At least ${MIN_SAMPLE_COUNT} numeric values are required, found ${samples.length}`,
    );
  }

  const values = samples.map((sample) => sample.value);
  const average = mean(values);
  const stddev = sampleStandardDeviation(values, average);
  const min = Math.min(...values);
  const max = Math.max(...values);
  const ucl = average + CONTROL_LIMIT_SIGMA * stddev;
  const lcl = average - CONTROL_LIMIT_SIGMA * stddev;

  const ranges = movingRanges(values);
  const meanMovingRange = mean(ranges);
  const uclR = D4_MOVING_RANGE * meanMovingRange;

  const sampleSeries: SamplePoint[] = samples.map((sample) => ({
    ...sample,
    flagged: sample.value > ucl || sample.value < lcl,
  }));

  const movingRangeSeries: MovingRangePoint[] = ranges.map((value, index) => ({
    recordId: samples[index + 1].recordId,
    recordLabel: samples[index + 1].recordLabel,
    value,
    flagged: value > uclR,
  }));

  const { limitMin, limitMax } = criterion;
  const outOfSpecCount = values.filter(
    (value) =>
      (limitMin !== null && value < limitMin) ||
      (limitMax !== null && value > limitMax),
  ).length;

  return {
    kind: 'statistics',
    criterion,
    sampleCount: values.length,
    mean: average,
    stddev,
    min,
    max,
    range: max - min,
    ucl,
    lcl,
    meanMovingRange,
    uclR,
    lclR: 0,
    lowerLimit: limitMin,
    upperLimit: limitMax,
    unit: criterion.unit,
    outOfSpecCount,
    sampleSeries,
    movingRangeSeries,
  };
}

function insufficient(
  criterion: CriterionDefinition,
  sampleCount: number,
  reason: string,
): InsufficientData {
  return { kind: 'insufficient-data', criterion, sampleCount, reason };
}
