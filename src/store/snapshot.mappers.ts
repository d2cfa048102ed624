import { CriterionDefinition } from '../compliance/compliance.types';
import { Criterion } from '../database/entities/criterion.entity';
import { InspectionRecord } from '../database/entities/inspection-record.entity';
import { MeasurementItem } from '../database/entities/measurement-item.entity';
import {
  MeasurementItemSnapshot,
  RecordSnapshot,
} from './measurement-store.interface';

export function toCriterionDefinition(criterion: Criterion): CriterionDefinition {
  return {
    id: criterion.id,
    code: criterion.code,
    title: criterion.title,
    dataType: criterion.dataType,
    requirementType: criterion.requirementType,
    severity: criterion.severity,
    limitMin: criterion.limitMin,
    limitMax: criterion.limitMax,
    unit: criterion.unit,
    acceptableOptions: criterion.acceptableOptions
      ? [...criterion.acceptableOptions]
      : null,
  };
}

export function toRecordSnapshot(record: InspectionRecord): RecordSnapshot {
  return {
    id: record.id,
    recordNumber: record.recordNumber,
    templateId: record.templateId,
    status: record.status,
    createdAt: record.createdAt,
    completedAt: record.completedAt,
  };
}

export function toItemSnapshot(item: MeasurementItem): MeasurementItemSnapshot {
  return {
    id: item.id,
    recordId: item.recordId,
    criterionId: item.criterionId,
    value: item.value,
    numericValue: item.numericValue,
    compliance: item.compliance,
    deviation: item.deviation,
    measuredAt: item.measuredAt,
    measuredBy: item.measuredBy,
  };
}
