import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import {
  Between,
  FindOperator,
  LessThanOrEqual,
  MoreThanOrEqual,
  Repository,
} from 'typeorm';
import { CriterionDefinition } from '../compliance/compliance.types';
import { InspectionRecord } from '../database/entities/inspection-record.entity';
import { MeasurementItem } from '../database/entities/measurement-item.entity';
import { TemplateField } from '../database/entities/template-field.entity';
import { Template } from '../database/entities/template.entity';
import {
  DateRange,
  MeasurementItemSnapshot,
  MeasurementStore,
  RecordQuery,
  RecordSnapshot,
} from './measurement-store.interface';
import {
  toCriterionDefinition,
  toItemSnapshot,
  toRecordSnapshot,
} from './snapshot.mappers';

/** Inclusive find operator for an optional date range */
export function dateRangeOperator(
  range: DateRange,
): FindOperator<Date> | undefined {
  const { start, end } = range;
  if (start && end) return Between(start, end);
  if (start) return MoreThanOrEqual(start);
  if (end) return LessThanOrEqual(end);
  return undefined;
}

@Injectable()
export class TypeOrmMeasurementStore implements MeasurementStore {
  constructor(
    @InjectRepository(InspectionRecord)
    private readonly recordRepository: Repository<InspectionRecord>,
    @InjectRepository(MeasurementItem)
    private readonly itemRepository: Repository<MeasurementItem>,
    @InjectRepository(Template)
    private readonly templateRepository: Repository<Template>,
    @InjectRepository(TemplateField)
    private readonly fieldRepository: Repository<TemplateField>,
  ) {}

  async getRecordsForTemplate(
    templateId: number,
    query: RecordQuery = {},
  ): Promise<RecordSnapshot[]> {
    // Newest first so `take` keeps the most recent, then flip back
    const records = await this.recordRepository.find({
      where: { templateId, createdAt: dateRangeOperator(query) },
      order: { createdAt: 'DESC', id: 'DESC' },
      take: query.limit,
    });
    return records.reverse().map(toRecordSnapshot);
  }

  async getItemsForRecord(recordId: number): Promise<MeasurementItemSnapshot[]> {
    const items = await this.itemRepository.find({
      where: { recordId },
      order: { id: 'ASC' },
    });
    return items.map(toItemSnapshot);
  }

  async getTemplateCriteria(
    templateId: number,
  ): Promise<CriterionDefinition[] | null> {
    const exists = await this.templateRepository.exists({
      where: { id: templateId },
    });
    if (!exists) return null;

    const fields = await this.fieldRepository.find({
      where: { templateId },
      relations: { criterion: true },
      order: { sortOrder: 'ASC', id: 'ASC' },
    });
    return fields.flatMap((field) =>
      field.criterion ? [toCriterionDefinition(field.criterion)] : [],
    );
  }
}
