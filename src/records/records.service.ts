import {
  ConflictException,
  Injectable,
  Logger,
  NotFoundException,
} from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Like, Repository } from 'typeorm';
import { insertWithDocumentNumber } from '../common/utils/document-number';
import { evaluate } from '../compliance/compliance.evaluator';
import { recompute } from '../compliance/record-summary';
import { Criterion } from '../database/entities/criterion.entity';
import { InspectionRecord } from '../database/entities/inspection-record.entity';
import { MeasurementItem } from '../database/entities/measurement-item.entity';
import { TemplateField } from '../database/entities/template-field.entity';
import { Template } from '../database/entities/template.entity';
import { toCriterionDefinition } from '../store/snapshot.mappers';
import { dateRangeOperator } from '../store/typeorm-measurement.store';
import {
  AddItemsDto,
  CorrectItemDto,
  CreateRecordDto,
  ListRecordsQuery,
} from './dto/record.schemas';

export interface RecordDetail {
  record: InspectionRecord;
  items: MeasurementItem[];
}

/**
 * Outcome of a batch insert. Items whose criterion is not on the
 * record's template are skipped and listed in `errors`.
 */
export interface AddItemsResult {
  record: InspectionRecord;
  inserted: number;
  skipped: number;
  errors: string[];
}

/**
 * RecordsService
 *
 * Owns the write path for inspection records: every insert or
 * correction evaluates the raw value and then recomputes the record's
 * compliance summary from all of its items.
 */
@Injectable()
export class RecordsService {
  private readonly logger = new Logger(RecordsService.name);

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

  async create(dto: CreateRecordDto): Promise<InspectionRecord> {
    const template = await this.templateRepository.findOne({
      where: { id: dto.templateId },
    });
    if (!template) {
      throw new NotFoundException(`Template ${dto.templateId} not found`);
    }

    const record = await insertWithDocumentNumber(
      'REC',
      (stem) =>
        this.recordRepository.count({
          where: { recordNumber: Like(`${stem}%`) },
        }),
      (recordNumber) =>
        this.recordRepository.save(
          this.recordRepository.create({
            recordNumber,
            templateId: template.id,
            standardId: template.standardId,
            title: dto.title ?? template.name,
            category: template.category,
            department: dto.department ?? null,
            batchNumber: dto.batchNumber ?? null,
            createdBy: dto.createdBy ?? null,
            notes: dto.notes ?? null,
            status: 'draft',
            completedAt: null,
            complianceScore: 0,
            overallCompliance: null,
            failedItemsCount: 0,
          }),
        ),
    );
    this.logger.log(
      `Created record ${record.recordNumber} for template ${template.code}`,
    );
    return record;
  }

  async findAll(query: ListRecordsQuery = {}): Promise<InspectionRecord[]> {
    return this.recordRepository.find({
      where: {
        templateId: query.templateId,
        createdAt: dateRangeOperator(query),
      },
      order: { createdAt: 'DESC', id: 'DESC' },
    });
  }

  async findOne(id: number): Promise<RecordDetail> {
    const record = await this.requireRecord(id);
    const items = await this.loadItems(id);
    return { record, items };
  }

  async addItems(recordId: number, dto: AddItemsDto): Promise<AddItemsResult> {
    const record = await this.requireRecord(recordId);
    if (record.status === 'completed') {
      throw new ConflictException(
        `Record ${record.recordNumber} is finalized; use the correction endpoint to change items`,
      );
    }

    const criteria = await this.loadTemplateCriteria(record.templateId);
    const errors: string[] = [];
    const entities: MeasurementItem[] = [];

    dto.items.forEach((entry, index) => {
      const criterion = criteria.get(entry.criterionId);
      if (!criterion) {
        errors.push(
          `Item ${index + 1}: criterion ${entry.criterionId} is not part of template ${record.templateId}`,
        );
        return;
      }

      const evaluation = evaluate(toCriterionDefinition(criterion), entry.value, {
        override: entry.override,
        acceptableOptions: entry.acceptableOptions,
      });

      entities.push(
        this.itemRepository.create({
          recordId: record.id,
          criterionId: criterion.id,
          value: entry.value,
          ...evaluation,
          remarks: entry.remarks ?? null,
          measuredAt: entry.measuredAt ?? new Date(),
          measuredBy: entry.measuredBy ?? record.createdBy,
          correctedAt: null,
          correctionReason: null,
        }),
      );
    });

    if (entities.length > 0) {
      await this.itemRepository.save(entities);
      if (record.status === 'draft') {
        record.status = 'in_progress';
      }
    }
    if (errors.length > 0) {
      this.logger.warn(
        `Record ${record.recordNumber}: skipped ${errors.length} item(s)`,
      );
    }

    const updated = await this.refreshSummary(record);
    return {
      record: updated,
      inserted: entities.length,
      skipped: errors.length,
      errors,
    };
  }

  /**
   * Correction path: replaces an item's value with a reason, re-evaluates
   * and recomputes. Allowed on finalized records.
   */
  async correctItem(
    recordId: number,
    itemId: number,
    dto: CorrectItemDto,
  ): Promise<RecordDetail> {
    const record = await this.requireRecord(recordId);
    const item = await this.itemRepository.findOne({
      where: { id: itemId, recordId },
      relations: { criterion: true },
    });
    if (!item || !item.criterion) {
      throw new NotFoundException(
        `Item ${itemId} not found in record ${record.recordNumber}`,
      );
    }

    const evaluation = evaluate(toCriterionDefinition(item.criterion), dto.value, {
      override: dto.override,
    });
    this.itemRepository.merge(item, {
      value: dto.value,
      ...evaluation,
      measuredBy: dto.measuredBy ?? item.measuredBy,
      correctedAt: new Date(),
      correctionReason: dto.reason,
    });
    // Drop the joined relation so save() writes the item columns only
    delete item.criterion;
    await this.itemRepository.save(item);

    this.logger.log(
      `Corrected item ${itemId} of record ${record.recordNumber}: ${dto.reason}`,
    );
    const updated = await this.refreshSummary(record);
    return { record: updated, items: await this.loadItems(recordId) };
  }

  async finalize(id: number): Promise<InspectionRecord> {
    const record = await this.requireRecord(id);
    if (record.status === 'completed') {
      throw new ConflictException(
        `Record ${record.recordNumber} is already finalized`,
      );
    }
    record.status = 'completed';
    record.completedAt = new Date();
    const saved = await this.recordRepository.save(record);
    this.logger.log(
      `Finalized record ${saved.recordNumber} (score ${saved.complianceScore})`,
    );
    return saved;
  }

  private async refreshSummary(
    record: InspectionRecord,
  ): Promise<InspectionRecord> {
    const items = await this.loadItems(record.id);
    const summary = recompute(items);
    record.complianceScore = summary.complianceScore;
    record.overallCompliance = summary.overallCompliance;
    record.failedItemsCount = summary.failedCount;
    return this.recordRepository.save(record);
  }

  private async loadItems(recordId: number): Promise<MeasurementItem[]> {
    return this.itemRepository.find({
      where: { recordId },
      order: { id: 'ASC' },
    });
  }

  private async loadTemplateCriteria(
    templateId: number,
  ): Promise<Map<number, Criterion>> {
    const fields = await this.fieldRepository.find({
      where: { templateId },
      relations: { criterion: true },
    });
    const criteria = new Map<number, Criterion>();
    for (const field of fields) {
      if (field.criterion) criteria.set(field.criterionId, field.criterion);
    }
    return criteria;
  }

  private async requireRecord(id: number): Promise<InspectionRecord> {
    const record = await this.recordRepository.findOne({ where: { id } });
    if (!record) {
      throw new NotFoundException(`Record ${id} not found`);
    }
    return record;
  }
}
