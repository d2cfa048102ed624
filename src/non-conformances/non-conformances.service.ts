import {
  BadRequestException,
  ConflictException,
  Injectable,
  Logger,
  NotFoundException,
} from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Like, Repository } from 'typeorm';
import { insertWithDocumentNumber } from '../common/utils/document-number';
import { NonConformance } from '../database/entities/non-conformance.entity';
import { MeasurementItem } from '../database/entities/measurement-item.entity';
import { InspectionRecord } from '../database/entities/inspection-record.entity';
import {
  CreateFromItemDto,
  CreateNonConformanceDto,
  ListNonConformancesQuery,
  UpdateNonConformanceDto,
} from './dto/non-conformance.schemas';
import { canTransition } from './non-conformance.transitions';

@Injectable()
export class NonConformancesService {
  private readonly logger = new Logger(NonConformancesService.name);

  constructor(
    @InjectRepository(NonConformance)
    private readonly ncRepository: Repository<NonConformance>,
    @InjectRepository(InspectionRecord)
    private readonly recordRepository: Repository<InspectionRecord>,
    @InjectRepository(MeasurementItem)
    private readonly itemRepository: Repository<MeasurementItem>,
  ) {}

  async create(dto: CreateNonConformanceDto): Promise<NonConformance> {
    if (dto.recordId !== undefined) {
      const exists = await this.recordRepository.exists({
        where: { id: dto.recordId },
      });
      if (!exists) {
        throw new NotFoundException(`Record ${dto.recordId} not found`);
      }
    }

    return this.persist({
      title: dto.title,
      description: dto.description,
      severity: dto.severity,
      category: dto.category ?? null,
      recordId: dto.recordId ?? null,
      recordItemId: dto.recordItemId ?? null,
      detectedDate: dto.detectedDate ?? new Date(),
      targetClosureDate: dto.targetClosureDate ?? null,
      costImpact: dto.costImpact ?? null,
      customerImpact: dto.customerImpact,
    });
  }

  /**
   * Raise an NC from a failed measurement, prefilled from its criterion.
   */
  async createFromItem(
    itemId: number,
    dto: CreateFromItemDto,
  ): Promise<NonConformance> {
    const item = await this.itemRepository.findOne({
      where: { id: itemId },
      relations: { criterion: true, record: true },
    });
    if (!item || !item.criterion) {
      throw new NotFoundException(`Record item ${itemId} not found`);
    }
    if (item.compliance !== 'fail') {
      throw new BadRequestException(
        `Record item ${itemId} did not fail (compliance: ${item.compliance})`,
      );
    }

    const { criterion } = item;
    const limits = describeLimits(criterion.limitMin, criterion.limitMax, criterion.unit);
    const recordLabel = item.record?.recordNumber ?? `record ${item.recordId}`;

    return this.persist({
      title: `${criterion.code} ${criterion.title} out of specification`,
      description:
        dto.description ??
        `Value "${item.value ?? ''}" recorded in ${recordLabel}${limits}`,
      severity: criterion.severity,
      category: dto.category ?? null,
      recordId: item.recordId,
      recordItemId: item.id,
      detectedDate: item.measuredAt,
      targetClosureDate: dto.targetClosureDate ?? null,
      costImpact: null,
      customerImpact: false,
    });
  }

  async findAll(query: ListNonConformancesQuery = {}): Promise<NonConformance[]> {
    return this.ncRepository.find({
      where: { status: query.status },
      order: { detectedDate: 'DESC', id: 'DESC' },
    });
  }

  async findOne(id: number): Promise<NonConformance> {
    const nc = await this.ncRepository.findOne({ where: { id } });
    if (!nc) {
      throw new NotFoundException(`Non-conformance ${id} not found`);
    }
    return nc;
  }

  async update(
    id: number,
    dto: UpdateNonConformanceDto,
  ): Promise<NonConformance> {
    const nc = await this.findOne(id);

    if (dto.status !== undefined && dto.status !== nc.status) {
      if (!canTransition(nc.status, dto.status)) {
        throw new ConflictException(
          `Non-conformance ${nc.ncNumber} cannot move from ${nc.status} to ${dto.status}`,
        );
      }
      this.logger.log(`${nc.ncNumber}: ${nc.status} -> ${dto.status}`);
      nc.closedDate = dto.status === 'closed' ? new Date() : null;
      nc.status = dto.status;
    }

    if (dto.rootCause !== undefined) nc.rootCause = dto.rootCause;
    if (dto.correctiveAction !== undefined) {
      nc.correctiveAction = dto.correctiveAction;
    }
    if (dto.targetClosureDate !== undefined) {
      nc.targetClosureDate = dto.targetClosureDate;
    }
    if (dto.costImpact !== undefined) nc.costImpact = dto.costImpact;
    if (dto.customerImpact !== undefined) nc.customerImpact = dto.customerImpact;

    return this.ncRepository.save(nc);
  }

  private async persist(
    fields: Omit<
      NonConformance,
      'id' | 'ncNumber' | 'status' | 'rootCause' | 'correctiveAction' | 'closedDate' | 'createdAt'
    >,
  ): Promise<NonConformance> {
    const nc = await insertWithDocumentNumber(
      'NC',
      (stem) =>
        this.ncRepository.count({ where: { ncNumber: Like(`${stem}%`) } }),
      (ncNumber) =>
        this.ncRepository.save(
          this.ncRepository.create({
            ...fields,
            ncNumber,
            status: 'open',
            rootCause: null,
            correctiveAction: null,
            closedDate: null,
          }),
        ),
    );
    this.logger.log(`Raised ${nc.ncNumber} (${nc.severity}): ${nc.title}`);
    return nc;
  }
}

function describeLimits(
  min: number | null,
  max: number | null,
  unit: string | null,
): string {
  if (min === null && max === null) return '';
  const suffix = unit ? ` ${unit}` : '';
  if (min !== null && max !== null) return `; limits ${min} to ${max}${suffix}`;
  if (min !== null) return `; minimum ${min}${suffix}`;
  return `; maximum ${String(max)}${suffix}`;
}
