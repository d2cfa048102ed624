import {
  ConflictException,
  Injectable,
  Logger,
  NotFoundException,
} from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { Criterion } from '../database/entities/criterion.entity';
import { MeasurementItem } from '../database/entities/measurement-item.entity';
import { Standard } from '../database/entities/standard.entity';
import { assertCriterionShape } from './criterion.rules';
import {
  CreateCriterionDto,
  CreateStandardDto,
  UpdateCriterionDto,
} from './dto/standard.schemas';

/** Fields that decide compliance and freeze once measurements exist */
const EVALUATION_FIELDS = [
  'dataType',
  'limitMin',
  'limitMax',
  'acceptableOptions',
] as const;

export interface StandardWithCriteria extends Standard {
  criteria: Criterion[];
}

@Injectable()
export class StandardsService {
  private readonly logger = new Logger(StandardsService.name);

  constructor(
    @InjectRepository(Standard)
    private readonly standardRepository: Repository<Standard>,
    @InjectRepository(Criterion)
    private readonly criterionRepository: Repository<Criterion>,
    @InjectRepository(MeasurementItem)
    private readonly itemRepository: Repository<MeasurementItem>,
  ) {}

  async createStandard(dto: CreateStandardDto): Promise<Standard> {
    const duplicate = await this.standardRepository.exists({
      where: { code: dto.code },
    });
    if (duplicate) {
      throw new ConflictException(`Standard ${dto.code} already exists`);
    }

    const standard = await this.standardRepository.save(
      this.standardRepository.create({
        code: dto.code,
        name: dto.name,
        version: dto.version,
        description: dto.description ?? null,
        industry: dto.industry ?? null,
        isActive: true,
      }),
    );
    this.logger.log(`Created standard ${standard.code} (id ${standard.id})`);
    return standard;
  }

  async listStandards(): Promise<Standard[]> {
    return this.standardRepository.find({ order: { code: 'ASC' } });
  }

  async getStandard(id: number): Promise<StandardWithCriteria> {
    const standard = await this.requireStandard(id);
    const criteria = await this.criterionRepository.find({
      where: { standardId: id },
      order: { sortOrder: 'ASC', id: 'ASC' },
    });
    return { ...standard, criteria };
  }

  async addCriterion(
    standardId: number,
    dto: CreateCriterionDto,
  ): Promise<Criterion> {
    await this.requireStandard(standardId);

    const duplicate = await this.criterionRepository.exists({
      where: { standardId, code: dto.code },
    });
    if (duplicate) {
      throw new ConflictException(
        `Criterion ${dto.code} already exists in standard ${standardId}`,
      );
    }

    const shape = {
      dataType: dto.dataType,
      limitMin: dto.limitMin ?? null,
      limitMax: dto.limitMax ?? null,
      options: dto.options ?? null,
      acceptableOptions: dto.acceptableOptions ?? null,
    };
    assertCriterionShape(shape);

    const sortOrder =
      dto.sortOrder ??
      (await this.criterionRepository.count({ where: { standardId } }));

    const criterion = await this.criterionRepository.save(
      this.criterionRepository.create({
        ...shape,
        standardId,
        code: dto.code,
        title: dto.title,
        description: dto.description ?? null,
        requirementType: dto.requirementType,
        unit: dto.unit ?? null,
        severity: dto.severity,
        helpText: dto.helpText ?? null,
        sortOrder,
        isActive: dto.isActive ?? true,
      }),
    );
    this.logger.log(
      `Added criterion ${criterion.code} to standard ${standardId}`,
    );
    return criterion;
  }

  /**
   * Descriptive fields are always editable. Evaluation fields are
   * rejected with 409 once any measurement item references the criterion.
   */
  async updateCriterion(
    id: number,
    dto: UpdateCriterionDto,
  ): Promise<Criterion> {
    const criterion = await this.criterionRepository.findOne({ where: { id } });
    if (!criterion) {
      throw new NotFoundException(`Criterion ${id} not found`);
    }

    const touched = EVALUATION_FIELDS.filter(
      (field) => dto[field] !== undefined,
    );
    if (touched.length > 0) {
      const referenced = await this.itemRepository.exists({
        where: { criterionId: id },
      });
      if (referenced) {
        throw new ConflictException(
          `Criterion ${criterion.code} has recorded measurements; ${touched.join(', ')} can no longer change`,
        );
      }
    }

    const merged = {
      dataType: dto.dataType ?? criterion.dataType,
      limitMin: dto.limitMin !== undefined ? dto.limitMin : criterion.limitMin,
      limitMax: dto.limitMax !== undefined ? dto.limitMax : criterion.limitMax,
      options: dto.options !== undefined ? dto.options : criterion.options,
      acceptableOptions:
        dto.acceptableOptions !== undefined
          ? dto.acceptableOptions
          : criterion.acceptableOptions,
    };
    assertCriterionShape(merged);

    this.criterionRepository.merge(criterion, {
      ...merged,
      title: dto.title ?? criterion.title,
      description:
        dto.description !== undefined ? dto.description : criterion.description,
      requirementType: dto.requirementType ?? criterion.requirementType,
      unit: dto.unit !== undefined ? dto.unit : criterion.unit,
      severity: dto.severity ?? criterion.severity,
      helpText: dto.helpText !== undefined ? dto.helpText : criterion.helpText,
      sortOrder: dto.sortOrder ?? criterion.sortOrder,
      isActive: dto.isActive ?? criterion.isActive,
    });
    return this.criterionRepository.save(criterion);
  }

  private async requireStandard(id: number): Promise<Standard> {
    const standard = await this.standardRepository.findOne({ where: { id } });
    if (!standard) {
      throw new NotFoundException(`Standard ${id} not found`);
    }
    return standard;
  }
}
