import {
  BadRequestException,
  ConflictException,
  Injectable,
  Logger,
  NotFoundException,
} from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { In, Repository } from 'typeorm';
import { Criterion } from '../database/entities/criterion.entity';
import { Standard } from '../database/entities/standard.entity';
import { TemplateField } from '../database/entities/template-field.entity';
import { Template } from '../database/entities/template.entity';
import { CreateTemplateDto } from './dto/standard.schemas';

@Injectable()
export class TemplatesService {
  private readonly logger = new Logger(TemplatesService.name);

  constructor(
    @InjectRepository(Template)
    private readonly templateRepository: Repository<Template>,
    @InjectRepository(TemplateField)
    private readonly fieldRepository: Repository<TemplateField>,
    @InjectRepository(Standard)
    private readonly standardRepository: Repository<Standard>,
    @InjectRepository(Criterion)
    private readonly criterionRepository: Repository<Criterion>,
  ) {}

  /**
   * Create a template whose fields follow `criterionIds` order. Every
   * criterion must belong to the template's standard.
   */
  async createTemplate(dto: CreateTemplateDto): Promise<Template> {
    const standardExists = await this.standardRepository.exists({
      where: { id: dto.standardId },
    });
    if (!standardExists) {
      throw new NotFoundException(`Standard ${dto.standardId} not found`);
    }

    const duplicate = await this.templateRepository.exists({
      where: { code: dto.code },
    });
    if (duplicate) {
      throw new ConflictException(`Template ${dto.code} already exists`);
    }

    const uniqueIds = new Set(dto.criterionIds);
    if (uniqueIds.size !== dto.criterionIds.length) {
      throw new BadRequestException('criterionIds must not repeat');
    }

    const criteria = await this.criterionRepository.find({
      where: { id: In(dto.criterionIds), standardId: dto.standardId },
    });
    const found = new Set(criteria.map((criterion) => criterion.id));
    const foreign = dto.criterionIds.filter((id) => !found.has(id));
    if (foreign.length > 0) {
      throw new BadRequestException(
        `Criteria ${foreign.join(', ')} do not belong to standard ${dto.standardId}`,
      );
    }

    const template = await this.templateRepository.save(
      this.templateRepository.create({
        code: dto.code,
        name: dto.name,
        standardId: dto.standardId,
        category: dto.category ?? null,
        version: dto.version,
        description: dto.description ?? null,
        isActive: true,
      }),
    );
    await this.fieldRepository.save(
      dto.criterionIds.map((criterionId, index) =>
        this.fieldRepository.create({
          templateId: template.id,
          criterionId,
          sortOrder: index,
          isRequired: true,
        }),
      ),
    );

    this.logger.log(
      `Created template ${template.code} with ${dto.criterionIds.length} fields`,
    );
    return this.getTemplate(template.id);
  }

  async listTemplates(standardId?: number): Promise<Template[]> {
    return this.templateRepository.find({
      where: standardId !== undefined ? { standardId } : {},
      order: { code: 'ASC' },
    });
  }

  /** Template with its fields (and their criteria) in field order */
  async getTemplate(id: number): Promise<Template> {
    const template = await this.templateRepository.findOne({ where: { id } });
    if (!template) {
      throw new NotFoundException(`Template ${id} not found`);
    }
    template.fields = await this.fieldRepository.find({
      where: { templateId: id },
      relations: { criterion: true },
      order: { sortOrder: 'ASC', id: 'ASC' },
    });
    return template;
  }
}
