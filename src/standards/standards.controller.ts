import {
  Body,
  Controller,
  Get,
  Logger,
  Param,
  ParseIntPipe,
  Patch,
  Post,
} from '@nestjs/common';
import { ZodValidationPipe } from '../common/pipes/zod-validation.pipe';
import { Criterion } from '../database/entities/criterion.entity';
import { Standard } from '../database/entities/standard.entity';
import {
  CreateCriterionDto,
  createCriterionSchema,
  CreateStandardDto,
  createStandardSchema,
  UpdateCriterionDto,
  updateCriterionSchema,
} from './dto/standard.schemas';
import { StandardsService, StandardWithCriteria } from './standards.service';

/**
 * StandardsController
 *
 * Endpoints:
 * - POST /standards
 * - GET /standards
 * - GET /standards/:id - with criteria in sort order
 * - POST /standards/:id/criteria
 */
@Controller('standards')
export class StandardsController {
  private readonly logger = new Logger(StandardsController.name);

  constructor(private readonly standardsService: StandardsService) {}

  @Post()
  async create(
    @Body(new ZodValidationPipe(createStandardSchema)) dto: CreateStandardDto,
  ): Promise<Standard> {
    this.logger.log(`POST /standards ${dto.code}`);
    return this.standardsService.createStandard(dto);
  }

  @Get()
  async list(): Promise<Standard[]> {
    return this.standardsService.listStandards();
  }

  @Get(':id')
  async get(
    @Param('id', ParseIntPipe) id: number,
  ): Promise<StandardWithCriteria> {
    return this.standardsService.getStandard(id);
  }

  @Post(':id/criteria')
  async addCriterion(
    @Param('id', ParseIntPipe) id: number,
    @Body(new ZodValidationPipe(createCriterionSchema)) dto: CreateCriterionDto,
  ): Promise<Criterion> {
    this.logger.log(`POST /standards/${id}/criteria ${dto.code}`);
    return this.standardsService.addCriterion(id, dto);
  }
}

@Controller('criteria')
export class CriteriaController {
  constructor(private readonly standardsService: StandardsService) {}

  @Patch(':id')
  async update(
    @Param('id', ParseIntPipe) id: number,
    @Body(new ZodValidationPipe(updateCriterionSchema)) dto: UpdateCriterionDto,
  ): Promise<Criterion> {
    return this.standardsService.updateCriterion(id, dto);
  }
}
