import {
  Body,
  Controller,
  Get,
  Param,
  ParseIntPipe,
  Patch,
  Post,
  Query,
} from '@nestjs/common';
import { ZodValidationPipe } from '../common/pipes/zod-validation.pipe';
import { NonConformance } from '../database/entities/non-conformance.entity';
import {
  CreateFromItemDto,
  createFromItemSchema,
  CreateNonConformanceDto,
  createNonConformanceSchema,
  ListNonConformancesQuery,
  listNonConformancesQuerySchema,
  UpdateNonConformanceDto,
  updateNonConformanceSchema,
} from './dto/non-conformance.schemas';
import { NonConformancesService } from './non-conformances.service';

@Controller('non-conformances')
export class NonConformancesController {
  constructor(private readonly ncService: NonConformancesService) {}

  @Post()
  async create(
    @Body(new ZodValidationPipe(createNonConformanceSchema))
    dto: CreateNonConformanceDto,
  ): Promise<NonConformance> {
    return this.ncService.create(dto);
  }

  @Post('from-item/:itemId')
  async createFromItem(
    @Param('itemId', ParseIntPipe) itemId: number,
    @Body(new ZodValidationPipe(createFromItemSchema)) dto: CreateFromItemDto,
  ): Promise<NonConformance> {
    return this.ncService.createFromItem(itemId, dto);
  }

  @Get()
  async list(
    @Query(new ZodValidationPipe(listNonConformancesQuerySchema))
    query: ListNonConformancesQuery,
  ): Promise<NonConformance[]> {
    return this.ncService.findAll(query);
  }

  @Get(':id')
  async get(@Param('id', ParseIntPipe) id: number): Promise<NonConformance> {
    return this.ncService.findOne(id);
  }

  @Patch(':id')
  async update(
    @Param('id', ParseIntPipe) id: number,
    @Body(new ZodValidationPipe(updateNonConformanceSchema))
    dto: UpdateNonConformanceDto,
  ): Promise<NonConformance> {
    return this.ncService.update(id, dto);
  }
}
