import {
  Body,
  Controller,
  Get,
  Logger,
  Param,
  ParseIntPipe,
  Post,
  Query,
} from '@nestjs/common';
import { z } from 'zod';
import { ZodValidationPipe } from '../common/pipes/zod-validation.pipe';
import { Template } from '../database/entities/template.entity';
import {
  CreateTemplateDto,
  createTemplateSchema,
} from './dto/standard.schemas';
import { TemplatesService } from './templates.service';

const listTemplatesQuerySchema = z.object({
  standardId: z.coerce.number().int().positive().optional(),
});

@Controller('templates')
export class TemplatesController {
  private readonly logger = new Logger(TemplatesController.name);

  constructor(private readonly templatesService: TemplatesService) {}

  @Post()
  async create(
    @Body(new ZodValidationPipe(createTemplateSchema)) dto: CreateTemplateDto,
  ): Promise<Template> {
    this.logger.log(`POST /templates ${dto.code}`);
    return this.templatesService.createTemplate(dto);
  }

  @Get()
  async list(
    @Query(new ZodValidationPipe(listTemplatesQuerySchema))
    query: z.infer<typeof listTemplatesQuerySchema>,
  ): Promise<Template[]> {
    return this.templatesService.listTemplates(query.standardId);
  }

  @Get(':id')
  async get(@Param('id', ParseIntPipe) id: number): Promise<Template> {
    return this.templatesService.getTemplate(id);
  }
}
