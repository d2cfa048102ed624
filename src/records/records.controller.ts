import {
  Body,
  Controller,
  Get,
  HttpCode,
  Logger,
  Param,
  ParseIntPipe,
  Post,
  Put,
  Query,
} from '@nestjs/common';
import { ZodValidationPipe } from '../common/pipes/zod-validation.pipe';
import { InspectionRecord } from '../database/entities/inspection-record.entity';
import {
  AddItemsDto,
  addItemsSchema,
  CorrectItemDto,
  correctItemSchema,
  CreateRecordDto,
  createRecordSchema,
  ListRecordsQuery,
  listRecordsQuerySchema,
} from './dto/record.schemas';
import { AddItemsResult, RecordDetail, RecordsService } from './records.service';

/**
 * RecordsController
 *
 * Endpoints:
 * - POST /records - open a draft record for a template
 * - GET /records?templateId&start&end
 * - GET /records/:id - record with items
 * - POST /records/:id/items - evaluate and store a batch of values
 * - PUT /records/:id/items/:itemId - correct one value (reason required)
 * - POST /records/:id/finalize
 */
@Controller('records')
export class RecordsController {
  private readonly logger = new Logger(RecordsController.name);

  constructor(private readonly recordsService: RecordsService) {}

  @Post()
  async create(
    @Body(new ZodValidationPipe(createRecordSchema)) dto: CreateRecordDto,
  ): Promise<InspectionRecord> {
    return this.recordsService.create(dto);
  }

  @Get()
  async list(
    @Query(new ZodValidationPipe(listRecordsQuerySchema)) query: ListRecordsQuery,
  ): Promise<InspectionRecord[]> {
    this.logger.log(`GET /records with query: ${JSON.stringify(query)}`);
    return this.recordsService.findAll(query);
  }

  @Get(':id')
  async get(@Param('id', ParseIntPipe) id: number): Promise<RecordDetail> {
    return this.recordsService.findOne(id);
  }

  @Post(':id/items')
  async addItems(
    @Param('id', ParseIntPipe) id: number,
    @Body(new ZodValidationPipe(addItemsSchema)) dto: AddItemsDto,
  ): Promise<AddItemsResult> {
    this.logger.log(`POST /records/${id}/items (${dto.items.length} items)`);
    return this.recordsService.addItems(id, dto);
  }

  @Put(':id/items/:itemId')
  async correctItem(
    @Param('id', ParseIntPipe) id: number,
    @Param('itemId', ParseIntPipe) itemId: number,
    @Body(new ZodValidationPipe(correctItemSchema)) dto: CorrectItemDto,
  ): Promise<RecordDetail> {
    return this.recordsService.correctItem(id, itemId, dto);
  }

  @Post(':id/finalize')
  @HttpCode(200)
  async finalize(
    @Param('id', ParseIntPipe) id: number,
  ): Promise<InspectionRecord> {
    return this.recordsService.finalize(id);
  }
}
