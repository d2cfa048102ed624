import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { Criterion } from '../database/entities/criterion.entity';
import { MeasurementItem } from '../database/entities/measurement-item.entity';
import { Standard } from '../database/entities/standard.entity';
import { TemplateField } from '../database/entities/template-field.entity';
import { Template } from '../database/entities/template.entity';
import {
  CriteriaController,
  StandardsController,
} from './standards.controller';
import { StandardsService } from './standards.service';
import { TemplatesController } from './templates.controller';
import { TemplatesService } from './templates.service';

/**
 * StandardsModule
 *
 * Inspection standards, their criteria, and the templates built from them.
 */
@Module({
  imports: [
    TypeOrmModule.forFeature([
      Standard,
      Criterion,
      Template,
      TemplateField,
      MeasurementItem,
    ]),
  ],
  controllers: [StandardsController, CriteriaController, TemplatesController],
  providers: [StandardsService, TemplatesService],
  exports: [StandardsService, TemplatesService],
})
export class StandardsModule {}
