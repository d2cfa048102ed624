import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { InspectionRecord } from '../database/entities/inspection-record.entity';
import { MeasurementItem } from '../database/entities/measurement-item.entity';
import { TemplateField } from '../database/entities/template-field.entity';
import { Template } from '../database/entities/template.entity';
import { RecordsController } from './records.controller';
import { RecordsService } from './records.service';

@Module({
  imports: [
    TypeOrmModule.forFeature([
      InspectionRecord,
      MeasurementItem,
      Template,
      TemplateField,
    ]),
  ],
  controllers: [RecordsController],
  providers: [RecordsService],
  exports: [RecordsService],
})
export class RecordsModule {}
