import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { InspectionRecord } from '../database/entities/inspection-record.entity';
import { MeasurementItem } from '../database/entities/measurement-item.entity';
import { TemplateField } from '../database/entities/template-field.entity';
import { Template } from '../database/entities/template.entity';
import { MEASUREMENT_STORE } from './measurement-store.interface';
import { TypeOrmMeasurementStore } from './typeorm-measurement.store';

@Module({
  imports: [
    TypeOrmModule.forFeature([
      InspectionRecord,
      MeasurementItem,
      Template,
      TemplateField,
    ]),
  ],
  providers: [{ provide: MEASUREMENT_STORE, useClass: TypeOrmMeasurementStore }],
  exports: [MEASUREMENT_STORE],
})
export class StoreModule {}
