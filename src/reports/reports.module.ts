import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { InspectionRecord } from '../database/entities/inspection-record.entity';
import { MeasurementItem } from '../database/entities/measurement-item.entity';
import { NonConformance } from '../database/entities/non-conformance.entity';
import { Template } from '../database/entities/template.entity';
import { ReportsController } from './reports.controller';
import { ReportsService } from './reports.service';

@Module({
  imports: [
    TypeOrmModule.forFeature([
      InspectionRecord,
      MeasurementItem,
      NonConformance,
      Template,
    ]),
  ],
  controllers: [ReportsController],
  providers: [ReportsService],
})
export class ReportsModule {}
