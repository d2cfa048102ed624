import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { InspectionRecord } from '../database/entities/inspection-record.entity';
import { MeasurementItem } from '../database/entities/measurement-item.entity';
import { NonConformance } from '../database/entities/non-conformance.entity';
import { NonConformancesController } from './non-conformances.controller';
import { NonConformancesService } from './non-conformances.service';

@Module({
  imports: [
    TypeOrmModule.forFeature([NonConformance, InspectionRecord, MeasurementItem]),
  ],
  controllers: [NonConformancesController],
  providers: [NonConformancesService],
})
export class NonConformancesModule {}
