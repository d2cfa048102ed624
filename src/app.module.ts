import { Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { TypeOrmModule } from '@nestjs/typeorm';
import { Environment, validateEnvironment } from './config/env.validation';
import { buildDataSourceOptions } from './database/data-source';
import { HealthModule } from './health/health.module';
import { NonConformancesModule } from './non-conformances/non-conformances.module';
import { RecordsModule } from './records/records.module';
import { ReportsModule } from './reports/reports.module';
import { StandardsModule } from './standards/standards.module';
import { StatisticsModule } from './statistics/statistics.module';
import { UpdaterModule } from './updater/updater.module';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      validate: validateEnvironment,
    }),
    TypeOrmModule.forRootAsync({
      imports: [ConfigModule],
      useFactory: (configService: ConfigService<Environment, true>) =>
        buildDataSourceOptions({
          database: configService.get('DB_PATH', { infer: true }),
          synchronize: configService.get('DB_SYNCHRONIZE', { infer: true }),
          logging: configService.get('DB_LOGGING', { infer: true }),
        }),
      inject: [ConfigService],
    }),
    StandardsModule,
    RecordsModule,
    NonConformancesModule,
    ReportsModule,
    StatisticsModule,
    UpdaterModule,
    HealthModule,
  ],
})
export class AppModule {}
