import * as fs from 'node:fs';
import * as path from 'node:path';
import { Logger } from '@nestjs/common';
import { DataSource, DataSourceOptions } from 'typeorm';
import { Criterion } from './entities/criterion.entity';
import { InspectionRecord } from './entities/inspection-record.entity';
import { MeasurementItem } from './entities/measurement-item.entity';
import { NonConformance } from './entities/non-conformance.entity';
import { Standard } from './entities/standard.entity';
import { TemplateField } from './entities/template-field.entity';
import { Template } from './entities/template.entity';

export const ENTITIES = [
  Standard,
  Criterion,
  Template,
  TemplateField,
  InspectionRecord,
  MeasurementItem,
  NonConformance,
];

export interface DatabaseSettings {
  /** File path, or `:memory:` */
  database: string;
  synchronize: boolean;
  logging: boolean;
}

export const IN_MEMORY_DATABASE = ':memory:';

/**
 * TypeORM options for the local SQLite store. Creates the parent
 * directory of a file database so a fresh install starts cleanly.
 */
export function buildDataSourceOptions(
  settings: DatabaseSettings,
): DataSourceOptions {
  if (settings.database !== IN_MEMORY_DATABASE) {
    fs.mkdirSync(path.dirname(settings.database), { recursive: true });
  }
  return {
    type: 'better-sqlite3',
    database: settings.database,
    entities: ENTITIES,
    synchronize: settings.synchronize,
    logging: settings.logging,
  };
}

/**
 * Run `work` against a freshly initialized data source and always
 * destroy it afterwards. Used by stand-alone scripts; the Nest
 * application owns its own data source through TypeOrmModule.
 */
export async function withDataSource<T>(
  options: DataSourceOptions,
  work: (dataSource: DataSource) => Promise<T>,
): Promise<T> {
  const logger = new Logger('DataSource');
  const dataSource = new DataSource(options);
  await dataSource.initialize();
  logger.debug(`Connected to ${String(options.database)}`);
  try {
    return await work(dataSource);
  } finally {
    await dataSource.destroy();
  }
}
