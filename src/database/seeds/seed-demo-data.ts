/**
 * Demo Data Seeder
 *
 * Creates the "Final Product Inspection" standard with four criteria
 * (two dimensional, one visual, one functional), a daily inspection
 * template and 30 days of finalized records. Values come from a seeded
 * generator so every run produces the same data set:
 * - Dimensions land inside their limits ~90% of the time
 * - Surface finish is Excellent/Good ~95% of the time
 * - The functional test passes ~95% of the time
 *
 * Every item goes through the same evaluation as the API, and a
 * non-conformance is opened for each failed critical item.
 *
 * Run: npm run build && npm run seed
 */

import { Logger } from '@nestjs/common';
import { DataSource, EntityManager } from 'typeorm';
import { generateDocumentNumber } from '../../common/utils/document-number';
import { evaluate } from '../../compliance/compliance.evaluator';
import { CriterionDefinition } from '../../compliance/compliance.types';
import { recompute } from '../../compliance/record-summary';
import { validateEnvironment } from '../../config/env.validation';
import { toCriterionDefinition } from '../../store/snapshot.mappers';
import { buildDataSourceOptions, withDataSource } from '../data-source';
import { Criterion } from '../entities/criterion.entity';
import { InspectionRecord } from '../entities/inspection-record.entity';
import { MeasurementItem } from '../entities/measurement-item.entity';
import { NonConformance } from '../entities/non-conformance.entity';
import { Standard } from '../entities/standard.entity';
import { TemplateField } from '../entities/template-field.entity';
import { Template } from '../entities/template.entity';

const logger = new Logger('SeedDemoData');

const DAY_MS = 24 * 60 * 60 * 1000;
const HOUR_MS = 60 * 60 * 1000;
const INSPECTOR = 'demo.inspector';

export const DEMO_STANDARD_CODE = 'INTERNAL-FPI';
export const DEMO_TEMPLATE_CODE = 'FPI-DAILY';

type CriterionSeed = Pick<
  Criterion,
  | 'code'
  | 'title'
  | 'description'
  | 'dataType'
  | 'requirementType'
  | 'severity'
  | 'limitMin'
  | 'limitMax'
  | 'unit'
  | 'options'
  | 'acceptableOptions'
>;

const CRITERIA: CriterionSeed[] = [
  {
    code: 'DIM-001',
    title: 'Overall Length',
    description: 'Measure overall product length',
    dataType: 'numeric',
    requirementType: 'mandatory',
    severity: 'major',
    limitMin: 99.5,
    limitMax: 100.5,
    unit: 'mm',
    options: null,
    acceptableOptions: null,
  },
  {
    code: 'DIM-002',
    title: 'Width',
    description: 'Measure product width',
    dataType: 'numeric',
    requirementType: 'mandatory',
    severity: 'major',
    limitMin: 49.5,
    limitMax: 50.5,
    unit: 'mm',
    options: null,
    acceptableOptions: null,
  },
  {
    code: 'VIS-001',
    title: 'Surface Finish',
    description: 'Visual inspection of surface quality',
    dataType: 'select',
    requirementType: 'mandatory',
    severity: 'minor',
    limitMin: null,
    limitMax: null,
    unit: null,
    options: ['Excellent', 'Good', 'Fair', 'Poor'],
    acceptableOptions: ['Excellent', 'Good'],
  },
  {
    code: 'FUNC-001',
    title: 'Functional Test',
    description: 'Product operates correctly',
    dataType: 'boolean',
    requirementType: 'mandatory',
    severity: 'critical',
    limitMin: null,
    limitMax: null,
    unit: null,
    options: null,
    acceptableOptions: null,
  },
];

/**
 * Small seeded PRNG (mulberry32). Returns floats in [0, 1).
 */
export function createRandom(seed: number): () => number {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

const uniform = (random: () => number, min: number, max: number): number =>
  min + random() * (max - min);

const pick = <T>(random: () => number, values: readonly T[]): T =>
  values[Math.floor(random() * values.length)];

/**
 * Raw value an inspector would type for `criterion`.
 */
export function sampleValue(
  criterion: CriterionDefinition,
  random: () => number,
): string {
  switch (criterion.dataType) {
    case 'numeric': {
      const min = criterion.limitMin ?? 0;
      const max = criterion.limitMax ?? min + 1;
      const value =
        random() < 0.9
          ? uniform(random, min, max)
          : uniform(random, min - 1, max + 1);
      return value.toFixed(2);
    }
    case 'select':
    case 'multiselect':
      return random() < 0.95
        ? pick(random, ['Excellent', 'Good'])
        : pick(random, ['Fair', 'Poor']);
    case 'boolean':
      return random() < 0.95 ? 'Yes' : 'No';
    case 'text':
      return 'No remarks';
  }
}

export interface PlannedRecord {
  createdAt: Date;
  batchNumber: string;
  values: Array<{ criterionId: number; value: string }>;
}

export interface PlanOptions {
  days: number;
  /** Records are dated in the `days` days ending on this instant's date */
  now: Date;
  random: () => number;
}

/**
 * One to three records per day, oldest first, each with a value for
 * every criterion.
 */
export function planDemoRecords(
  criteria: readonly CriterionDefinition[],
  options: PlanOptions,
): PlannedRecord[] {
  const { days, now, random } = options;
  const today = Date.UTC(
    now.getUTCFullYear(),
    now.getUTCMonth(),
    now.getUTCDate(),
  );
  const planned: PlannedRecord[] = [];

  for (let dayOffset = 0; dayOffset < days; dayOffset++) {
    const day = today - (days - 1 - dayOffset) * DAY_MS;
    const perDay = 1 + Math.floor(random() * 3);
    for (let n = 0; n < perDay; n++) {
      planned.push({
        createdAt: new Date(day + (8 + n * 2) * HOUR_MS),
        batchNumber: `BATCH-${1000 + dayOffset}`,
        values: criteria.map((criterion) => ({
          criterionId: criterion.id,
          value: sampleValue(criterion, random),
        })),
      });
    }
  }
  return planned;
}

export interface SeedOptions {
  days?: number;
  seed?: number;
  now?: Date;
}

export interface SeedSummary {
  standardId: number;
  templateId: number;
  records: number;
  items: number;
  nonConformances: number;
}

/**
 * Write the demo data set in one transaction. Refuses to run twice
 * against the same database.
 */
export async function seedDemoData(
  dataSource: DataSource,
  options: SeedOptions = {},
): Promise<SeedSummary> {
  const { days = 30, seed = 42, now = new Date() } = options;

  return dataSource.transaction(async (manager) => {
    const existing = await manager.findOne(Standard, {
      where: { code: DEMO_STANDARD_CODE },
    });
    if (existing) {
      throw new Error(
        `Standard ${DEMO_STANDARD_CODE} already exists; seed a fresh database`,
      );
    }

    const standard = await manager.save(
      manager.create(Standard, {
        code: DEMO_STANDARD_CODE,
        name: 'Final Product Inspection Standard',
        version: '1.0',
        description: 'Internal standard for final product inspection',
        industry: 'Manufacturing',
        isActive: true,
      }),
    );

    const criteria = await manager.save(
      CRITERIA.map((entry, index) =>
        manager.create(Criterion, {
          ...entry,
          standardId: standard.id,
          helpText: null,
          sortOrder: index,
          isActive: true,
        }),
      ),
    );

    const template = await manager.save(
      manager.create(Template, {
        code: DEMO_TEMPLATE_CODE,
        name: 'Daily Final Product Inspection',
        standardId: standard.id,
        category: 'inspection',
        version: '1.0',
        description: 'Daily inspection form for final products',
        isActive: true,
      }),
    );
    await manager.save(
      criteria.map((criterion, index) =>
        manager.create(TemplateField, {
          templateId: template.id,
          criterionId: criterion.id,
          sortOrder: index,
          isRequired: true,
        }),
      ),
    );

    const definitions = criteria.map(toCriterionDefinition);
    const plan = planDemoRecords(definitions, {
      days,
      now,
      random: createRandom(seed),
    });

    let items = 0;
    let nonConformances = 0;
    for (const [index, entry] of plan.entries()) {
      const written = await writeRecord(manager, template, definitions, entry, index);
      items += written.items;
      nonConformances += written.nonConformances;
    }

    logger.log(
      `Seeded ${plan.length} records (${items} items, ${nonConformances} non-conformances) for ${template.code}`,
    );
    return {
      standardId: standard.id,
      templateId: template.id,
      records: plan.length,
      items,
      nonConformances,
    };
  });
}

async function writeRecord(
  manager: EntityManager,
  template: Template,
  definitions: readonly CriterionDefinition[],
  entry: PlannedRecord,
  sequence: number,
): Promise<{ items: number; nonConformances: number }> {
  const evaluated = entry.values.map((value) => {
    const criterion = definitions.find((c) => c.id === value.criterionId);
    if (!criterion) {
      throw new Error(`Criterion ${value.criterionId} missing from plan`);
    }
    return { criterion, value: value.value, ...evaluate(criterion, value.value) };
  });
  const summary = recompute(evaluated);

  const record = await manager.save(
    manager.create(InspectionRecord, {
      recordNumber: generateDocumentNumber('REC', entry.createdAt, sequence % 1000),
      templateId: template.id,
      standardId: template.standardId,
      title: `Daily Inspection - ${entry.batchNumber}`,
      category: template.category,
      department: 'Production',
      batchNumber: entry.batchNumber,
      createdBy: INSPECTOR,
      status: 'completed',
      completedAt: new Date(entry.createdAt.getTime() + HOUR_MS),
      notes: null,
      complianceScore: summary.complianceScore,
      overallCompliance: summary.overallCompliance,
      failedItemsCount: summary.failedCount,
      createdAt: entry.createdAt,
    }),
  );

  const items = await manager.save(
    evaluated.map((item) =>
      manager.create(MeasurementItem, {
        recordId: record.id,
        criterionId: item.criterion.id,
        value: item.value,
        numericValue: item.numericValue,
        compliance: item.compliance,
        deviation: item.deviation,
        remarks: null,
        measuredAt: entry.createdAt,
        measuredBy: INSPECTOR,
        correctedAt: null,
        correctionReason: null,
      }),
    ),
  );

  const critical = items.filter(
    (item, index) =>
      item.compliance === 'fail' &&
      evaluated[index].criterion.severity === 'critical',
  );
  for (const item of critical) {
    await manager.save(
      manager.create(NonConformance, {
        ncNumber: generateDocumentNumber('NC', entry.createdAt, sequence % 1000),
        recordId: record.id,
        recordItemId: item.id,
        title: 'Functional test failed',
        description: `Functional test failed on ${entry.batchNumber} (${record.recordNumber})`,
        severity: 'critical',
        category: 'product',
        status: 'open',
        rootCause: null,
        correctiveAction: null,
        detectedDate: entry.createdAt,
        targetClosureDate: new Date(entry.createdAt.getTime() + 7 * DAY_MS),
        closedDate: null,
        costImpact: null,
        customerImpact: false,
      }),
    );
  }

  return { items: items.length, nonConformances: critical.length };
}

if (require.main === module) {
  const env = validateEnvironment(process.env);
  withDataSource(
    buildDataSourceOptions({
      database: env.DB_PATH,
      synchronize: true,
      logging: env.DB_LOGGING,
    }),
    (dataSource) => seedDemoData(dataSource),
  )
    .then(() => {
      logger.log('Seed completed successfully');
      process.exit(0);
    })
    .catch((error: unknown) => {
      logger.error(
        `Seed failed: ${error instanceof Error ? error.message : String(error)}`,
      );
      process.exit(1);
    });
}
