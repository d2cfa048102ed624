import { Test, TestingModule } from '@nestjs/testing';
import { INestApplication } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { TypeOrmModule } from '@nestjs/typeorm';
import request from 'supertest';
import { App } from 'supertest/types';
import { validateEnvironment } from '../src/config/env.validation';
import { buildDataSourceOptions, IN_MEMORY_DATABASE } from '../src/database/data-source';
import { HealthModule } from '../src/health/health.module';
import { NonConformancesModule } from '../src/non-conformances/non-conformances.module';
import { RecordsModule } from '../src/records/records.module';
import { ReportsModule } from '../src/reports/reports.module';
import { StandardsModule } from '../src/standards/standards.module';
import { StatisticsModule } from '../src/statistics/statistics.module';

interface Created {
  id: number;
}

interface RecordBody {
  id: number;
  status: string;
  complianceScore: number;
  overallCompliance: boolean | null;
  failedItemsCount: number;
}

/**
 * E2E tests for the inspection workflow
 *
 * Runs the real modules against an in-memory SQLite database, so every
 * request goes through validation, evaluation and persistence.
 */
describe('Inspection workflow (e2e)', () => {
  let app: INestApplication<App>;

  beforeEach(async () => {
    const moduleFixture: TestingModule = await Test.createTestingModule({
      imports: [
        ConfigModule.forRoot({
          isGlobal: true,
          ignoreEnvFile: true,
          validate: () => validateEnvironment({ NODE_ENV: 'test' }),
        }),
        TypeOrmModule.forRoot(
          buildDataSourceOptions({
            database: IN_MEMORY_DATABASE,
            synchronize: true,
            logging: false,
          }),
        ),
        StandardsModule,
        RecordsModule,
        NonConformancesModule,
        ReportsModule,
        StatisticsModule,
        HealthModule,
      ],
    }).compile();

    app = moduleFixture.createNestApplication();
    await app.init();
  });

  afterEach(async () => {
    await app.close();
  });

  async function createLengthTemplate(): Promise<{
    templateId: number;
    criterionId: number;
  }> {
    const standard = await request(app.getHttpServer())
      .post('/standards')
      .send({ code: 'STD-E2E', name: 'Workflow standard' })
      .expect(201);
    const standardBody: Created = standard.body;

    const criterion = await request(app.getHttpServer())
      .post(`/standards/${standardBody.id}/criteria`)
      .send({
        code: 'DIM-001',
        title: 'Overall Length',
        dataType: 'numeric',
        limitMin: 99.5,
        limitMax: 100.5,
        unit: 'mm',
        severity: 'major',
      })
      .expect(201);
    const criterionBody: Created = criterion.body;

    const template = await request(app.getHttpServer())
      .post('/templates')
      .send({
        code: 'TPL-E2E',
        name: 'Length check',
        standardId: standardBody.id,
        criterionIds: [criterionBody.id],
      })
      .expect(201);
    const templateBody: Created = template.body;

    return { templateId: templateBody.id, criterionId: criterionBody.id };
  }

  async function recordWithValues(
    templateId: number,
    criterionId: number,
    values: number[],
  ): Promise<RecordBody> {
    const created = await request(app.getHttpServer())
      .post('/records')
      .send({ templateId })
      .expect(201);
    const record: RecordBody = created.body;
    expect(record.status).toBe('draft');

    const response = await request(app.getHttpServer())
      .post(`/records/${record.id}/items`)
      .send({ items: values.map((value) => ({ criterionId, value })) })
      .expect(201);
    const result: { record: RecordBody; inserted: number; skipped: number } =
      response.body;
    expect(result.inserted).toBe(values.length);
    expect(result.skipped).toBe(0);
    return result.record;
  }

  it('should score a record from its evaluated items', async () => {
    const { templateId, criterionId } = await createLengthTemplate();

    const record = await recordWithValues(templateId, criterionId, [
      99.9, 100.6, 100.0,
    ]);

    expect(record).toMatchObject({
      status: 'in_progress',
      complianceScore: 66.67,
      overallCompliance: false,
      failedItemsCount: 1,
    });
  });

  it('should give every record created back to back its own number', async () => {
    const { templateId } = await createLengthTemplate();
    const statuses: number[] = [];
    const numbers = new Set<string>();

    for (let i = 0; i < 150; i++) {
      const response = await request(app.getHttpServer())
        .post('/records')
        .send({ templateId });
      statuses.push(response.status);
      const body: { recordNumber: string } = response.body;
      numbers.add(body.recordNumber);
    }

    expect(statuses.filter((status) => status !== 201)).toEqual([]);
    expect(numbers.size).toBe(150);
  });

  it('should reject new items once a record is finalized', async () => {
    const { templateId, criterionId } = await createLengthTemplate();
    const record = await recordWithValues(templateId, criterionId, [100.0]);

    const finalized = await request(app.getHttpServer())
      .post(`/records/${record.id}/finalize`)
      .expect(200);
    const body: RecordBody = finalized.body;
    expect(body.status).toBe('completed');

    await request(app.getHttpServer())
      .post(`/records/${record.id}/items`)
      .send({ items: [{ criterionId, value: 100.1 }] })
      .expect(409);
  });

  it('should freeze evaluation fields of a criterion with measurements', async () => {
    const { templateId, criterionId } = await createLengthTemplate();
    await recordWithValues(templateId, criterionId, [100.0]);

    await request(app.getHttpServer())
      .patch(`/criteria/${criterionId}`)
      .send({ limitMax: 101 })
      .expect(409);
  });

  it('should aggregate the first numeric value of each record', async () => {
    const { templateId, criterionId } = await createLengthTemplate();
    await recordWithValues(templateId, criterionId, [99.9, 100.6]);
    await recordWithValues(templateId, criterionId, [100.1]);

    const response = await request(app.getHttpServer())
      .get(`/statistics/templates/${templateId}/criteria/${criterionId}`)
      .expect(200);
    const body: { kind: string; sampleCount: number; mean: number } =
      response.body;

    expect(body.kind).toBe('statistics');
    expect(body.sampleCount).toBe(2);
    expect(body.mean).toBeCloseTo(100, 10);
  });

  it('should report departments and the dashboard from recorded results', async () => {
    const { templateId, criterionId } = await createLengthTemplate();
    const entries = [
      { department: 'Assembly', createdBy: 'alice', value: 100.0 },
      { department: 'Machining', createdBy: 'bob', value: 100.6 },
    ];
    for (const entry of entries) {
      const created = await request(app.getHttpServer())
        .post('/records')
        .send({ templateId, department: entry.department, createdBy: entry.createdBy })
        .expect(201);
      const record: RecordBody = created.body;
      await request(app.getHttpServer())
        .post(`/records/${record.id}/items`)
        .send({ items: [{ criterionId, value: entry.value }] })
        .expect(201);
    }
    await request(app.getHttpServer())
      .post('/records')
      .send({ templateId })
      .expect(201);

    const departments = await request(app.getHttpServer())
      .get('/reports/departments')
      .expect(200);
    const departmentRows: Array<{ department: string; passRate: number }> =
      departments.body;
    expect(
      departmentRows.map((row) => [row.department, row.passRate]),
    ).toEqual([
      ['Assembly', 100],
      ['Machining', 0],
    ]);

    const dashboard = await request(app.getHttpServer())
      .get('/reports/dashboard')
      .expect(200);
    const summary: {
      recordCount: number;
      recentRecords: Array<{ compliance: string }>;
    } = dashboard.body;
    expect(summary.recordCount).toBe(3);
    expect(summary.recentRecords.map((r) => r.compliance)).toEqual([
      'Pending',
      'Fail',
      'Pass',
    ]);
  });

  it('should return 400 with the failing fields for an invalid body', async () => {
    const response = await request(app.getHttpServer())
      .post('/standards')
      .send({ code: 'STD-E2E' })
      .expect(400);
    const body: { message: string; issues: string[] } = response.body;

    expect(body.message).toBe('Validation failed');
    expect(body.issues).toEqual(['name: Required']);
  });

  it('should report health', async () => {
    const response = await request(app.getHttpServer())
      .get('/health')
      .expect(200);
    const body: { status: string; version: string } = response.body;

    expect(body.status).toBe('ok');
    expect(body.version).toBe('1.0.0');
  });
});
