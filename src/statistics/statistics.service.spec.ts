import { NotFoundException } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Test, TestingModule } from '@nestjs/testing';
import {
  buildCriterion,
  buildItemSnapshot,
  buildRecordSnapshot,
  LENGTH_CRITERION,
} from '../../test/utils/mock-data';
import { InMemoryMeasurementStore } from '../../test/utils/test-helpers';
import { MEASUREMENT_STORE } from '../store/measurement-store.interface';
import { StatisticsService } from './statistics.service';

describe('StatisticsService', () => {
  let service: StatisticsService;
  let store: InMemoryMeasurementStore;
  const config = { STATISTICS_MAX_RECORDS: 100 };

  const finish = buildCriterion({
    id: 2,
    code: 'VIS-001',
    title: 'Surface Finish',
    dataType: 'select',
    limitMin: null,
    limitMax: null,
    unit: null,
    acceptableOptions: ['Excellent', 'Good'],
  });

  function addRecord(id: number, length: number): void {
    store.records.push(buildRecordSnapshot(id));
    store.items.push(
      buildItemSnapshot(id, {
        criterionId: LENGTH_CRITERION.id,
        value: String(length),
        numericValue: length,
      }),
      buildItemSnapshot(id, { criterionId: finish.id, value: 'Good' }),
    );
  }

  beforeEach(async () => {
    store = new InMemoryMeasurementStore();
    store.templates.set(1, [LENGTH_CRITERION, finish]);
    config.STATISTICS_MAX_RECORDS = 100;

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        StatisticsService,
        { provide: MEASUREMENT_STORE, useValue: store },
        {
          provide: ConfigService,
          useValue: {
            get: jest.fn((key: keyof typeof config) => config[key]),
          },
        },
      ],
    }).compile();

    service = module.get<StatisticsService>(StatisticsService);
  });

  describe('templateReport', () => {
    it('should aggregate every criterion in template order', async () => {
      addRecord(1, 99.9);
      addRecord(2, 100.1);
      addRecord(3, 100.0);

      const report = await service.templateReport(1);

      expect(report.templateId).toBe(1);
      expect(report.recordCount).toBe(3);
      expect(report.dateRange).toEqual({ start: null, end: null });
      expect(report.criteria.map((outcome) => outcome.kind)).toEqual([
        'statistics',
        'insufficient-data',
      ]);
      expect(report.criteria[1]).toMatchObject({
        reason: 'Criterion is not numeric',
      });
      const [length] = report.criteria;
      if (length.kind !== 'statistics') throw new Error('expected statistics');
      expect(length.mean).toBeCloseTo(100, 10);
      expect(length.sampleCount).toBe(3);
    });

    it('should only use the most recent records', async () => {
      config.STATISTICS_MAX_RECORDS = 2;
      addRecord(1, 50);
      addRecord(2, 10);
      addRecord(3, 14);

      const report = await service.templateReport(1);

      expect(report.recordCount).toBe(2);
      const [length] = report.criteria;
      if (length.kind !== 'statistics') throw new Error('expected statistics');
      expect(length.sampleSeries.map((point) => point.value)).toEqual([10, 14]);
    });

    it('should filter records by date range', async () => {
      addRecord(1, 10);
      addRecord(2, 12);
      addRecord(3, 14);
      const start = store.records[1].createdAt;

      const report = await service.templateReport(1, { start });

      expect(report.recordCount).toBe(2);
      expect(report.dateRange.start).toBe(start.toISOString());
    });

    it('should throw NotFoundException for an unknown template', async () => {
      await expect(service.templateReport(99)).rejects.toThrow(
        NotFoundException,
      );
    });
  });

  describe('criterionReport', () => {
    it('should aggregate a single criterion', async () => {
      addRecord(1, 10);

      const outcome = await service.criterionReport(1, LENGTH_CRITERION.id);

      expect(outcome).toMatchObject({
        kind: 'insufficient-data',
        sampleCount: 1,
      });
    });

    it('should reject a criterion outside the template', async () => {
      await expect(service.criterionReport(1, 77)).rejects.toThrow(
        'Criterion 77 is not part of template 1',
      );
    });
  });
});
