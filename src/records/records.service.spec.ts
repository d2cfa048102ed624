import { ConflictException, NotFoundException } from '@nestjs/common';
import { Test, TestingModule } from '@nestjs/testing';
import { getRepositoryToken } from '@nestjs/typeorm';
import { Criterion } from '../database/entities/criterion.entity';
import { InspectionRecord } from '../database/entities/inspection-record.entity';
import { MeasurementItem } from '../database/entities/measurement-item.entity';
import { TemplateField } from '../database/entities/template-field.entity';
import { Template } from '../database/entities/template.entity';
import { RecordsService } from './records.service';

describe('RecordsService', () => {
  let service: RecordsService;
  let storedItems: MeasurementItem[];
  let storedRecord: InspectionRecord;

  const length = Object.assign(new Criterion(), {
    id: 1,
    code: 'DIM-001',
    title: 'Overall Length',
    dataType: 'numeric',
    requirementType: 'mandatory',
    severity: 'major',
    limitMin: 99.5,
    limitMax: 100.5,
    unit: 'mm',
    acceptableOptions: null,
  });

  const recordRepository = {
    count: jest.fn(),
    findOne: jest.fn(),
    find: jest.fn(),
    create: jest.fn((entity: Partial<InspectionRecord>) =>
      Object.assign(new InspectionRecord(), entity),
    ),
    save: jest.fn((record: InspectionRecord) => Promise.resolve(record)),
  };

  const itemRepository = {
    find: jest.fn(() => Promise.resolve([...storedItems])),
    findOne: jest.fn(),
    create: jest.fn((entity: Partial<MeasurementItem>) =>
      Object.assign(new MeasurementItem(), entity),
    ),
    merge: jest.fn((target: MeasurementItem, patch: Partial<MeasurementItem>) =>
      Object.assign(target, patch),
    ),
    save: jest.fn((input: MeasurementItem | MeasurementItem[]) => {
      const batch = Array.isArray(input) ? input : [input];
      for (const item of batch) {
        if (item.id === undefined) {
          item.id = storedItems.length + 1;
          storedItems.push(item);
        }
      }
      return Promise.resolve(input);
    }),
  };

  const templateRepository = { findOne: jest.fn() };
  const fieldRepository = {
    find: jest.fn(() =>
      Promise.resolve([{ templateId: 1, criterionId: 1, criterion: length }]),
    ),
  };

  beforeEach(async () => {
    jest.clearAllMocks();
    recordRepository.count.mockResolvedValue(0);
    storedItems = [];
    storedRecord = Object.assign(new InspectionRecord(), {
      id: 10,
      recordNumber: 'REC-20240601080000-001',
      templateId: 1,
      standardId: 1,
      status: 'draft',
      createdBy: 'inspector-1',
      complianceScore: 0,
      overallCompliance: null,
      failedItemsCount: 0,
    });
    recordRepository.findOne.mockImplementation(() =>
      Promise.resolve(storedRecord),
    );

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        RecordsService,
        {
          provide: getRepositoryToken(InspectionRecord),
          useValue: recordRepository,
        },
        { provide: getRepositoryToken(MeasurementItem), useValue: itemRepository },
        { provide: getRepositoryToken(Template), useValue: templateRepository },
        { provide: getRepositoryToken(TemplateField), useValue: fieldRepository },
      ],
    }).compile();

    service = module.get<RecordsService>(RecordsService);
  });

  describe('create', () => {
    it('should open a draft record from the template', async () => {
      templateRepository.findOne.mockResolvedValue({
        id: 1,
        code: 'FI-001',
        name: 'Final Inspection',
        standardId: 3,
        category: 'inspection',
      });

      const record = await service.create({ templateId: 1, batchNumber: 'B-7' });

      expect(record).toMatchObject({
        templateId: 1,
        standardId: 3,
        title: 'Final Inspection',
        category: 'inspection',
        batchNumber: 'B-7',
        status: 'draft',
        complianceScore: 0,
        overallCompliance: null,
        failedItemsCount: 0,
      });
      expect(record.recordNumber).toMatch(/^REC-\d{14}-001$/);
    });

    it('should number records after those already issued in the same second', async () => {
      templateRepository.findOne.mockResolvedValue({
        id: 1,
        code: 'FI-001',
        name: 'Final Inspection',
        standardId: 3,
        category: null,
      });
      recordRepository.count.mockResolvedValue(4);

      const record = await service.create({ templateId: 1 });

      expect(record.recordNumber).toMatch(/^REC-\d{14}-005$/);
    });

    it('should throw NotFoundException for an unknown template', async () => {
      templateRepository.findOne.mockResolvedValue(null);

      await expect(service.create({ templateId: 5 })).rejects.toThrow(
        NotFoundException,
      );
    });
  });

  describe('addItems', () => {
    it('should evaluate values and recompute the summary', async () => {
      const result = await service.addItems(10, {
        items: [
          { criterionId: 1, value: '99.9' },
          { criterionId: 1, value: '100.6' },
          { criterionId: 1, value: '100.0' },
        ],
      });

      expect(result.inserted).toBe(3);
      expect(result.skipped).toBe(0);
      expect(storedItems.map((item) => item.compliance)).toEqual([
        'pass',
        'fail',
        'pass',
      ]);
      expect(storedItems[1].deviation).toBeCloseTo(0.1, 10);
      expect(result.record).toMatchObject({
        status: 'in_progress',
        complianceScore: 66.67,
        overallCompliance: false,
        failedItemsCount: 1,
      });
    });

    it('should default the operator to the record creator', async () => {
      await service.addItems(10, { items: [{ criterionId: 1, value: '100' }] });

      expect(storedItems[0].measuredBy).toBe('inspector-1');
      expect(storedItems[0].measuredAt).toBeInstanceOf(Date);
    });

    it('should skip items whose criterion is not on the template', async () => {
      const result = await service.addItems(10, {
        items: [
          { criterionId: 1, value: '100' },
          { criterionId: 42, value: '1' },
        ],
      });

      expect(result.inserted).toBe(1);
      expect(result.skipped).toBe(1);
      expect(result.errors).toEqual([
        'Item 2: criterion 42 is not part of template 1',
      ]);
      expect(result.record.complianceScore).toBe(100);
    });

    it('should keep a draft record when nothing was inserted', async () => {
      const result = await service.addItems(10, {
        items: [{ criterionId: 42, value: '1' }],
      });

      expect(result.record.status).toBe('draft');
      expect(itemRepository.save).not.toHaveBeenCalled();
    });

    it('should refuse items on a finalized record', async () => {
      storedRecord.status = 'completed';

      await expect(
        service.addItems(10, { items: [{ criterionId: 1, value: '100' }] }),
      ).rejects.toThrow(ConflictException);
    });
  });

  describe('correctItem', () => {
    it('should re-evaluate the value and stamp the correction', async () => {
      await service.addItems(10, {
        items: [
          { criterionId: 1, value: '99.9' },
          { criterionId: 1, value: '100.6' },
        ],
      });
      storedRecord.status = 'completed';
      itemRepository.findOne.mockResolvedValue(
        Object.assign(storedItems[1], { criterion: length }),
      );

      const detail = await service.correctItem(10, 2, {
        value: '100.4',
        reason: 'Gauge misread',
      });

      expect(storedItems[1]).toMatchObject({
        value: '100.4',
        compliance: 'pass',
        deviation: 0,
        correctionReason: 'Gauge misread',
      });
      expect(storedItems[1].correctedAt).toBeInstanceOf(Date);
      expect(storedItems[1].criterion).toBeUndefined();
      expect(detail.record).toMatchObject({
        complianceScore: 100,
        overallCompliance: true,
        failedItemsCount: 0,
      });
      expect(detail.items).toHaveLength(2);
    });

    it('should throw NotFoundException for an item of another record', async () => {
      itemRepository.findOne.mockResolvedValue(null);

      await expect(
        service.correctItem(10, 99, { value: '1', reason: 'typo' }),
      ).rejects.toThrow(NotFoundException);
    });
  });

  describe('finalize', () => {
    it('should complete the record', async () => {
      const record = await service.finalize(10);

      expect(record.status).toBe('completed');
      expect(record.completedAt).toBeInstanceOf(Date);
    });

    it('should refuse to finalize twice', async () => {
      storedRecord.status = 'completed';

      await expect(service.finalize(10)).rejects.toThrow(
        'Record REC-20240601080000-001 is already finalized',
      );
    });
  });
});
