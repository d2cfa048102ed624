import { Test, TestingModule } from '@nestjs/testing';
import { getRepositoryToken } from '@nestjs/typeorm';
import { Between, MoreThanOrEqual } from 'typeorm';
import { InspectionRecord } from '../database/entities/inspection-record.entity';
import { MeasurementItem } from '../database/entities/measurement-item.entity';
import { NonConformance } from '../database/entities/non-conformance.entity';
import { Template } from '../database/entities/template.entity';
import { ReportsService } from './reports.service';

describe('ReportsService', () => {
  let service: ReportsService;

  const createQueryBuilderMock = (rows: unknown[]) => {
    const builder = {
      innerJoin: jest.fn().mockReturnThis(),
      select: jest.fn().mockReturnThis(),
      addSelect: jest.fn().mockReturnThis(),
      groupBy: jest.fn().mockReturnThis(),
      having: jest.fn().mockReturnThis(),
      orderBy: jest.fn().mockReturnThis(),
      addOrderBy: jest.fn().mockReturnThis(),
      limit: jest.fn().mockReturnThis(),
      where: jest.fn().mockReturnThis(),
      andWhere: jest.fn().mockReturnThis(),
      getRawMany: jest.fn().mockResolvedValue(rows),
      getMany: jest.fn().mockResolvedValue(rows),
    };
    return builder;
  };

  const recordRepository = { find: jest.fn() };
  const itemRepository = { createQueryBuilder: jest.fn() };
  const ncRepository = { find: jest.fn(), createQueryBuilder: jest.fn() };
  const templateRepository = { find: jest.fn() };

  beforeEach(async () => {
    jest.clearAllMocks();
    const module: TestingModule = await Test.createTestingModule({
      providers: [
        ReportsService,
        {
          provide: getRepositoryToken(InspectionRecord),
          useValue: recordRepository,
        },
        { provide: getRepositoryToken(MeasurementItem), useValue: itemRepository },
        { provide: getRepositoryToken(NonConformance), useValue: ncRepository },
        { provide: getRepositoryToken(Template), useValue: templateRepository },
      ],
    }).compile();

    service = module.get<ReportsService>(ReportsService);
  });

  describe('criteriaFailures', () => {
    it('should convert raw counts and compute failure rates', async () => {
      const builder = createQueryBuilderMock([
        {
          criterionId: 1,
          code: 'DIM-001',
          title: 'Overall Length',
          severity: 'major',
          failedCount: '3',
          totalCount: 8,
        },
      ]);
      itemRepository.createQueryBuilder.mockReturnValue(builder);

      const rows = await service.criteriaFailures(5);

      expect(builder.limit).toHaveBeenCalledWith(5);
      expect(rows).toEqual([
        {
          criterionId: 1,
          code: 'DIM-001',
          title: 'Overall Length',
          severity: 'major',
          failedCount: 3,
          totalCount: 8,
          failureRate: 37.5,
        },
      ]);
    });
  });

  describe('complianceSummary', () => {
    it('should filter by creation date and department', async () => {
      recordRepository.find.mockResolvedValue([]);
      const start = new Date('2024-01-01T00:00:00Z');

      const report = await service.complianceSummary({ start }, 'Assembly');

      expect(recordRepository.find).toHaveBeenCalledWith({
        where: { createdAt: MoreThanOrEqual(start), department: 'Assembly' },
      });
      expect(report.totalRecords).toBe(0);
    });
  });

  describe('overdueNonConformances', () => {
    it('should exclude closed NCs in the query', async () => {
      const builder = createQueryBuilderMock([
        {
          id: 4,
          ncNumber: 'NC-4',
          title: 'Scratch',
          severity: 'minor',
          status: 'open',
          targetClosureDate: new Date('2024-06-01T00:00:00Z'),
        },
      ]);
      ncRepository.createQueryBuilder.mockReturnValue(builder);

      const overdue = await service.overdueNonConformances(
        new Date('2024-06-03T00:00:00Z'),
      );

      expect(builder.where).toHaveBeenCalledWith('nc.status != :closed', {
        closed: 'closed',
      });
      expect(overdue).toEqual([
        {
          id: 4,
          ncNumber: 'NC-4',
          title: 'Scratch',
          severity: 'minor',
          status: 'open',
          targetClosureDate: '2024-06-01T00:00:00.000Z',
          daysOverdue: 2,
        },
      ]);
    });
  });

  describe('departments', () => {
    it('should group records created in the range by department', async () => {
      recordRepository.find.mockResolvedValue([
        { department: 'Assembly', createdBy: 'alice', complianceScore: 100, overallCompliance: true },
        { department: 'Assembly', createdBy: 'bob', complianceScore: 50, overallCompliance: false },
      ]);
      const start = new Date('2024-01-01T00:00:00Z');

      const rows = await service.departments({ start });

      expect(recordRepository.find).toHaveBeenCalledWith({
        where: { createdAt: MoreThanOrEqual(start) },
      });
      expect(rows).toEqual([
        { department: 'Assembly', total: 2, passed: 1, failed: 1, passRate: 50, averageScore: 75 },
      ]);
    });
  });

  describe('inspectors', () => {
    it('should group records by their creator', async () => {
      recordRepository.find.mockResolvedValue([
        { department: 'Assembly', createdBy: 'alice', complianceScore: 100, overallCompliance: true },
        { department: 'Assembly', createdBy: 'bob', complianceScore: 50, overallCompliance: false },
      ]);

      const rows = await service.inspectors();

      expect(rows.map((row) => [row.inspector, row.total, row.passRate])).toEqual([
        ['alice', 1, 100],
        ['bob', 1, 0],
      ]);
    });
  });

  describe('dashboard', () => {
    it('should merge the window and the latest records once each', async () => {
      const now = new Date('2024-06-30T12:00:00Z');
      const latest = {
        id: 1,
        recordNumber: 'REC-1',
        title: 'Line 3',
        status: 'completed',
        complianceScore: 80,
        overallCompliance: true,
        createdAt: new Date('2024-06-29T00:00:00Z'),
      };
      recordRepository.find
        .mockResolvedValueOnce([
          latest,
          {
            id: 2,
            recordNumber: 'REC-2',
            title: null,
            status: 'completed',
            complianceScore: 40,
            overallCompliance: false,
            createdAt: new Date('2024-06-20T00:00:00Z'),
          },
        ])
        .mockResolvedValueOnce([
          latest,
          {
            id: 3,
            recordNumber: 'REC-3',
            title: null,
            status: 'completed',
            complianceScore: 100,
            overallCompliance: true,
            createdAt: new Date('2024-05-01T00:00:00Z'),
          },
        ]);
      const builder = createQueryBuilderMock([
        { status: 'open', severity: 'critical' },
      ]);
      ncRepository.createQueryBuilder.mockReturnValue(builder);

      const summary = await service.dashboard(now);

      expect(recordRepository.find).toHaveBeenCalledWith({
        where: {
          createdAt: Between(new Date('2024-05-31T12:00:00Z'), now),
        },
      });
      expect(recordRepository.find).toHaveBeenCalledWith({
        order: { createdAt: 'DESC', id: 'DESC' },
        take: 5,
      });
      expect(builder.where).toHaveBeenCalledWith('nc.status != :closed', {
        closed: 'closed',
      });
      expect(summary.recordCount).toBe(2);
      expect(summary.averageScore).toBe(60);
      expect(summary.openNonConformances).toBe(1);
      expect(summary.openCriticalNonConformances).toBe(1);
      expect(summary.recentRecords.map((r) => r.recordNumber)).toEqual([
        'REC-1',
        'REC-2',
        'REC-3',
      ]);
    });
  });
});
