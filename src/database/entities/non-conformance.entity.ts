import {
  Column,
  CreateDateColumn,
  Entity,
  JoinColumn,
  ManyToOne,
  PrimaryGeneratedColumn,
} from 'typeorm';
import type { Severity } from '../../compliance/compliance.types';
import { InspectionRecord } from './inspection-record.entity';
import { MeasurementItem } from './measurement-item.entity';

export const NON_CONFORMANCE_STATUSES = [
  'open',
  'investigating',
  'action_required',
  'closed',
] as const;
export type NonConformanceStatus = (typeof NON_CONFORMANCE_STATUSES)[number];

@Entity('non_conformances')
export class NonConformance {
  @PrimaryGeneratedColumn()
  id!: number;

  /** NC-YYYYMMDDHHMMSS-NNN */
  @Column({ type: 'varchar', length: 100, unique: true })
  ncNumber!: string;

  @Column({ type: 'integer', nullable: true })
  recordId!: number | null;

  @ManyToOne(() => InspectionRecord, { onDelete: 'SET NULL', nullable: true })
  @JoinColumn({ name: 'recordId' })
  record?: InspectionRecord | null;

  @Column({ type: 'integer', nullable: true })
  recordItemId!: number | null;

  @ManyToOne(() => MeasurementItem, { onDelete: 'SET NULL', nullable: true })
  @JoinColumn({ name: 'recordItemId' })
  recordItem?: MeasurementItem | null;

  @Column({ type: 'varchar', length: 500 })
  title!: string;

  @Column({ type: 'text' })
  description!: string;

  @Column({ type: 'varchar', length: 20 })
  severity!: Severity;

  @Column({ type: 'varchar', length: 100, nullable: true })
  category!: string | null;

  @Column({ type: 'varchar', length: 30, default: 'open' })
  status!: NonConformanceStatus;

  @Column({ type: 'text', nullable: true })
  rootCause!: string | null;

  @Column({ type: 'text', nullable: true })
  correctiveAction!: string | null;

  @Column({ type: 'datetime' })
  detectedDate!: Date;

  @Column({ type: 'datetime', nullable: true })
  targetClosureDate!: Date | null;

  @Column({ type: 'datetime', nullable: true })
  closedDate!: Date | null;

  @Column({ type: 'real', nullable: true })
  costImpact!: number | null;

  @Column({ type: 'boolean', default: false })
  customerImpact!: boolean;

  @CreateDateColumn({ type: 'datetime' })
  createdAt!: Date;
}
