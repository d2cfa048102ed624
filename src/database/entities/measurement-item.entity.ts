import {
  Column,
  CreateDateColumn,
  Entity,
  Index,
  JoinColumn,
  ManyToOne,
  PrimaryGeneratedColumn,
} from 'typeorm';
import type { ComplianceFlag } from '../../compliance/compliance.types';
import { Criterion } from './criterion.entity';
import { InspectionRecord } from './inspection-record.entity';

/**
 * Measurement Item Entity
 *
 * One observed value for one criterion within a record. Ascending id is
 * the record's item order. `numericValue`, `compliance` and `deviation`
 * are the evaluator's output for `value` and are rewritten together.
 */
@Entity('record_items')
@Index('idx_record_items_record', ['recordId'])
@Index('idx_record_items_criterion', ['criterionId'])
export class MeasurementItem {
  @PrimaryGeneratedColumn()
  id!: number;

  @Column({ type: 'integer' })
  recordId!: number;

  @ManyToOne(() => InspectionRecord, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'recordId' })
  record?: InspectionRecord;

  @Column({ type: 'integer' })
  criterionId!: number;

  @ManyToOne(() => Criterion, { onDelete: 'RESTRICT' })
  @JoinColumn({ name: 'criterionId' })
  criterion?: Criterion;

  /** Raw value as entered */
  @Column({ type: 'text', nullable: true })
  value!: string | null;

  @Column({ type: 'real', nullable: true })
  numericValue!: number | null;

  @Column({ type: 'varchar', length: 10, default: 'unknown' })
  compliance!: ComplianceFlag;

  @Column({ type: 'real', nullable: true })
  deviation!: number | null;

  @Column({ type: 'text', nullable: true })
  remarks!: string | null;

  @Column({ type: 'datetime' })
  measuredAt!: Date;

  @Column({ type: 'varchar', length: 255, nullable: true })
  measuredBy!: string | null;

  @Column({ type: 'datetime', nullable: true })
  correctedAt!: Date | null;

  @Column({ type: 'text', nullable: true })
  correctionReason!: string | null;

  @CreateDateColumn({ type: 'datetime' })
  createdAt!: Date;
}
