import {
  Column,
  CreateDateColumn,
  Entity,
  Index,
  JoinColumn,
  ManyToOne,
  PrimaryGeneratedColumn,
} from 'typeorm';
import type { RecordStatus } from '../../store/measurement-store.interface';
import { Template } from './template.entity';

/**
 * Inspection Record Entity
 *
 * One filled-in template. `complianceScore`, `overallCompliance` and
 * `failedItemsCount` are derived from the record's items by
 * `recompute()` and are only written by RecordsService.
 */
@Entity('records')
@Index('idx_records_template_created', ['templateId', 'createdAt'])
export class InspectionRecord {
  @PrimaryGeneratedColumn()
  id!: number;

  /** REC-YYYYMMDDHHMMSS-NNN */
  @Column({ type: 'varchar', length: 100, unique: true })
  recordNumber!: string;

  @Column({ type: 'integer' })
  templateId!: number;

  @ManyToOne(() => Template, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'templateId' })
  template?: Template;

  @Column({ type: 'integer' })
  standardId!: number;

  @Column({ type: 'varchar', length: 255, nullable: true })
  title!: string | null;

  @Column({ type: 'varchar', length: 100, nullable: true })
  category!: string | null;

  @Column({ type: 'varchar', length: 100, nullable: true })
  department!: string | null;

  @Column({ type: 'varchar', length: 100, nullable: true })
  batchNumber!: string | null;

  /** Operator who opened the record */
  @Column({ type: 'varchar', length: 255, nullable: true })
  createdBy!: string | null;

  @Column({ type: 'varchar', length: 20, default: 'draft' })
  status!: RecordStatus;

  @Column({ type: 'datetime', nullable: true })
  completedAt!: Date | null;

  @Column({ type: 'text', nullable: true })
  notes!: string | null;

  @Column({ type: 'real', default: 0 })
  complianceScore!: number;

  @Column({ type: 'boolean', nullable: true })
  overallCompliance!: boolean | null;

  @Column({ type: 'integer', default: 0 })
  failedItemsCount!: number;

  @CreateDateColumn({ type: 'datetime' })
  createdAt!: Date;
}
