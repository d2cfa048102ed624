import {
  Column,
  CreateDateColumn,
  Entity,
  Index,
  JoinColumn,
  ManyToOne,
  PrimaryGeneratedColumn,
} from 'typeorm';
import type {
  CriterionDataType,
  RequirementType,
  Severity,
} from '../../compliance/compliance.types';
import { Standard } from './standard.entity';

/**
 * Criterion Entity
 *
 * One checkable requirement of a standard. Numeric criteria carry
 * optional inclusive limits (null = unbounded); select criteria carry
 * the offered options and the subset that counts as acceptable.
 *
 * Once measurement items reference a criterion, its data type, limits
 * and acceptable options are frozen (enforced in StandardsService).
 */
@Entity('standard_criteria')
@Index('idx_criteria_standard_code', ['standardId', 'code'], { unique: true })
export class Criterion {
  @PrimaryGeneratedColumn()
  id!: number;

  @Column({ type: 'integer' })
  standardId!: number;

  @ManyToOne(() => Standard, (standard) => standard.criteria, {
    onDelete: 'CASCADE',
  })
  @JoinColumn({ name: 'standardId' })
  standard?: Standard;

  /** Unique within the standard, e.g. "DIM-001" */
  @Column({ type: 'varchar', length: 50 })
  code!: string;

  @Column({ type: 'varchar', length: 500 })
  title!: string;

  @Column({ type: 'text', nullable: true })
  description!: string | null;

  @Column({ type: 'varchar', length: 20 })
  dataType!: CriterionDataType;

  @Column({ type: 'varchar', length: 20, default: 'mandatory' })
  requirementType!: RequirementType;

  @Column({ type: 'real', nullable: true })
  limitMin!: number | null;

  @Column({ type: 'real', nullable: true })
  limitMax!: number | null;

  @Column({ type: 'varchar', length: 50, nullable: true })
  unit!: string | null;

  @Column({ type: 'varchar', length: 20, default: 'minor' })
  severity!: Severity;

  /** Choices offered for select/multiselect criteria */
  @Column({ type: 'simple-json', nullable: true })
  options!: string[] | null;

  /** Allow-list used to judge select/multiselect values */
  @Column({ type: 'simple-json', nullable: true })
  acceptableOptions!: string[] | null;

  @Column({ type: 'text', nullable: true })
  helpText!: string | null;

  @Column({ type: 'integer', default: 0 })
  sortOrder!: number;

  @Column({ type: 'boolean', default: true })
  isActive!: boolean;

  @CreateDateColumn({ type: 'datetime' })
  createdAt!: Date;
}
