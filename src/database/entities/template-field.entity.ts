import {
  Column,
  CreateDateColumn,
  Entity,
  JoinColumn,
  ManyToOne,
  PrimaryGeneratedColumn,
} from 'typeorm';
import { Criterion } from './criterion.entity';
import { Template } from './template.entity';

@Entity('template_fields')
export class TemplateField {
  @PrimaryGeneratedColumn()
  id!: number;

  @Column({ type: 'integer' })
  templateId!: number;

  @ManyToOne(() => Template, (template) => template.fields, {
    onDelete: 'CASCADE',
  })
  @JoinColumn({ name: 'templateId' })
  template?: Template;

  @Column({ type: 'integer' })
  criterionId!: number;

  @ManyToOne(() => Criterion, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'criterionId' })
  criterion?: Criterion;

  @Column({ type: 'integer', default: 0 })
  sortOrder!: number;

  @Column({ type: 'boolean', default: true })
  isRequired!: boolean;

  @CreateDateColumn({ type: 'datetime' })
  createdAt!: Date;
}
