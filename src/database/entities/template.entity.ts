import {
  Column,
  CreateDateColumn,
  Entity,
  JoinColumn,
  ManyToOne,
  OneToMany,
  PrimaryGeneratedColumn,
} from 'typeorm';
import { Standard } from './standard.entity';
import { TemplateField } from './template-field.entity';

/**
 * Template Entity
 *
 * An ordered selection of one standard's criteria, used as the form
 * for inspection records.
 */
@Entity('test_templates')
export class Template {
  @PrimaryGeneratedColumn()
  id!: number;

  @Column({ type: 'varchar', length: 100, unique: true })
  code!: string;

  @Column({ type: 'varchar', length: 255 })
  name!: string;

  @Column({ type: 'integer' })
  standardId!: number;

  @ManyToOne(() => Standard, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'standardId' })
  standard?: Standard;

  /** inspection, audit, calibration, ... */
  @Column({ type: 'varchar', length: 100, nullable: true })
  category!: string | null;

  @Column({ type: 'varchar', length: 50, default: '1.0' })
  version!: string;

  @Column({ type: 'text', nullable: true })
  description!: string | null;

  @Column({ type: 'boolean', default: true })
  isActive!: boolean;

  @OneToMany(() => TemplateField, (field) => field.template, {
    cascade: ['insert'],
  })
  fields?: TemplateField[];

  @CreateDateColumn({ type: 'datetime' })
  createdAt!: Date;
}
