import {
  Column,
  CreateDateColumn,
  Entity,
  OneToMany,
  PrimaryGeneratedColumn,
} from 'typeorm';
import { Criterion } from './criterion.entity';

/**
 * Standard Entity
 *
 * A named, versioned set of inspection criteria (an ISO clause set,
 * a customer specification, an internal procedure).
 */
@Entity('standards')
export class Standard {
  @PrimaryGeneratedColumn()
  id!: number;

  /** Short unique identifier, e.g. "ISO-9001" */
  @Column({ type: 'varchar', length: 100, unique: true })
  code!: string;

  @Column({ type: 'varchar', length: 255 })
  name!: string;

  @Column({ type: 'varchar', length: 50, default: '1.0' })
  version!: string;

  @Column({ type: 'text', nullable: true })
  description!: string | null;

  @Column({ type: 'varchar', length: 100, nullable: true })
  industry!: string | null;

  @Column({ type: 'boolean', default: true })
  isActive!: boolean;

  @OneToMany(() => Criterion, (criterion) => criterion.standard)
  criteria?: Criterion[];

  @CreateDateColumn({ type: 'datetime' })
  createdAt!: Date;
}
