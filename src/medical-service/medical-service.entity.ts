import { Entity, PrimaryGeneratedColumn, Column, CreateDateColumn, Index } from 'typeorm';
import { decimalTransformer } from '../common/decimal.transformer';

/** Billable catalog entry: consultation type, lab test or procedure. */
@Entity('services')
@Index('idx_services_name', ['name'])
export class MedicalService {
  @PrimaryGeneratedColumn({ name: 'service_id' })
  id!: number;

  @Column({ type: 'varchar', length: 30, unique: true })
  code!: string;

  @Column({ type: 'varchar', length: 150 })
  name!: string;

  @Column({ type: 'text', nullable: true })
  description!: string | null;

  @Column({ type: 'decimal', precision: 12, scale: 2, default: 0, transformer: decimalTransformer })
  price!: string;

  @Column({ name: 'duration_minutes', type: 'int', default: 30 })
  durationMinutes!: number;

  @CreateDateColumn({ name: 'created_at' })
  createdAt!: Date;
}
