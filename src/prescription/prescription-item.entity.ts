import { Entity, PrimaryGeneratedColumn, Column, ManyToOne, JoinColumn } from 'typeorm';
import { Prescription } from './prescription.entity';
import { Medication } from '../medication/medication.entity';

@Entity('prescription_items')
export class PrescriptionItem {
  @PrimaryGeneratedColumn({ name: 'prescription_item_id' })
  id!: number;

  @Column({ name: 'prescription_id', type: 'int' })
  prescriptionId!: number;

  @ManyToOne(() => Prescription, (prescription) => prescription.items, { nullable: false, onDelete: 'CASCADE' })
  @JoinColumn({ name: 'prescription_id' })
  prescription?: Prescription;

  @Column({ name: 'medication_id', type: 'int' })
  medicationId!: number;

  @ManyToOne(() => Medication, { nullable: false, onDelete: 'RESTRICT' })
  @JoinColumn({ name: 'medication_id' })
  medication?: Medication;

  @Column({ type: 'varchar', length: 100 })
  dosage!: string;

  @Column({ type: 'varchar', length: 100 })
  frequency!: string;

  @Column({ name: 'duration_days', type: 'int', nullable: true })
  durationDays!: number | null;

  @Column({ type: 'text', nullable: true })
  instructions!: string | null;
}
