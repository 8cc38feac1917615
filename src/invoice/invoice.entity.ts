import {
  Entity,
  PrimaryGeneratedColumn,
  Column,
  ManyToOne,
  OneToMany,
  JoinColumn,
  CreateDateColumn,
} from 'typeorm';
import { Patient } from '../patient/patient.entity';
import { Appointment } from '../appointment/appointment.entity';
import { User } from '../user/user.entity';
import { InvoiceItem } from './invoice-item.entity';
import { decimalTransformer } from '../common/decimal.transformer';

export const INVOICE_STATUSES = ['pending', 'paid', 'void'] as const;
export type InvoiceStatus = (typeof INVOICE_STATUSES)[number];

/**
 * `totalAmount` is stored, not derived: it only matches the sum of the line
 * totals when written by `InvoiceService.create` or `recalculateTotal`.
 */
@Entity('invoices')
export class Invoice {
  @PrimaryGeneratedColumn({ name: 'invoice_id' })
  id!: number;

  @Column({ name: 'patient_id', type: 'int' })
  patientId!: number;

  @ManyToOne(() => Patient, { nullable: false, onDelete: 'RESTRICT' })
  @JoinColumn({ name: 'patient_id' })
  patient?: Patient;

  @Column({ name: 'appointment_id', type: 'int', nullable: true })
  appointmentId!: number | null;

  @ManyToOne(() => Appointment, { nullable: true, onDelete: 'SET NULL' })
  @JoinColumn({ name: 'appointment_id' })
  appointment?: Appointment | null;

  @Column({ name: 'invoice_date', type: 'date', default: () => 'CURRENT_DATE' })
  invoiceDate!: string;

  @Column({
    name: 'total_amount',
    type: 'decimal',
    precision: 12,
    scale: 2,
    default: 0,
    transformer: decimalTransformer,
  })
  totalAmount!: string;

  @Column({ type: 'simple-enum', enum: INVOICE_STATUSES, default: 'pending' })
  status!: InvoiceStatus;

  @Column({ name: 'created_by', type: 'int', nullable: true })
  createdById!: number | null;

  @ManyToOne(() => User, { nullable: true, onDelete: 'SET NULL' })
  @JoinColumn({ name: 'created_by' })
  createdBy?: User | null;

  @CreateDateColumn({ name: 'created_at' })
  createdAt!: Date;

  @OneToMany(() => InvoiceItem, (item) => item.invoice)
  items?: InvoiceItem[];
}
