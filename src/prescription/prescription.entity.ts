import {
  Entity,
  PrimaryGeneratedColumn,
  Column,
  OneToOne,
  ManyToOne,
  OneToMany,
  JoinColumn,
  CreateDateColumn,
} from 'typeorm';
import { Appointment } from '../appointment/appointment.entity';
import { Doctor } from '../doctor/doctor.entity';
import { PrescriptionItem } from './prescription-item.entity';

@Entity('prescriptions')
export class Prescription {
  @PrimaryGeneratedColumn({ name: 'prescription_id' })
  id!: number;

  // at most one prescription per appointment
  @Column({ name: 'appointment_id', type: 'int' })
  appointmentId!: number;

  @OneToOne(() => Appointment, { nullable: false, onDelete: 'CASCADE' })
  @JoinColumn({ name: 'appointment_id' })
  appointment?: Appointment;

  @Column({ name: 'prescribed_by', type: 'int' })
  prescribedById!: number;

  @ManyToOne(() => Doctor, { nullable: false, onDelete: 'RESTRICT' })
  @JoinColumn({ name: 'prescribed_by' })
  prescribedBy?: Doctor;

  @Column({ type: 'text', nullable: true })
  notes!: string | null;

  @CreateDateColumn({ name: 'created_at' })
  createdAt!: Date;

  @OneToMany(() => PrescriptionItem, (item) => item.prescription)
  items?: PrescriptionItem[];
}
