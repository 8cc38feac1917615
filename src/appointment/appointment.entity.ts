import {
  Entity,
  PrimaryGeneratedColumn,
  Column,
  ManyToOne,
  OneToMany,
  JoinColumn,
  CreateDateColumn,
  UpdateDateColumn,
  Check,
  Index,
} from 'typeorm';
import { Patient } from '../patient/patient.entity';
import { Doctor } from '../doctor/doctor.entity';
import { Room } from '../room/room.entity';
import { User } from '../user/user.entity';
import { AppointmentServiceItem } from './appointment-service-item.entity';

export const APPOINTMENT_STATUSES = [
  'scheduled',
  'checked_in',
  'in_progress',
  'completed',
  'cancelled',
  'no_show',
] as const;
export type AppointmentStatus = (typeof APPOINTMENT_STATUSES)[number];

// No overlap constraint: the same doctor or room may be double-booked.
@Entity('appointments')
@Index('idx_appointments_patient', ['patientId'])
@Index('idx_appointments_doctor', ['doctorId'])
@Check('chk_times', '"scheduled_end" > "scheduled_start"')
export class Appointment {
  @PrimaryGeneratedColumn({ name: 'appointment_id' })
  id!: number;

  @Column({ name: 'patient_id', type: 'int' })
  patientId!: number;

  @ManyToOne(() => Patient, { nullable: false, onDelete: 'RESTRICT' })
  @JoinColumn({ name: 'patient_id' })
  patient?: Patient;

  @Column({ name: 'doctor_id', type: 'int' })
  doctorId!: number;

  @ManyToOne(() => Doctor, { nullable: false, onDelete: 'RESTRICT' })
  @JoinColumn({ name: 'doctor_id' })
  doctor?: Doctor;

  @Column({ name: 'room_id', type: 'int', nullable: true })
  roomId!: number | null;

  @ManyToOne(() => Room, { nullable: true, onDelete: 'SET NULL' })
  @JoinColumn({ name: 'room_id' })
  room?: Room | null;

  @Column({ name: 'scheduled_start' })
  scheduledStart!: Date;

  @Column({ name: 'scheduled_end' })
  scheduledEnd!: Date;

  @Column({ type: 'simple-enum', enum: APPOINTMENT_STATUSES, default: 'scheduled' })
  status!: AppointmentStatus;

  @Column({ type: 'text', nullable: true })
  reason!: string | null;

  // receptionist who booked it
  @Column({ name: 'created_by', type: 'int', nullable: true })
  createdById!: number | null;

  @ManyToOne(() => User, { nullable: true, onDelete: 'SET NULL' })
  @JoinColumn({ name: 'created_by' })
  createdBy?: User | null;

  @CreateDateColumn({ name: 'created_at' })
  createdAt!: Date;

  @UpdateDateColumn({ name: 'updated_at' })
  updatedAt!: Date;

  @OneToMany(() => AppointmentServiceItem, (item) => item.appointment)
  services?: AppointmentServiceItem[];
}
