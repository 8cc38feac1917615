import { Entity, PrimaryColumn, Column, ManyToOne, JoinColumn } from 'typeorm';
import { Patient } from './patient.entity';
import { Doctor } from '../doctor/doctor.entity';

@Entity('patient_doctors')
export class PatientDoctor {
  @PrimaryColumn({ name: 'patient_id', type: 'int' })
  patientId!: number;

  @PrimaryColumn({ name: 'doctor_id', type: 'int' })
  doctorId!: number;

  @Column({ name: 'is_primary', type: 'boolean', default: false })
  isPrimary!: boolean;

  @Column({ name: 'assigned_date', type: 'date', default: () => 'CURRENT_DATE' })
  assignedDate!: string;

  @ManyToOne(() => Patient, (patient) => patient.doctorLinks, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'patient_id' })
  patient?: Patient;

  @ManyToOne(() => Doctor, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'doctor_id' })
  doctor?: Doctor;
}
