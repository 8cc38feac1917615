import { Entity, PrimaryColumn, ManyToOne, JoinColumn } from 'typeorm';
import { Doctor } from './doctor.entity';
import { Specialty } from '../specialty/specialty.entity';

@Entity('doctor_specialties')
export class DoctorSpecialty {
  @PrimaryColumn({ name: 'doctor_id', type: 'int' })
  doctorId!: number;

  @PrimaryColumn({ name: 'specialty_id', type: 'int' })
  specialtyId!: number;

  @ManyToOne(() => Doctor, (doctor) => doctor.specialtyLinks, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'doctor_id' })
  doctor?: Doctor;

  @ManyToOne(() => Specialty, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'specialty_id' })
  specialty?: Specialty;
}
