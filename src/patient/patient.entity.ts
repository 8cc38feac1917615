import {
  Entity,
  PrimaryGeneratedColumn,
  Column,
  CreateDateColumn,
  UpdateDateColumn,
  Check,
  Index,
  OneToMany,
} from 'typeorm';
import { PatientDoctor } from './patient-doctor.entity';

export const GENDERS = ['male', 'female', 'other'] as const;
export type Gender = (typeof GENDERS)[number];

@Entity('patients')
@Index('idx_patients_name', ['lastName', 'firstName'])
@Check('chk_patients_first_name', 'length("first_name") > 0')
export class Patient {
  @PrimaryGeneratedColumn({ name: 'patient_id' })
  id!: number;

  @Column({ name: 'first_name', type: 'varchar', length: 100 })
  firstName!: string;

  @Column({ name: 'last_name', type: 'varchar', length: 100 })
  lastName!: string;

  // ID card or passport number
  @Column({ name: 'national_id', type: 'varchar', length: 50, nullable: true, unique: true })
  nationalId!: string | null;

  @Column({ name: 'date_of_birth', type: 'date', nullable: true })
  dateOfBirth!: string | null;

  @Column({ type: 'simple-enum', enum: GENDERS, nullable: true, default: 'other' })
  gender!: Gender | null;

  @Column({ type: 'varchar', length: 30, nullable: true })
  phone!: string | null;

  @Column({ type: 'varchar', length: 255, nullable: true })
  email!: string | null;

  @Column({ type: 'text', nullable: true })
  address!: string | null;

  @Column({ name: 'emergency_contact_name', type: 'varchar', length: 200, nullable: true })
  emergencyContactName!: string | null;

  @Column({ name: 'emergency_contact_phone', type: 'varchar', length: 30, nullable: true })
  emergencyContactPhone!: string | null;

  @CreateDateColumn({ name: 'created_at' })
  createdAt!: Date;

  @UpdateDateColumn({ name: 'updated_at' })
  updatedAt!: Date;

  @OneToMany(() => PatientDoctor, (link) => link.patient)
  doctorLinks?: PatientDoctor[];
}
