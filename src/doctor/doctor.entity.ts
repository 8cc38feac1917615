import {
  Entity,
  PrimaryGeneratedColumn,
  Column,
  OneToOne,
  OneToMany,
  JoinColumn,
  CreateDateColumn,
  UpdateDateColumn,
} from 'typeorm';
import { User } from '../user/user.entity';
import { DoctorSpecialty } from './doctor-specialty.entity';

@Entity('doctors')
export class Doctor {
  @PrimaryGeneratedColumn({ name: 'doctor_id' })
  id!: number;

  @Column({ name: 'user_id', type: 'int', nullable: true })
  userId!: number | null;

  // Optional login account; unlinking happens when the user row goes away.
  @OneToOne(() => User, { nullable: true, onDelete: 'SET NULL' })
  @JoinColumn({ name: 'user_id' })
  user?: User | null;

  @Column({ name: 'first_name', type: 'varchar', length: 100 })
  firstName!: string;

  @Column({ name: 'last_name', type: 'varchar', length: 100 })
  lastName!: string;

  @Column({ type: 'varchar', length: 30, nullable: true })
  phone!: string | null;

  @Column({ type: 'varchar', length: 255, nullable: true })
  email!: string | null;

  @Column({ name: 'license_number', type: 'varchar', length: 100, unique: true })
  licenseNumber!: string;

  @Column({ name: 'hire_date', type: 'date', nullable: true })
  hireDate!: string | null;

  @CreateDateColumn({ name: 'created_at' })
  createdAt!: Date;

  @UpdateDateColumn({ name: 'updated_at' })
  updatedAt!: Date;

  @OneToMany(() => DoctorSpecialty, (link) => link.doctor)
  specialtyLinks?: DoctorSpecialty[];
}
