import { Injectable, Logger, NotFoundException } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { Patient } from './patient.entity';
import { PatientDoctor } from './patient-doctor.entity';
import { Doctor } from '../doctor/doctor.entity';
import { CreatePatientDto } from './dto/create-patient.dto';
import { UpdatePatientDto } from './dto/update-patient.dto';
import { AssignDoctorDto } from './dto/assign-doctor.dto';
import { rethrowConstraintViolation } from '../common/constraint-violation';
import { startsWithIgnoringCase } from '../common/like';

@Injectable()
export class PatientService {
  private readonly logger = new Logger(PatientService.name);

  constructor(
    @InjectRepository(Patient)
    private readonly patientRepository: Repository<Patient>,
    @InjectRepository(PatientDoctor)
    private readonly patientDoctorRepository: Repository<PatientDoctor>,
    @InjectRepository(Doctor)
    private readonly doctorRepository: Repository<Doctor>,
  ) {}

  async createPatient(dto: CreatePatientDto): Promise<Patient> {
    const patient = this.patientRepository.create({
      firstName: dto.firstName,
      lastName: dto.lastName,
      nationalId: dto.nationalId ?? null,
      dateOfBirth: dto.dateOfBirth ?? null,
      gender: dto.gender ?? 'other',
      phone: dto.phone ?? null,
      email: dto.email ?? null,
      address: dto.address ?? null,
      emergencyContactName: dto.emergencyContactName ?? null,
      emergencyContactPhone: dto.emergencyContactPhone ?? null,
    });
    const saved = await this.patientRepository.save(patient).catch(rethrowConstraintViolation);
    this.logger.log(`Registered patient ${saved.id}`);
    return saved;
  }

  // `search` matches the start of the last or first name.
  async getPatients(search?: string): Promise<Patient[]> {
    const order = { lastName: 'ASC', firstName: 'ASC' } as const;
    if (!search) return this.patientRepository.find({ order });
    return this.patientRepository.find({
      where: [{ lastName: startsWithIgnoringCase(search) }, { firstName: startsWithIgnoringCase(search) }],
      order,
    });
  }

  async getPatient(id: number): Promise<Patient> {
    const patient = await this.patientRepository.findOne({ where: { id } });
    if (!patient) throw new NotFoundException('Patient not found');
    return patient;
  }

  async updatePatient(id: number, update: UpdatePatientDto): Promise<Patient> {
    const patient = await this.getPatient(id);
    Object.assign(patient, update);
    await this.patientRepository.save(patient).catch(rethrowConstraintViolation);
    return this.getPatient(id);
  }

  // Restricted while appointments or invoices still reference the patient.
  async deletePatient(id: number): Promise<{ message: string }> {
    await this.getPatient(id);
    await this.patientRepository.delete(id).catch(rethrowConstraintViolation);
    this.logger.log(`Deleted patient ${id}`);
    return { message: 'Patient deleted' };
  }

  async getPatientDoctors(patientId: number): Promise<PatientDoctor[]> {
    await this.getPatient(patientId);
    return this.patientDoctorRepository.find({
      where: { patientId },
      relations: ['doctor'],
      order: { isPrimary: 'DESC', assignedDate: 'ASC' },
    });
  }

  async assignDoctor(patientId: number, dto: AssignDoctorDto): Promise<PatientDoctor> {
    await this.getPatient(patientId);
    const doctor = await this.doctorRepository.findOne({ where: { id: dto.doctorId } });
    if (!doctor) throw new NotFoundException('Doctor not found');

    // insert, not save: a repeated pair must hit the primary key
    await this.patientDoctorRepository
      .insert({
        patientId,
        doctorId: dto.doctorId,
        isPrimary: dto.isPrimary ?? false,
        ...(dto.assignedDate ? { assignedDate: dto.assignedDate } : {}),
      })
      .catch(rethrowConstraintViolation);

    const link = await this.patientDoctorRepository.findOne({
      where: { patientId, doctorId: dto.doctorId },
      relations: ['doctor'],
    });
    if (!link) throw new NotFoundException('Assignment not found');
    return link;
  }

  async unassignDoctor(patientId: number, doctorId: number): Promise<{ message: string }> {
    const link = await this.patientDoctorRepository.findOne({ where: { patientId, doctorId } });
    if (!link) throw new NotFoundException('Doctor is not assigned to this patient');
    await this.patientDoctorRepository.delete({ patientId, doctorId });
    return { message: 'Doctor unassigned' };
  }
}
