import { Injectable, Logger, NotFoundException } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { DataSource, In, Repository } from 'typeorm';
import { Doctor } from './doctor.entity';
import { DoctorSpecialty } from './doctor-specialty.entity';
import { CreateDoctorDto } from './dto/create-doctor.dto';
import { UpdateDoctorDto } from './dto/update-doctor.dto';
import { rethrowConstraintViolation } from '../common/constraint-violation';

const WITH_SPECIALTIES = ['specialtyLinks', 'specialtyLinks.specialty'];

@Injectable()
export class DoctorService {
  private readonly logger = new Logger(DoctorService.name);

  constructor(
    @InjectRepository(Doctor)
    private readonly doctorRepository: Repository<Doctor>,
    @InjectRepository(DoctorSpecialty)
    private readonly doctorSpecialtyRepository: Repository<DoctorSpecialty>,
    private readonly dataSource: DataSource,
  ) {}

  async createDoctor(dto: CreateDoctorDto): Promise<Doctor> {
    const doctorId = await this.dataSource
      .transaction(async (manager) => {
        const doctor = await manager.save(
          manager.create(Doctor, {
            userId: dto.userId ?? null,
            firstName: dto.firstName,
            lastName: dto.lastName,
            phone: dto.phone ?? null,
            email: dto.email ?? null,
            licenseNumber: dto.licenseNumber,
            hireDate: dto.hireDate ?? null,
          }),
        );
        for (const specialtyId of dto.specialtyIds ?? []) {
          await manager.insert(DoctorSpecialty, { doctorId: doctor.id, specialtyId });
        }
        return doctor.id;
      })
      .catch(rethrowConstraintViolation);
    this.logger.log(`Created doctor ${doctorId}`);
    return this.getDoctor(doctorId);
  }

  async getDoctors(specialtyId?: number): Promise<Doctor[]> {
    if (specialtyId === undefined) {
      return this.doctorRepository.find({ relations: WITH_SPECIALTIES, order: { lastName: 'ASC' } });
    }
    const links = await this.doctorSpecialtyRepository.find({ where: { specialtyId } });
    if (links.length === 0) return [];
    return this.doctorRepository.find({
      where: { id: In(links.map((link) => link.doctorId)) },
      relations: WITH_SPECIALTIES,
      order: { lastName: 'ASC' },
    });
  }

  async getDoctor(id: number): Promise<Doctor> {
    const doctor = await this.doctorRepository.findOne({ where: { id }, relations: WITH_SPECIALTIES });
    if (!doctor) throw new NotFoundException('Doctor not found');
    return doctor;
  }

  async updateDoctor(id: number, update: UpdateDoctorDto): Promise<Doctor> {
    const doctor = await this.doctorRepository.findOne({ where: { id } });
    if (!doctor) throw new NotFoundException('Doctor not found');
    Object.assign(doctor, update);
    await this.doctorRepository.save(doctor).catch(rethrowConstraintViolation);
    return this.getDoctor(id);
  }

  // Restricted while appointments or prescriptions reference the doctor.
  async deleteDoctor(id: number): Promise<{ message: string }> {
    await this.getDoctor(id);
    await this.doctorRepository.delete(id).catch(rethrowConstraintViolation);
    this.logger.log(`Deleted doctor ${id}`);
    return { message: 'Doctor deleted' };
  }

  async addSpecialty(doctorId: number, specialtyId: number): Promise<Doctor> {
    await this.getDoctor(doctorId);
    await this.doctorSpecialtyRepository.insert({ doctorId, specialtyId }).catch(rethrowConstraintViolation);
    return this.getDoctor(doctorId);
  }

  async removeSpecialty(doctorId: number, specialtyId: number): Promise<Doctor> {
    const link = await this.doctorSpecialtyRepository.findOne({ where: { doctorId, specialtyId } });
    if (!link) throw new NotFoundException('Doctor does not have this specialty');
    await this.doctorSpecialtyRepository.delete({ doctorId, specialtyId });
    return this.getDoctor(doctorId);
  }
}
