import { Injectable, NotFoundException } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { Specialty } from './specialty.entity';
import { CreateSpecialtyDto } from './dto/create-specialty.dto';
import { UpdateSpecialtyDto } from './dto/update-specialty.dto';
import { rethrowConstraintViolation } from '../common/constraint-violation';

@Injectable()
export class SpecialtyService {
  constructor(
    @InjectRepository(Specialty)
    private readonly specialtyRepository: Repository<Specialty>,
  ) {}

  async createSpecialty(dto: CreateSpecialtyDto): Promise<Specialty> {
    const specialty = this.specialtyRepository.create({
      name: dto.name,
      description: dto.description ?? null,
    });
    return this.specialtyRepository.save(specialty).catch(rethrowConstraintViolation);
  }

  async getSpecialties(): Promise<Specialty[]> {
    return this.specialtyRepository.find({ order: { name: 'ASC' } });
  }

  async getSpecialty(id: number): Promise<Specialty> {
    const specialty = await this.specialtyRepository.findOne({ where: { id } });
    if (!specialty) throw new NotFoundException('Specialty not found');
    return specialty;
  }

  async updateSpecialty(id: number, update: UpdateSpecialtyDto): Promise<Specialty> {
    const specialty = await this.getSpecialty(id);
    Object.assign(specialty, update);
    return this.specialtyRepository.save(specialty).catch(rethrowConstraintViolation);
  }

  // Doctor links cascade away with the specialty.
  async deleteSpecialty(id: number): Promise<{ message: string }> {
    await this.getSpecialty(id);
    await this.specialtyRepository.delete(id);
    return { message: 'Specialty deleted' };
  }
}
