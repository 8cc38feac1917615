import { Injectable, Logger, NotFoundException } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { MedicalService } from './medical-service.entity';
import { CreateMedicalServiceDto } from './dto/create-medical-service.dto';
import { UpdateMedicalServiceDto } from './dto/update-medical-service.dto';
import { rethrowConstraintViolation } from '../common/constraint-violation';

@Injectable()
export class MedicalServiceService {
  private readonly logger = new Logger(MedicalServiceService.name);

  constructor(
    @InjectRepository(MedicalService)
    private readonly serviceRepository: Repository<MedicalService>,
  ) {}

  async createService(dto: CreateMedicalServiceDto): Promise<MedicalService> {
    const service = this.serviceRepository.create({
      code: dto.code,
      name: dto.name,
      description: dto.description ?? null,
      price: dto.price ?? '0.00',
      durationMinutes: dto.durationMinutes ?? 30,
    });
    const saved = await this.serviceRepository.save(service).catch(rethrowConstraintViolation);
    return this.getService(saved.id);
  }

  async getServices(): Promise<MedicalService[]> {
    return this.serviceRepository.find({ order: { name: 'ASC' } });
  }

  async getService(id: number): Promise<MedicalService> {
    const service = await this.serviceRepository.findOne({ where: { id } });
    if (!service) throw new NotFoundException('Service not found');
    return service;
  }

  async getServiceByCode(code: string): Promise<MedicalService> {
    const service = await this.serviceRepository.findOne({ where: { code } });
    if (!service) throw new NotFoundException(`Service ${code} not found`);
    return service;
  }

  // Past appointment lines keep the price they were booked at.
  async updateService(id: number, update: UpdateMedicalServiceDto): Promise<MedicalService> {
    const service = await this.getService(id);
    Object.assign(service, update);
    await this.serviceRepository.save(service).catch(rethrowConstraintViolation);
    return this.getService(id);
  }

  // Restricted while appointment lines use the service; invoice items are unlinked.
  async deleteService(id: number): Promise<{ message: string }> {
    await this.getService(id);
    await this.serviceRepository.delete(id).catch(rethrowConstraintViolation);
    this.logger.log(`Deleted service ${id}`);
    return { message: 'Service deleted' };
  }
}
