import { Injectable, Logger, NotFoundException } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { DataSource, EntityManager, Repository } from 'typeorm';
import { Prescription } from './prescription.entity';
import { PrescriptionItem } from './prescription-item.entity';
import { CreatePrescriptionDto } from './dto/create-prescription.dto';
import { UpdatePrescriptionDto } from './dto/update-prescription.dto';
import { PrescriptionItemDto } from './dto/prescription-item.dto';
import { rethrowConstraintViolation } from '../common/constraint-violation';

const WITH_ITEMS = ['items', 'items.medication'];

@Injectable()
export class PrescriptionService {
  private readonly logger = new Logger(PrescriptionService.name);

  constructor(
    @InjectRepository(Prescription)
    private readonly prescriptionRepository: Repository<Prescription>,
    @InjectRepository(PrescriptionItem)
    private readonly itemRepository: Repository<PrescriptionItem>,
    private readonly dataSource: DataSource,
  ) {}

  // One per appointment; a second one fails on the unique appointment_id.
  async createPrescription(dto: CreatePrescriptionDto): Promise<Prescription> {
    const prescriptionId = await this.dataSource
      .transaction(async (manager) => {
        const prescription = await manager.save(
          manager.create(Prescription, {
            appointmentId: dto.appointmentId,
            prescribedById: dto.prescribedById,
            notes: dto.notes ?? null,
          }),
        );
        for (const item of dto.items ?? []) {
          await this.insertItem(manager, prescription.id, item);
        }
        return prescription.id;
      })
      .catch(rethrowConstraintViolation);
    this.logger.log(`Prescription ${prescriptionId} written for appointment ${dto.appointmentId}`);
    return this.getPrescription(prescriptionId);
  }

  async getPrescription(id: number): Promise<Prescription> {
    const prescription = await this.prescriptionRepository.findOne({ where: { id }, relations: WITH_ITEMS });
    if (!prescription) throw new NotFoundException('Prescription not found');
    return prescription;
  }

  async getPrescriptionForAppointment(appointmentId: number): Promise<Prescription> {
    const prescription = await this.prescriptionRepository.findOne({
      where: { appointmentId },
      relations: WITH_ITEMS,
    });
    if (!prescription) throw new NotFoundException('No prescription for this appointment');
    return prescription;
  }

  async updatePrescription(id: number, dto: UpdatePrescriptionDto): Promise<Prescription> {
    const prescription = await this.findPlain(id);
    if (dto.notes !== undefined) prescription.notes = dto.notes;
    await this.prescriptionRepository.save(prescription);
    return this.getPrescription(id);
  }

  async addItem(prescriptionId: number, dto: PrescriptionItemDto): Promise<Prescription> {
    await this.findPlain(prescriptionId);
    await this.insertItem(this.dataSource.manager, prescriptionId, dto).catch(rethrowConstraintViolation);
    return this.getPrescription(prescriptionId);
  }

  async removeItem(prescriptionId: number, itemId: number): Promise<Prescription> {
    const item = await this.itemRepository.findOne({ where: { id: itemId, prescriptionId } });
    if (!item) throw new NotFoundException('Prescription item not found');
    await this.itemRepository.delete(itemId);
    return this.getPrescription(prescriptionId);
  }

  async deletePrescription(id: number): Promise<{ message: string }> {
    await this.findPlain(id);
    await this.prescriptionRepository.delete(id);
    return { message: 'Prescription deleted' };
  }

  private async findPlain(id: number): Promise<Prescription> {
    const prescription = await this.prescriptionRepository.findOne({ where: { id } });
    if (!prescription) throw new NotFoundException('Prescription not found');
    return prescription;
  }

  private async insertItem(manager: EntityManager, prescriptionId: number, dto: PrescriptionItemDto): Promise<void> {
    await manager.insert(PrescriptionItem, {
      prescriptionId,
      medicationId: dto.medicationId,
      dosage: dto.dosage,
      frequency: dto.frequency,
      durationDays: dto.durationDays ?? null,
      instructions: dto.instructions ?? null,
    });
  }
}
