import { Injectable, Logger, NotFoundException } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { DataSource, Repository } from 'typeorm';
import { Medication } from './medication.entity';
import { Inventory } from './inventory.entity';
import { CreateMedicationDto } from './dto/create-medication.dto';
import { UpdateMedicationDto } from './dto/update-medication.dto';
import { rethrowConstraintViolation } from '../common/constraint-violation';

@Injectable()
export class MedicationService {
  private readonly logger = new Logger(MedicationService.name);

  constructor(
    @InjectRepository(Medication)
    private readonly medicationRepository: Repository<Medication>,
    private readonly dataSource: DataSource,
  ) {}

  async createMedication(dto: CreateMedicationDto): Promise<Medication> {
    const medicationId = await this.dataSource
      .transaction(async (manager) => {
        const medication = await manager.save(
          manager.create(Medication, {
            name: dto.name,
            manufacturer: dto.manufacturer ?? null,
            unit: dto.unit ?? null,
            strength: dto.strength ?? null,
          }),
        );
        if (dto.inventory) {
          await manager.insert(Inventory, {
            medicationId: medication.id,
            quantityOnHand: dto.inventory.quantityOnHand ?? 0,
            reorderLevel: dto.inventory.reorderLevel ?? 0,
          });
        }
        return medication.id;
      })
      .catch(rethrowConstraintViolation);
    this.logger.log(`Added medication ${medicationId}`);
    return this.getMedication(medicationId);
  }

  async getMedications(): Promise<Medication[]> {
    return this.medicationRepository.find({ relations: ['inventory'], order: { name: 'ASC' } });
  }

  async getMedication(id: number): Promise<Medication> {
    const medication = await this.medicationRepository.findOne({ where: { id }, relations: ['inventory'] });
    if (!medication) throw new NotFoundException('Medication not found');
    return medication;
  }

  async updateMedication(id: number, update: UpdateMedicationDto): Promise<Medication> {
    const medication = await this.medicationRepository.findOne({ where: { id } });
    if (!medication) throw new NotFoundException('Medication not found');
    Object.assign(medication, update);
    await this.medicationRepository.save(medication).catch(rethrowConstraintViolation);
    return this.getMedication(id);
  }

  /**
   * Stock row goes with the medication and invoice items lose their link;
   * refused while a prescription item still names it.
   */
  async deleteMedication(id: number): Promise<{ message: string }> {
    await this.getMedication(id);
    await this.medicationRepository.delete(id).catch(rethrowConstraintViolation);
    this.logger.log(`Deleted medication ${id}`);
    return { message: 'Medication deleted' };
  }
}
