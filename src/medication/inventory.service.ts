import { ConflictException, Injectable, Logger, NotFoundException } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { Inventory } from './inventory.entity';
import { Medication } from './medication.entity';
import { UpsertInventoryDto } from './dto/upsert-inventory.dto';
import { getCurrentDate } from '../utils/date-utils';
import { rethrowConstraintViolation } from '../common/constraint-violation';

@Injectable()
export class InventoryService {
  private readonly logger = new Logger(InventoryService.name);

  constructor(
    @InjectRepository(Inventory)
    private readonly inventoryRepository: Repository<Inventory>,
    @InjectRepository(Medication)
    private readonly medicationRepository: Repository<Medication>,
  ) {}

  async getInventory(medicationId: number): Promise<Inventory> {
    const inventory = await this.inventoryRepository.findOne({ where: { medicationId } });
    if (!inventory) throw new NotFoundException('No inventory record for this medication');
    return inventory;
  }

  // Creates the single stock row for the medication, or overwrites its levels.
  async upsertInventory(medicationId: number, dto: UpsertInventoryDto): Promise<Inventory> {
    const medication = await this.medicationRepository.findOne({ where: { id: medicationId } });
    if (!medication) throw new NotFoundException('Medication not found');

    const existing = await this.inventoryRepository.findOne({ where: { medicationId } });
    const inventory =
      existing ??
      this.inventoryRepository.create({ medicationId, quantityOnHand: 0, reorderLevel: 0, lastRestock: null });
    if (dto.quantityOnHand !== undefined) inventory.quantityOnHand = dto.quantityOnHand;
    if (dto.reorderLevel !== undefined) inventory.reorderLevel = dto.reorderLevel;
    await this.inventoryRepository.save(inventory).catch(rethrowConstraintViolation);
    return this.getInventory(medicationId);
  }

  async restock(medicationId: number, quantity: number, date: string = getCurrentDate()): Promise<Inventory> {
    await this.getInventory(medicationId);
    await this.inventoryRepository
      .createQueryBuilder()
      .update(Inventory)
      .set({ quantityOnHand: () => 'quantity_on_hand + :quantity', lastRestock: date })
      .where('medication_id = :medicationId', { medicationId, quantity })
      .execute();
    this.logger.log(`Restocked medication ${medicationId} with ${quantity}`);
    return this.getInventory(medicationId);
  }

  // Conditional UPDATE: stock never goes below zero.
  async consume(medicationId: number, quantity: number): Promise<Inventory> {
    await this.getInventory(medicationId);
    const result = await this.inventoryRepository
      .createQueryBuilder()
      .update(Inventory)
      .set({ quantityOnHand: () => 'quantity_on_hand - :quantity' })
      .where('medication_id = :medicationId AND quantity_on_hand >= :quantity', { medicationId, quantity })
      .execute();
    if (!result.affected) {
      throw new ConflictException(`Insufficient stock for medication ${medicationId}`);
    }
    return this.getInventory(medicationId);
  }

  async getLowStock(): Promise<Inventory[]> {
    return this.inventoryRepository
      .createQueryBuilder('inventory')
      .leftJoinAndSelect('inventory.medication', 'medication')
      .where('inventory.quantityOnHand <= inventory.reorderLevel')
      .orderBy('medication.name', 'ASC')
      .getMany();
  }
}
