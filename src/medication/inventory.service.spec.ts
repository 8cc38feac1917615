import { Test, TestingModule } from '@nestjs/testing';
import { ConflictException } from '@nestjs/common';
import { InventoryService } from './inventory.service';
import { MedicationService } from './medication.service';
import { TypeOrmTestingModule } from '../testing/typeorm-testing.module';

describe('InventoryService', () => {
  let moduleRef: TestingModule;
  let inventory: InventoryService;
  let medications: MedicationService;

  beforeEach(async () => {
    moduleRef = await Test.createTestingModule({
      imports: TypeOrmTestingModule(),
      providers: [InventoryService, MedicationService],
    }).compile();
    inventory = moduleRef.get(InventoryService);
    medications = moduleRef.get(MedicationService);
  });

  afterEach(async () => {
    await moduleRef.close();
  });

  it('creates the stock row together with the medication', async () => {
    const med = await medications.createMedication({
      name: 'Paracetamol',
      strength: '500 mg',
      unit: 'tablet',
      inventory: { quantityOnHand: 40, reorderLevel: 10 },
    });
    expect(med.inventory).toMatchObject({ quantityOnHand: 40, reorderLevel: 10, lastRestock: null });
  });

  it('creates and then overwrites levels with upsert', async () => {
    const med = await medications.createMedication({ name: 'Cetirizine' });
    expect(med.inventory).toBeFalsy();

    const created = await inventory.upsertInventory(med.id, { quantityOnHand: 3 });
    expect(created).toMatchObject({ quantityOnHand: 3, reorderLevel: 0 });

    const updated = await inventory.upsertInventory(med.id, { reorderLevel: 8 });
    expect(updated).toMatchObject({ id: created.id, quantityOnHand: 3, reorderLevel: 8 });
  });

  it('adds stock and records the restock date', async () => {
    const med = await medications.createMedication({ name: 'Paracetamol', inventory: { quantityOnHand: 4 } });
    const restocked = await inventory.restock(med.id, 20, '2026-04-10');
    expect(restocked).toMatchObject({ quantityOnHand: 24, lastRestock: '2026-04-10' });
  });

  it('consumes stock but never below zero', async () => {
    const med = await medications.createMedication({ name: 'Paracetamol', inventory: { quantityOnHand: 5 } });

    expect((await inventory.consume(med.id, 5)).quantityOnHand).toBe(0);
    await expect(inventory.consume(med.id, 1)).rejects.toBeInstanceOf(ConflictException);
    expect((await inventory.getInventory(med.id)).quantityOnHand).toBe(0);
  });

  it('lists items at or below their reorder level', async () => {
    await medications.createMedication({ name: 'Zinc', inventory: { quantityOnHand: 50, reorderLevel: 10 } });
    await medications.createMedication({ name: 'Aspirin', inventory: { quantityOnHand: 10, reorderLevel: 10 } });
    await medications.createMedication({ name: 'Iron', inventory: { quantityOnHand: 2, reorderLevel: 5 } });
    await medications.createMedication({ name: 'Saline' });

    const low = await inventory.getLowStock();
    expect(low.map((row) => row.medication?.name)).toEqual(['Aspirin', 'Iron']);
  });

  it('refuses a second medication with the same name and strength', async () => {
    await medications.createMedication({ name: 'Amoxicillin', strength: '250 mg' });
    await expect(medications.createMedication({ name: 'Amoxicillin', strength: '250 mg' })).rejects.toMatchObject({
      kind: 'unique',
    });
    await expect(medications.createMedication({ name: 'Amoxicillin', strength: '500 mg' })).resolves.toBeDefined();
  });

  it('reports a medication without a stock row', async () => {
    const med = await medications.createMedication({ name: 'Saline' });
    await expect(inventory.getInventory(med.id)).rejects.toThrow('No inventory record for this medication');
  });
});
