import { Entity, PrimaryGeneratedColumn, Column, OneToOne, JoinColumn } from 'typeorm';
import { Medication } from './medication.entity';

@Entity('inventory')
export class Inventory {
  @PrimaryGeneratedColumn({ name: 'inventory_id' })
  id!: number;

  @Column({ name: 'medication_id', type: 'int' })
  medicationId!: number;

  @OneToOne(() => Medication, (medication) => medication.inventory, { nullable: false, onDelete: 'CASCADE' })
  @JoinColumn({ name: 'medication_id' })
  medication?: Medication;

  @Column({ name: 'quantity_on_hand', type: 'int', default: 0 })
  quantityOnHand!: number;

  @Column({ name: 'reorder_level', type: 'int', default: 0 })
  reorderLevel!: number;

  @Column({ name: 'last_restock', type: 'date', nullable: true })
  lastRestock!: string | null;
}
