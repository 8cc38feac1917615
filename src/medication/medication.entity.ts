import { Entity, PrimaryGeneratedColumn, Column, CreateDateColumn, Unique, OneToOne } from 'typeorm';
import { Inventory } from './inventory.entity';

@Entity('medications')
@Unique('uq_medications_name_strength', ['name', 'strength'])
export class Medication {
  @PrimaryGeneratedColumn({ name: 'medication_id' })
  id!: number;

  @Column({ type: 'varchar', length: 200 })
  name!: string;

  @Column({ type: 'varchar', length: 200, nullable: true })
  manufacturer!: string | null;

  // tablet, ml, ...
  @Column({ type: 'varchar', length: 50, nullable: true })
  unit!: string | null;

  @Column({ type: 'varchar', length: 100, nullable: true })
  strength!: string | null;

  @CreateDateColumn({ name: 'created_at' })
  createdAt!: Date;

  @OneToOne(() => Inventory, (inventory) => inventory.medication)
  inventory?: Inventory | null;
}
