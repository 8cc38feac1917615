import { Entity, PrimaryGeneratedColumn, Column, CreateDateColumn } from 'typeorm';

@Entity('rooms')
export class Room {
  @PrimaryGeneratedColumn({ name: 'room_id' })
  id!: number;

  @Column({ name: 'room_name', type: 'varchar', length: 50, unique: true })
  name!: string;

  @Column({ type: 'varchar', length: 255, nullable: true })
  description!: string | null;

  @Column({ type: 'int', default: 1 })
  capacity!: number;

  @CreateDateColumn({ name: 'created_at' })
  createdAt!: Date;
}
