import { Entity, PrimaryGeneratedColumn, Column, ManyToOne, JoinColumn, Check } from 'typeorm';
import { Invoice } from './invoice.entity';
import { MedicalService } from '../medical-service/medical-service.entity';
import { Medication } from '../medication/medication.entity';
import { decimalTransformer } from '../common/decimal.transformer';

@Entity('invoice_items')
@Check(
  'chk_invoice_items_subject',
  `"service_id" IS NOT NULL OR "medication_id" IS NOT NULL OR "description" <> ''`,
)
export class InvoiceItem {
  @PrimaryGeneratedColumn({ name: 'invoice_item_id' })
  id!: number;

  @Column({ name: 'invoice_id', type: 'int' })
  invoiceId!: number;

  @ManyToOne(() => Invoice, (invoice) => invoice.items, { nullable: false, onDelete: 'CASCADE' })
  @JoinColumn({ name: 'invoice_id' })
  invoice?: Invoice;

  @Column({ type: 'varchar', length: 255 })
  description!: string;

  @Column({ name: 'service_id', type: 'int', nullable: true })
  serviceId!: number | null;

  @ManyToOne(() => MedicalService, { nullable: true, onDelete: 'SET NULL' })
  @JoinColumn({ name: 'service_id' })
  service?: MedicalService | null;

  @Column({ name: 'medication_id', type: 'int', nullable: true })
  medicationId!: number | null;

  @ManyToOne(() => Medication, { nullable: true, onDelete: 'SET NULL' })
  @JoinColumn({ name: 'medication_id' })
  medication?: Medication | null;

  @Column({ type: 'int', default: 1 })
  quantity!: number;

  @Column({ name: 'unit_price', type: 'decimal', precision: 12, scale: 2, transformer: decimalTransformer })
  unitPrice!: string;

  // Computed by the database; never written from here.
  @Column({
    name: 'line_total',
    type: 'decimal',
    precision: 12,
    scale: 2,
    nullable: true,
    generatedType: 'STORED',
    asExpression: '"quantity" * "unit_price"',
    insert: false,
    update: false,
    transformer: decimalTransformer,
  })
  lineTotal!: string | null;
}
