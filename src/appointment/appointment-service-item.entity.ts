import { Entity, PrimaryColumn, Column, ManyToOne, JoinColumn } from 'typeorm';
import { Appointment } from './appointment.entity';
import { MedicalService } from '../medical-service/medical-service.entity';
import { decimalTransformer } from '../common/decimal.transformer';

/**
 * A service rendered during an appointment. `unitPrice` is a copy of the
 * catalog price at booking time and does not follow later price changes.
 */
@Entity('appointment_services')
export class AppointmentServiceItem {
  @PrimaryColumn({ name: 'appointment_id', type: 'int' })
  appointmentId!: number;

  @PrimaryColumn({ name: 'service_id', type: 'int' })
  serviceId!: number;

  @Column({ type: 'int', default: 1 })
  quantity!: number;

  @Column({ name: 'unit_price', type: 'decimal', precision: 12, scale: 2, transformer: decimalTransformer })
  unitPrice!: string;

  @ManyToOne(() => Appointment, (appointment) => appointment.services, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'appointment_id' })
  appointment?: Appointment;

  @ManyToOne(() => MedicalService, { onDelete: 'RESTRICT' })
  @JoinColumn({ name: 'service_id' })
  service?: MedicalService;
}
