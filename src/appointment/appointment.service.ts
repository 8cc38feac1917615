import { Injectable, Logger, NotFoundException } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import {
  And,
  DataSource,
  EntityManager,
  FindOptionsWhere,
  LessThan,
  MoreThanOrEqual,
  Repository,
} from 'typeorm';
import { Appointment, AppointmentStatus } from './appointment.entity';
import { AppointmentServiceItem } from './appointment-service-item.entity';
import { MedicalService } from '../medical-service/medical-service.entity';
import { CreateAppointmentDto } from './dto/create-appointment.dto';
import { UpdateAppointmentDto } from './dto/update-appointment.dto';
import { AppointmentServiceLineDto } from './dto/appointment-service-line.dto';
import { ListAppointmentsQuery } from './dto/list-appointments.query';
import { rethrowConstraintViolation } from '../common/constraint-violation';

const WITH_LINES = ['services', 'services.service'];

/**
 * Booking and status tracking. Overlapping bookings for the same doctor or
 * room are accepted; `scheduledEnd > scheduledStart` is the only time rule,
 * and the database enforces it.
 */
@Injectable()
export class AppointmentService {
  private readonly logger = new Logger(AppointmentService.name);

  constructor(
    @InjectRepository(Appointment)
    private readonly appointmentRepository: Repository<Appointment>,
    @InjectRepository(AppointmentServiceItem)
    private readonly lineRepository: Repository<AppointmentServiceItem>,
    private readonly dataSource: DataSource,
  ) {}

  async createAppointment(dto: CreateAppointmentDto): Promise<Appointment> {
    const appointmentId = await this.dataSource
      .transaction(async (manager) => {
        const appointment = await manager.save(
          manager.create(Appointment, {
            patientId: dto.patientId,
            doctorId: dto.doctorId,
            roomId: dto.roomId ?? null,
            scheduledStart: new Date(dto.scheduledStart),
            scheduledEnd: new Date(dto.scheduledEnd),
            status: dto.status ?? 'scheduled',
            reason: dto.reason ?? null,
            createdById: dto.createdById ?? null,
          }),
        );
        for (const line of dto.services ?? []) {
          await this.insertLine(manager, appointment.id, line);
        }
        return appointment.id;
      })
      .catch(rethrowConstraintViolation);

    this.logger.log(`Booked appointment ${appointmentId} with doctor ${dto.doctorId}`);
    return this.getAppointment(appointmentId);
  }

  async getAppointments(query: ListAppointmentsQuery = {}): Promise<Appointment[]> {
    const where: FindOptionsWhere<Appointment> = {};
    if (query.patientId !== undefined) where.patientId = query.patientId;
    if (query.doctorId !== undefined) where.doctorId = query.doctorId;
    if (query.status !== undefined) where.status = query.status;
    if (query.from && query.to) {
      where.scheduledStart = And(MoreThanOrEqual(new Date(query.from)), LessThan(new Date(query.to)));
    } else if (query.from) {
      where.scheduledStart = MoreThanOrEqual(new Date(query.from));
    } else if (query.to) {
      where.scheduledStart = LessThan(new Date(query.to));
    }
    return this.appointmentRepository.find({ where, order: { scheduledStart: 'ASC' } });
  }

  async getAppointment(id: number): Promise<Appointment> {
    const appointment = await this.appointmentRepository.findOne({ where: { id }, relations: WITH_LINES });
    if (!appointment) throw new NotFoundException('Appointment not found');
    return appointment;
  }

  async updateAppointment(id: number, dto: UpdateAppointmentDto): Promise<Appointment> {
    const appointment = await this.findPlain(id);
    if (dto.roomId !== undefined) appointment.roomId = dto.roomId;
    if (dto.scheduledStart !== undefined) appointment.scheduledStart = new Date(dto.scheduledStart);
    if (dto.scheduledEnd !== undefined) appointment.scheduledEnd = new Date(dto.scheduledEnd);
    if (dto.reason !== undefined) appointment.reason = dto.reason;
    await this.appointmentRepository.save(appointment).catch(rethrowConstraintViolation);
    return this.getAppointment(id);
  }

  // Any status may follow any other.
  async setStatus(id: number, status: AppointmentStatus): Promise<Appointment> {
    const appointment = await this.findPlain(id);
    const previous = appointment.status;
    appointment.status = status;
    await this.appointmentRepository.save(appointment);
    this.logger.log(`Appointment ${id}: ${previous} -> ${status}`);
    return this.getAppointment(id);
  }

  async addService(appointmentId: number, line: AppointmentServiceLineDto): Promise<Appointment> {
    await this.findPlain(appointmentId);
    await this.dataSource
      .transaction((manager) => this.insertLine(manager, appointmentId, line))
      .catch(rethrowConstraintViolation);
    return this.getAppointment(appointmentId);
  }

  async removeService(appointmentId: number, serviceId: number): Promise<Appointment> {
    const line = await this.lineRepository.findOne({ where: { appointmentId, serviceId } });
    if (!line) throw new NotFoundException('Service is not on this appointment');
    await this.lineRepository.delete({ appointmentId, serviceId });
    return this.getAppointment(appointmentId);
  }

  // Lines and the prescription cascade; invoices keep their row, unlinked.
  async deleteAppointment(id: number): Promise<{ message: string }> {
    await this.findPlain(id);
    await this.appointmentRepository.delete(id).catch(rethrowConstraintViolation);
    this.logger.log(`Deleted appointment ${id}`);
    return { message: 'Appointment deleted' };
  }

  private async findPlain(id: number): Promise<Appointment> {
    const appointment = await this.appointmentRepository.findOne({ where: { id } });
    if (!appointment) throw new NotFoundException('Appointment not found');
    return appointment;
  }

  private async insertLine(
    manager: EntityManager,
    appointmentId: number,
    line: AppointmentServiceLineDto,
  ): Promise<void> {
    const service = await manager.findOne(MedicalService, { where: { id: line.serviceId } });
    if (!service) throw new NotFoundException(`Service ${line.serviceId} not found`);
    await manager.insert(AppointmentServiceItem, {
      appointmentId,
      serviceId: service.id,
      quantity: line.quantity ?? 1,
      unitPrice: line.unitPrice ?? service.price,
    });
  }
}
