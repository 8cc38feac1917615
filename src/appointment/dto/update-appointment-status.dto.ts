import { IsIn } from 'class-validator';
import { APPOINTMENT_STATUSES, AppointmentStatus } from '../appointment.entity';

export class UpdateAppointmentStatusDto {
  @IsIn(APPOINTMENT_STATUSES)
  status!: AppointmentStatus;
}
