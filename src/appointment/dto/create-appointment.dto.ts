import { Type } from 'class-transformer';
import { IsArray, IsDateString, IsIn, IsInt, IsOptional, IsString, Min, ValidateNested } from 'class-validator';
import { APPOINTMENT_STATUSES, AppointmentStatus } from '../appointment.entity';
import { AppointmentServiceLineDto } from './appointment-service-line.dto';

export class CreateAppointmentDto {
  @IsInt()
  @Min(1)
  patientId!: number;

  @IsInt()
  @Min(1)
  doctorId!: number;

  @IsOptional()
  @IsInt()
  @Min(1)
  roomId?: number;

  @IsDateString()
  scheduledStart!: string; // ISO 8601

  @IsDateString()
  scheduledEnd!: string;

  @IsOptional()
  @IsIn(APPOINTMENT_STATUSES)
  status?: AppointmentStatus;

  @IsOptional()
  @IsString()
  reason?: string;

  @IsOptional()
  @IsInt()
  @Min(1)
  createdById?: number;

  @IsOptional()
  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => AppointmentServiceLineDto)
  services?: AppointmentServiceLineDto[];
}
