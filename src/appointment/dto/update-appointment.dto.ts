import { IsDateString, IsInt, IsOptional, IsString, Min } from 'class-validator';

export class UpdateAppointmentDto {
  // null moves the appointment out of its room
  @IsOptional()
  @IsInt()
  @Min(1)
  roomId?: number | null;

  @IsOptional()
  @IsDateString()
  scheduledStart?: string;

  @IsOptional()
  @IsDateString()
  scheduledEnd?: string;

  @IsOptional()
  @IsString()
  reason?: string;
}
