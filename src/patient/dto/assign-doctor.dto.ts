import { IsBoolean, IsDateString, IsInt, IsOptional, Min } from 'class-validator';

export class AssignDoctorDto {
  @IsInt()
  @Min(1)
  doctorId!: number;

  @IsOptional()
  @IsBoolean()
  isPrimary?: boolean;

  @IsOptional()
  @IsDateString()
  assignedDate?: string; // defaults to today
}
