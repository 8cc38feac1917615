import { IsNotEmpty, IsOptional, IsString, MaxLength } from 'class-validator';

export class UpdateMedicationDto {
  @IsOptional()
  @IsString()
  @IsNotEmpty()
  @MaxLength(200)
  name?: string;

  @IsOptional()
  @IsString()
  manufacturer?: string;

  @IsOptional()
  @IsString()
  unit?: string;

  @IsOptional()
  @IsString()
  strength?: string;
}
