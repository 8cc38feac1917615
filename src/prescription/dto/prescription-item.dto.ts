import { IsInt, IsNotEmpty, IsOptional, IsString, MaxLength, Min } from 'class-validator';

export class PrescriptionItemDto {
  @IsInt()
  @Min(1)
  medicationId!: number;

  @IsString()
  @IsNotEmpty()
  @MaxLength(100)
  dosage!: string; // "500 mg"

  @IsString()
  @IsNotEmpty()
  @MaxLength(100)
  frequency!: string; // "twice daily"

  @IsOptional()
  @IsInt()
  @Min(1)
  durationDays?: number;

  @IsOptional()
  @IsString()
  instructions?: string;
}
