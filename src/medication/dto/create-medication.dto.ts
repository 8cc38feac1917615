import { Type } from 'class-transformer';
import { IsNotEmpty, IsOptional, IsString, MaxLength, ValidateNested } from 'class-validator';
import { UpsertInventoryDto } from './upsert-inventory.dto';

export class CreateMedicationDto {
  @IsString()
  @IsNotEmpty()
  @MaxLength(200)
  name!: string;

  @IsOptional()
  @IsString()
  @MaxLength(200)
  manufacturer?: string;

  @IsOptional()
  @IsString()
  @MaxLength(50)
  unit?: string; // tablet, ml, ...

  @IsOptional()
  @IsString()
  @MaxLength(100)
  strength?: string; // "500 mg"

  // Creates the stock row alongside the medication.
  @IsOptional()
  @ValidateNested()
  @Type(() => UpsertInventoryDto)
  inventory?: UpsertInventoryDto;
}
