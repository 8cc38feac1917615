import { IsInt, IsNotEmpty, Matches, IsOptional, IsString, MaxLength, Min } from 'class-validator';
import { PRICE_PATTERN } from '../../common/money';

export class CreateMedicalServiceDto {
  @IsString()
  @IsNotEmpty()
  @MaxLength(30)
  code!: string;

  @IsString()
  @IsNotEmpty()
  @MaxLength(150)
  name!: string;

  @IsOptional()
  @IsString()
  description?: string;

  @IsOptional()
  @Matches(PRICE_PATTERN, { message: 'price must be an amount with at most two decimals' })
  price?: string; // "45.00"

  @IsOptional()
  @IsInt()
  @Min(1)
  durationMinutes?: number;
}
