import { IsInt, IsOptional, Matches, Min } from 'class-validator';
import { PRICE_PATTERN } from '../../common/money';

export class AppointmentServiceLineDto {
  @IsInt()
  @Min(1)
  serviceId!: number;

  @IsOptional()
  @IsInt()
  @Min(1)
  quantity?: number;

  // Omitted: copy the catalog price at booking time.
  @IsOptional()
  @Matches(PRICE_PATTERN, { message: 'unitPrice must be an amount with at most two decimals' })
  unitPrice?: string;
}
