import { IsInt, IsOptional, IsString, Matches, MaxLength, Min } from 'class-validator';
import { PRICE_PATTERN } from '../../common/money';

/**
 * A line needs a service, a medication or a non-empty description. The
 * database enforces that rule; it is not duplicated here.
 */
export class InvoiceItemDto {
  @IsOptional()
  @IsString()
  @MaxLength(255)
  description?: string; // defaults to the service or medication name

  @IsOptional()
  @IsInt()
  @Min(1)
  serviceId?: number;

  @IsOptional()
  @IsInt()
  @Min(1)
  medicationId?: number;

  @IsOptional()
  @IsInt()
  @Min(1)
  quantity?: number;

  // Required unless the line references a service.
  @IsOptional()
  @Matches(PRICE_PATTERN, { message: 'unitPrice must be an amount with at most two decimals' })
  unitPrice?: string;
}
