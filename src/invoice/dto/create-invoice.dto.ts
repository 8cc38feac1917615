import { Type } from 'class-transformer';
import { IsArray, IsIn, IsInt, IsOptional, Matches, Min, ValidateNested } from 'class-validator';
import { INVOICE_STATUSES, InvoiceStatus } from '../invoice.entity';
import { InvoiceItemDto } from './invoice-item.dto';
import { PRICE_PATTERN } from '../../common/money';

export class CreateInvoiceDto {
  @IsInt()
  @Min(1)
  patientId!: number;

  @IsOptional()
  @IsInt()
  @Min(1)
  appointmentId?: number;

  @IsOptional()
  @Matches(/^\d{4}-\d{2}-\d{2}$/, { message: 'invoiceDate must be YYYY-MM-DD' })
  invoiceDate?: string; // defaults to today

  // Omitted: the sum of the item line totals.
  @IsOptional()
  @Matches(PRICE_PATTERN, { message: 'totalAmount must be an amount with at most two decimals' })
  totalAmount?: string;

  @IsOptional()
  @IsIn(INVOICE_STATUSES)
  status?: InvoiceStatus;

  @IsOptional()
  @IsInt()
  @Min(1)
  createdById?: number;

  @IsOptional()
  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => InvoiceItemDto)
  items?: InvoiceItemDto[];
}
