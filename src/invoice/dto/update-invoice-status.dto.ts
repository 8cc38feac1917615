import { IsIn } from 'class-validator';
import { INVOICE_STATUSES, InvoiceStatus } from '../invoice.entity';

export class UpdateInvoiceStatusDto {
  @IsIn(INVOICE_STATUSES)
  status!: InvoiceStatus;
}
