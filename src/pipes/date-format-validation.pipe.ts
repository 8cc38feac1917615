import { PipeTransform, Injectable, BadRequestException } from '@nestjs/common';
import { isValidDateFormat } from '../utils/date-utils';

// Body fields stored in `date` columns.
const DATE_FIELDS = ['dateOfBirth', 'hireDate', 'assignedDate', 'invoiceDate', 'date'] as const;

/**
 * Rejects calendar-date fields that are not a real YYYY-MM-DD day. Full
 * timestamps pass `@IsDateString()` but would be truncated by the column.
 */
@Injectable()
export class DateFormatValidationPipe implements PipeTransform {
  transform(value: unknown): unknown {
    if (typeof value === 'object' && value !== null) {
      this.validateDateFields(value);
    }
    return value;
  }

  private validateDateFields(obj: object) {
    for (const field of DATE_FIELDS) {
      const fieldValue: unknown = Reflect.get(obj, field);
      if (fieldValue === undefined || fieldValue === null) continue;
      if (typeof fieldValue !== 'string' || !isValidDateFormat(fieldValue)) {
        throw new BadRequestException(`${field} must be in YYYY-MM-DD format. Example: 2025-12-25`);
      }
    }
  }
}
