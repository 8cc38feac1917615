import { BadRequestException } from '@nestjs/common';
import { DateFormatValidationPipe } from './date-format-validation.pipe';

describe('DateFormatValidationPipe', () => {
  const pipe = new DateFormatValidationPipe();

  it('passes bodies whose date fields are calendar days', () => {
    const body = { firstName: 'Ana', dateOfBirth: '1990-07-14' };
    expect(pipe.transform(body)).toBe(body);
  });

  it('ignores absent and null date fields and non-object values', () => {
    expect(pipe.transform({ hireDate: null })).toEqual({ hireDate: null });
    expect(pipe.transform(42)).toBe(42);
  });

  it('rejects timestamps in date-only fields', () => {
    expect(() => pipe.transform({ invoiceDate: '2026-01-05T10:00:00Z' })).toThrow(BadRequestException);
  });

  it('names the offending field', () => {
    expect(() => pipe.transform({ assignedDate: '05/01/2026' })).toThrow(
      'assignedDate must be in YYYY-MM-DD format. Example: 2025-12-25',
    );
  });
});
