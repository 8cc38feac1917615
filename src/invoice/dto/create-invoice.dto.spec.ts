import { plainToInstance } from 'class-transformer';
import { validate } from 'class-validator';
import { CreateInvoiceDto } from './create-invoice.dto';

async function failingProperties(body: object): Promise<string[]> {
  const errors = await validate(plainToInstance(CreateInvoiceDto, body));
  return errors.map((error) => error.property);
}

describe('CreateInvoiceDto', () => {
  it('accepts a minimal invoice', async () => {
    expect(await failingProperties({ patientId: 1 })).toEqual([]);
  });

  it('accepts items priced with up to two decimals', async () => {
    const body = { patientId: 1, items: [{ description: 'Consultation', quantity: 2, unitPrice: '45.5' }] };
    expect(await failingProperties(body)).toEqual([]);
  });

  it('rejects malformed amounts and statuses', async () => {
    expect(await failingProperties({ patientId: 1, totalAmount: '10.999', status: 'refunded' })).toEqual([
      'totalAmount',
      'status',
    ]);
  });

  it('validates nested items', async () => {
    const body = { patientId: 1, items: [{ description: 'Consultation', quantity: 0, unitPrice: '-5' }] };
    expect(await failingProperties(body)).toEqual(['items']);
  });
});
