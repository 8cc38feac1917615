import { Test, TestingModule } from '@nestjs/testing';
import { BadRequestException } from '@nestjs/common';
import { DataSource } from 'typeorm';
import { InvoiceService } from './invoice.service';
import { InvoiceItem } from './invoice-item.entity';
import { MedicationService } from '../medication/medication.service';
import { MedicalServiceService } from '../medical-service/medical-service.service';
import { PatientService } from '../patient/patient.service';
import { Inventory } from '../medication/inventory.entity';
import { TypeOrmTestingModule } from '../testing/typeorm-testing.module';
import { insertMedication, insertPatient, insertService } from '../testing/fixtures';

describe('InvoiceService', () => {
  let moduleRef: TestingModule;
  let service: InvoiceService;
  let dataSource: DataSource;
  let patientId: number;

  beforeEach(async () => {
    moduleRef = await Test.createTestingModule({
      imports: TypeOrmTestingModule(),
      providers: [InvoiceService, MedicationService, MedicalServiceService, PatientService],
    }).compile();
    service = moduleRef.get(InvoiceService);
    dataSource = moduleRef.get(DataSource);
    patientId = (await insertPatient(dataSource)).id;
  });

  afterEach(async () => {
    await moduleRef.close();
  });

  describe('createInvoice', () => {
    it('computes line_total in the database and defaults the total to the sum', async () => {
      const invoice = await service.createInvoice({
        patientId,
        items: [
          { description: 'Consultation', quantity: 3, unitPrice: '50.00' },
          { description: 'Dressing', unitPrice: '7.25' },
        ],
      });

      expect(invoice.status).toBe('pending');
      expect(invoice.items?.map((i) => i.lineTotal)).toEqual(['150.00', '7.25']);
      expect(invoice.totalAmount).toBe('157.25');
    });

    it('keeps an explicit total even when it disagrees with the items', async () => {
      const invoice = await service.createInvoice({
        patientId,
        totalAmount: '10.00',
        items: [{ description: 'Consultation', quantity: 3, unitPrice: '50.00' }],
      });
      expect(invoice.totalAmount).toBe('10.00');
    });

    it('issues an empty invoice with a zero total', async () => {
      const invoice = await service.createInvoice({ patientId, invoiceDate: '2026-02-01' });
      expect(invoice.items).toEqual([]);
      expect(invoice.totalAmount).toBe('0.00');
      expect(invoice.invoiceDate).toBe('2026-02-01');
    });

    it('takes description and price from a referenced service', async () => {
      const xray = await insertService(dataSource, { name: 'X-ray', price: '120.00' });
      const invoice = await service.createInvoice({ patientId, items: [{ serviceId: xray.id }] });

      expect(invoice.items?.[0]).toMatchObject({
        description: 'X-ray',
        serviceId: xray.id,
        medicationId: null,
        quantity: 1,
        unitPrice: '120.00',
        lineTotal: '120.00',
      });
    });

    it('names medication lines after the medication and its strength', async () => {
      const ibuprofen = await insertMedication(dataSource, { name: 'Ibuprofen', strength: '200 mg' });
      const invoice = await service.createInvoice({
        patientId,
        items: [{ medicationId: ibuprofen.id, quantity: 2, unitPrice: '3.10' }],
      });
      expect(invoice.items?.[0]).toMatchObject({ description: 'Ibuprofen 200 mg', lineTotal: '6.20' });
    });

    it('requires a price when no service supplies one', async () => {
      const ibuprofen = await insertMedication(dataSource);
      await expect(
        service.createInvoice({ patientId, items: [{ medicationId: ibuprofen.id }] }),
      ).rejects.toBeInstanceOf(BadRequestException);
    });

    it('rejects a line with no service, no medication and no description', async () => {
      await expect(
        service.createInvoice({ patientId, items: [{ unitPrice: '5.00' }] }),
      ).rejects.toMatchObject({ kind: 'check', status: 400 });
      expect(await service.getInvoices()).toEqual([]);
    });

    it('rejects an unknown patient', async () => {
      await expect(service.createInvoice({ patientId: 999 })).rejects.toMatchObject({ kind: 'foreign_key' });
    });
  });

  describe('items and totals', () => {
    it('leaves the total alone until it is recalculated', async () => {
      const { id } = await service.createInvoice({
        patientId,
        items: [{ description: 'Consultation', quantity: 2, unitPrice: '12.50' }],
      });

      const withExtra = await service.addItem(id, { description: 'Copy of records', unitPrice: '0.10' });
      expect(withExtra.items).toHaveLength(2);
      expect(withExtra.totalAmount).toBe('25.00');

      expect((await service.recalculateTotal(id)).totalAmount).toBe('25.10');
    });

    it('removes an item', async () => {
      const { id, items } = await service.createInvoice({
        patientId,
        items: [
          { description: 'Consultation', unitPrice: '40.00' },
          { description: 'Lab panel', unitPrice: '15.00' },
        ],
      });
      const first = items?.[0];
      if (!first) throw new Error('expected an item');

      await service.removeItem(id, first.id);
      const recalculated = await service.recalculateTotal(id);
      expect(recalculated.items?.map((i) => i.description)).toEqual(['Lab panel']);
      expect(recalculated.totalAmount).toBe('15.00');
    });

    it('does not remove an item through another invoice', async () => {
      const first = await service.createInvoice({ patientId, items: [{ description: 'A', unitPrice: '1.00' }] });
      const second = await service.createInvoice({ patientId });
      const itemId = first.items?.[0].id ?? 0;
      await expect(service.removeItem(second.id, itemId)).rejects.toThrow('Invoice item not found');
    });
  });

  describe('status and lifecycle', () => {
    it('marks an invoice paid and filters by status', async () => {
      const paid = await service.createInvoice({ patientId });
      await service.createInvoice({ patientId });

      expect((await service.setStatus(paid.id, 'paid')).status).toBe('paid');
      expect((await service.getInvoices({ status: 'paid' })).map((i) => i.id)).toEqual([paid.id]);
      expect(await service.getInvoices({ patientId, status: 'pending' })).toHaveLength(1);
    });

    it('cascades items when the invoice is deleted', async () => {
      const { id } = await service.createInvoice({
        patientId,
        items: [{ description: 'Consultation', unitPrice: '40.00' }],
      });
      await service.deleteInvoice(id);
      expect(await dataSource.getRepository(InvoiceItem).count()).toBe(0);
    });

    it('blocks deleting a patient who has invoices', async () => {
      await service.createInvoice({ patientId });
      await expect(moduleRef.get(PatientService).deletePatient(patientId)).rejects.toMatchObject({
        kind: 'foreign_key',
      });
    });
  });

  describe('catalog deletions', () => {
    it('unlinks invoice items and drops stock when a medication is deleted', async () => {
      const medications = moduleRef.get(MedicationService);
      const ibuprofen = await medications.createMedication({
        name: 'Ibuprofen',
        strength: '400 mg',
        inventory: { quantityOnHand: 5 },
      });
      const { id } = await service.createInvoice({
        patientId,
        items: [{ medicationId: ibuprofen.id, unitPrice: '2.00' }],
      });

      await medications.deleteMedication(ibuprofen.id);

      const item = (await service.getInvoice(id)).items?.[0];
      expect(item).toMatchObject({ medicationId: null, description: 'Ibuprofen 400 mg' });
      expect(await dataSource.getRepository(Inventory).count()).toBe(0);
    });

    it('unlinks invoice items when a service is deleted', async () => {
      const xray = await insertService(dataSource, { name: 'X-ray', price: '120.00' });
      const { id } = await service.createInvoice({ patientId, items: [{ serviceId: xray.id }] });

      await moduleRef.get(MedicalServiceService).deleteService(xray.id);

      expect((await service.getInvoice(id)).items?.[0]).toMatchObject({ serviceId: null, description: 'X-ray' });
    });
  });
});
