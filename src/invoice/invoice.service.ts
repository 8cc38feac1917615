import { BadRequestException, Injectable, Logger, NotFoundException } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { DataSource, EntityManager, FindOptionsWhere, Repository } from 'typeorm';
import { Invoice, InvoiceStatus } from './invoice.entity';
import { InvoiceItem } from './invoice-item.entity';
import { MedicalService } from '../medical-service/medical-service.entity';
import { Medication } from '../medication/medication.entity';
import { CreateInvoiceDto } from './dto/create-invoice.dto';
import { InvoiceItemDto } from './dto/invoice-item.dto';
import { ListInvoicesQuery } from './dto/list-invoices.query';
import { rethrowConstraintViolation } from '../common/constraint-violation';
import { sumLineTotals } from '../common/money';

const WITH_ITEMS = ['items'];

interface ResolvedItem {
  description: string;
  serviceId: number | null;
  medicationId: number | null;
  quantity: number;
  unitPrice: string;
}

@Injectable()
export class InvoiceService {
  private readonly logger = new Logger(InvoiceService.name);

  constructor(
    @InjectRepository(Invoice)
    private readonly invoiceRepository: Repository<Invoice>,
    @InjectRepository(InvoiceItem)
    private readonly itemRepository: Repository<InvoiceItem>,
    private readonly dataSource: DataSource,
  ) {}

  async createInvoice(dto: CreateInvoiceDto): Promise<Invoice> {
    const invoiceId = await this.dataSource
      .transaction(async (manager) => {
        const items: ResolvedItem[] = [];
        for (const item of dto.items ?? []) {
          items.push(await this.resolveItem(manager, item));
        }
        const invoice = await manager.save(
          manager.create(Invoice, {
            patientId: dto.patientId,
            appointmentId: dto.appointmentId ?? null,
            totalAmount: dto.totalAmount ?? sumLineTotals(items),
            status: dto.status ?? 'pending',
            createdById: dto.createdById ?? null,
            ...(dto.invoiceDate ? { invoiceDate: dto.invoiceDate } : {}),
          }),
        );
        for (const item of items) {
          await manager.insert(InvoiceItem, { ...item, invoiceId: invoice.id });
        }
        return invoice.id;
      })
      .catch(rethrowConstraintViolation);
    this.logger.log(`Issued invoice ${invoiceId} to patient ${dto.patientId}`);
    return this.getInvoice(invoiceId);
  }

  async getInvoices(query: ListInvoicesQuery = {}): Promise<Invoice[]> {
    const where: FindOptionsWhere<Invoice> = {};
    if (query.patientId !== undefined) where.patientId = query.patientId;
    if (query.status !== undefined) where.status = query.status;
    return this.invoiceRepository.find({ where, order: { invoiceDate: 'DESC', id: 'DESC' } });
  }

  async getInvoice(id: number): Promise<Invoice> {
    const invoice = await this.invoiceRepository.findOne({
      where: { id },
      relations: WITH_ITEMS,
      order: { items: { id: 'ASC' } },
    });
    if (!invoice) throw new NotFoundException('Invoice not found');
    return invoice;
  }

  async setStatus(id: number, status: InvoiceStatus): Promise<Invoice> {
    const invoice = await this.findPlain(id);
    invoice.status = status;
    await this.invoiceRepository.save(invoice);
    this.logger.log(`Invoice ${id} marked ${status}`);
    return this.getInvoice(id);
  }

  // Leaves totalAmount alone; see recalculateTotal.
  async addItem(invoiceId: number, dto: InvoiceItemDto): Promise<Invoice> {
    await this.findPlain(invoiceId);
    await this.dataSource
      .transaction(async (manager) => {
        const item = await this.resolveItem(manager, dto);
        await manager.insert(InvoiceItem, { ...item, invoiceId });
      })
      .catch(rethrowConstraintViolation);
    return this.getInvoice(invoiceId);
  }

  async removeItem(invoiceId: number, itemId: number): Promise<Invoice> {
    const item = await this.itemRepository.findOne({ where: { id: itemId, invoiceId } });
    if (!item) throw new NotFoundException('Invoice item not found');
    await this.itemRepository.delete(itemId);
    return this.getInvoice(invoiceId);
  }

  /**
   * Writes the sum of the current line totals into `total_amount`. The
   * database keeps no link between the two.
   */
  async recalculateTotal(id: number): Promise<Invoice> {
    const invoice = await this.findPlain(id);
    const items = await this.itemRepository.find({ where: { invoiceId: id } });
    invoice.totalAmount = sumLineTotals(items);
    await this.invoiceRepository.save(invoice);
    return this.getInvoice(id);
  }

  async deleteInvoice(id: number): Promise<{ message: string }> {
    await this.findPlain(id);
    await this.invoiceRepository.delete(id);
    this.logger.log(`Deleted invoice ${id}`);
    return { message: 'Invoice deleted' };
  }

  private async findPlain(id: number): Promise<Invoice> {
    const invoice = await this.invoiceRepository.findOne({ where: { id } });
    if (!invoice) throw new NotFoundException('Invoice not found');
    return invoice;
  }

  private async resolveItem(manager: EntityManager, dto: InvoiceItemDto): Promise<ResolvedItem> {
    let description = dto.description;
    let unitPrice = dto.unitPrice;

    if (dto.serviceId !== undefined) {
      const service = await manager.findOne(MedicalService, { where: { id: dto.serviceId } });
      if (!service) throw new NotFoundException(`Service ${dto.serviceId} not found`);
      description ??= service.name;
      unitPrice ??= service.price;
    }
    if (dto.medicationId !== undefined) {
      const medication = await manager.findOne(Medication, { where: { id: dto.medicationId } });
      if (!medication) throw new NotFoundException(`Medication ${dto.medicationId} not found`);
      description ??= [medication.name, medication.strength].filter(Boolean).join(' ');
    }
    if (unitPrice === undefined) {
      throw new BadRequestException('unitPrice is required for items without a service');
    }

    return {
      description: description ?? '',
      serviceId: dto.serviceId ?? null,
      medicationId: dto.medicationId ?? null,
      quantity: dto.quantity ?? 1,
      unitPrice,
    };
  }
}
