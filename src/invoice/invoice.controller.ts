import { Body, Controller, Delete, Get, Param, ParseIntPipe, Patch, Post, Query } from '@nestjs/common';
import { InvoiceService } from './invoice.service';
import { CreateInvoiceDto } from './dto/create-invoice.dto';
import { InvoiceItemDto } from './dto/invoice-item.dto';
import { UpdateInvoiceStatusDto } from './dto/update-invoice-status.dto';
import { ListInvoicesQuery } from './dto/list-invoices.query';

@Controller('api/invoices')
export class InvoiceController {
  constructor(private readonly invoiceService: InvoiceService) {}

  @Post()
  async createInvoice(@Body() dto: CreateInvoiceDto) {
    return this.invoiceService.createInvoice(dto);
  }

  @Get()
  async getInvoices(@Query() query: ListInvoicesQuery) {
    return this.invoiceService.getInvoices(query);
  }

  @Get(':id')
  async getInvoice(@Param('id', ParseIntPipe) id: number) {
    return this.invoiceService.getInvoice(id);
  }

  @Patch(':id/status')
  async setStatus(@Param('id', ParseIntPipe) id: number, @Body() dto: UpdateInvoiceStatusDto) {
    return this.invoiceService.setStatus(id, dto.status);
  }

  @Post(':id/items')
  async addItem(@Param('id', ParseIntPipe) id: number, @Body() dto: InvoiceItemDto) {
    return this.invoiceService.addItem(id, dto);
  }

  @Delete(':id/items/:itemId')
  async removeItem(@Param('id', ParseIntPipe) id: number, @Param('itemId', ParseIntPipe) itemId: number) {
    return this.invoiceService.removeItem(id, itemId);
  }

  /**
   * Bring total_amount back in line with the items
   * POST /api/invoices/:id/recalculate
   */
  @Post(':id/recalculate')
  async recalculateTotal(@Param('id', ParseIntPipe) id: number) {
    return this.invoiceService.recalculateTotal(id);
  }

  @Delete(':id')
  async deleteInvoice(@Param('id', ParseIntPipe) id: number) {
    return this.invoiceService.deleteInvoice(id);
  }
}
