import { Body, Controller, Get, Param, ParseIntPipe, Post, Put } from '@nestjs/common';
import { InventoryService } from './inventory.service';
import { UpsertInventoryDto } from './dto/upsert-inventory.dto';
import { StockMovementDto } from './dto/stock-movement.dto';

@Controller('api/inventory')
export class InventoryController {
  constructor(private readonly inventoryService: InventoryService) {}

  /**
   * Medications at or below their reorder level
   * GET /api/inventory/low-stock
   */
  @Get('low-stock')
  async getLowStock() {
    return this.inventoryService.getLowStock();
  }

  @Get(':medicationId')
  async getInventory(@Param('medicationId', ParseIntPipe) medicationId: number) {
    return this.inventoryService.getInventory(medicationId);
  }

  @Put(':medicationId')
  async upsertInventory(
    @Param('medicationId', ParseIntPipe) medicationId: number,
    @Body() dto: UpsertInventoryDto,
  ) {
    return this.inventoryService.upsertInventory(medicationId, dto);
  }

  @Post(':medicationId/restock')
  async restock(@Param('medicationId', ParseIntPipe) medicationId: number, @Body() dto: StockMovementDto) {
    return this.inventoryService.restock(medicationId, dto.quantity, dto.date);
  }

  @Post(':medicationId/consume')
  async consume(@Param('medicationId', ParseIntPipe) medicationId: number, @Body() dto: StockMovementDto) {
    return this.inventoryService.consume(medicationId, dto.quantity);
  }
}
