import { Body, Controller, Delete, Get, Param, ParseIntPipe, Patch, Post } from '@nestjs/common';
import { PrescriptionService } from './prescription.service';
import { CreatePrescriptionDto } from './dto/create-prescription.dto';
import { UpdatePrescriptionDto } from './dto/update-prescription.dto';
import { PrescriptionItemDto } from './dto/prescription-item.dto';

@Controller('api/prescriptions')
export class PrescriptionController {
  constructor(private readonly prescriptionService: PrescriptionService) {}

  @Post()
  async createPrescription(@Body() dto: CreatePrescriptionDto) {
    return this.prescriptionService.createPrescription(dto);
  }

  @Get('appointment/:appointmentId')
  async getPrescriptionForAppointment(@Param('appointmentId', ParseIntPipe) appointmentId: number) {
    return this.prescriptionService.getPrescriptionForAppointment(appointmentId);
  }

  @Get(':id')
  async getPrescription(@Param('id', ParseIntPipe) id: number) {
    return this.prescriptionService.getPrescription(id);
  }

  @Patch(':id')
  async updatePrescription(@Param('id', ParseIntPipe) id: number, @Body() dto: UpdatePrescriptionDto) {
    return this.prescriptionService.updatePrescription(id, dto);
  }

  @Post(':id/items')
  async addItem(@Param('id', ParseIntPipe) id: number, @Body() dto: PrescriptionItemDto) {
    return this.prescriptionService.addItem(id, dto);
  }

  @Delete(':id/items/:itemId')
  async removeItem(@Param('id', ParseIntPipe) id: number, @Param('itemId', ParseIntPipe) itemId: number) {
    return this.prescriptionService.removeItem(id, itemId);
  }

  @Delete(':id')
  async deletePrescription(@Param('id', ParseIntPipe) id: number) {
    return this.prescriptionService.deletePrescription(id);
  }
}
