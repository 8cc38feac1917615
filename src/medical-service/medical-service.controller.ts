import { Body, Controller, Delete, Get, Param, ParseIntPipe, Patch, Post } from '@nestjs/common';
import { MedicalServiceService } from './medical-service.service';
import { CreateMedicalServiceDto } from './dto/create-medical-service.dto';
import { UpdateMedicalServiceDto } from './dto/update-medical-service.dto';

@Controller('api/services')
export class MedicalServiceController {
  constructor(private readonly medicalServiceService: MedicalServiceService) {}

  @Post()
  async createService(@Body() dto: CreateMedicalServiceDto) {
    return this.medicalServiceService.createService(dto);
  }

  @Get()
  async getServices() {
    return this.medicalServiceService.getServices();
  }

  /**
   * Look up a catalog entry by its billing code
   * GET /api/services/code/:code
   */
  @Get('code/:code')
  async getServiceByCode(@Param('code') code: string) {
    return this.medicalServiceService.getServiceByCode(code);
  }

  @Get(':id')
  async getService(@Param('id', ParseIntPipe) id: number) {
    return this.medicalServiceService.getService(id);
  }

  @Patch(':id')
  async updateService(@Param('id', ParseIntPipe) id: number, @Body() dto: UpdateMedicalServiceDto) {
    return this.medicalServiceService.updateService(id, dto);
  }

  @Delete(':id')
  async deleteService(@Param('id', ParseIntPipe) id: number) {
    return this.medicalServiceService.deleteService(id);
  }
}
