import { Body, Controller, Delete, Get, Param, ParseIntPipe, Patch, Post } from '@nestjs/common';
import { MedicationService } from './medication.service';
import { CreateMedicationDto } from './dto/create-medication.dto';
import { UpdateMedicationDto } from './dto/update-medication.dto';

@Controller('api/medications')
export class MedicationController {
  constructor(private readonly medicationService: MedicationService) {}

  @Post()
  async createMedication(@Body() dto: CreateMedicationDto) {
    return this.medicationService.createMedication(dto);
  }

  @Get()
  async getMedications() {
    return this.medicationService.getMedications();
  }

  @Get(':id')
  async getMedication(@Param('id', ParseIntPipe) id: number) {
    return this.medicationService.getMedication(id);
  }

  @Patch(':id')
  async updateMedication(@Param('id', ParseIntPipe) id: number, @Body() dto: UpdateMedicationDto) {
    return this.medicationService.updateMedication(id, dto);
  }

  @Delete(':id')
  async deleteMedication(@Param('id', ParseIntPipe) id: number) {
    return this.medicationService.deleteMedication(id);
  }
}
