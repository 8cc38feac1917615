import { Body, Controller, Delete, Get, Param, ParseIntPipe, Patch, Post } from '@nestjs/common';
import { SpecialtyService } from './specialty.service';
import { CreateSpecialtyDto } from './dto/create-specialty.dto';
import { UpdateSpecialtyDto } from './dto/update-specialty.dto';

@Controller('api/specialties')
export class SpecialtyController {
  constructor(private readonly specialtyService: SpecialtyService) {}

  @Post()
  async createSpecialty(@Body() dto: CreateSpecialtyDto) {
    return this.specialtyService.createSpecialty(dto);
  }

  @Get()
  async getSpecialties() {
    return this.specialtyService.getSpecialties();
  }

  @Get(':id')
  async getSpecialty(@Param('id', ParseIntPipe) id: number) {
    return this.specialtyService.getSpecialty(id);
  }

  @Patch(':id')
  async updateSpecialty(@Param('id', ParseIntPipe) id: number, @Body() dto: UpdateSpecialtyDto) {
    return this.specialtyService.updateSpecialty(id, dto);
  }

  @Delete(':id')
  async deleteSpecialty(@Param('id', ParseIntPipe) id: number) {
    return this.specialtyService.deleteSpecialty(id);
  }
}
