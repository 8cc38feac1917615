import { Body, Controller, Delete, Get, Param, ParseIntPipe, Patch, Post, Query } from '@nestjs/common';
import { DoctorService } from './doctor.service';
import { CreateDoctorDto } from './dto/create-doctor.dto';
import { UpdateDoctorDto } from './dto/update-doctor.dto';
import { AddSpecialtyDto } from './dto/add-specialty.dto';
import { ListDoctorsQuery } from './dto/list-doctors.query';

@Controller('api/doctors')
export class DoctorController {
  constructor(private readonly doctorService: DoctorService) {}

  @Post()
  async createDoctor(@Body() dto: CreateDoctorDto) {
    return this.doctorService.createDoctor(dto);
  }

  @Get()
  async getDoctors(@Query() query: ListDoctorsQuery) {
    return this.doctorService.getDoctors(query.specialtyId);
  }

  @Get(':id')
  async getDoctor(@Param('id', ParseIntPipe) id: number) {
    return this.doctorService.getDoctor(id);
  }

  @Patch(':id')
  async updateDoctor(@Param('id', ParseIntPipe) id: number, @Body() dto: UpdateDoctorDto) {
    return this.doctorService.updateDoctor(id, dto);
  }

  @Delete(':id')
  async deleteDoctor(@Param('id', ParseIntPipe) id: number) {
    return this.doctorService.deleteDoctor(id);
  }

  @Post(':id/specialties')
  async addSpecialty(@Param('id', ParseIntPipe) id: number, @Body() dto: AddSpecialtyDto) {
    return this.doctorService.addSpecialty(id, dto.specialtyId);
  }

  @Delete(':id/specialties/:specialtyId')
  async removeSpecialty(
    @Param('id', ParseIntPipe) id: number,
    @Param('specialtyId', ParseIntPipe) specialtyId: number,
  ) {
    return this.doctorService.removeSpecialty(id, specialtyId);
  }
}
