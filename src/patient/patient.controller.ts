import { Body, Controller, Delete, Get, Param, ParseIntPipe, Patch, Post, Query } from '@nestjs/common';
import { PatientService } from './patient.service';
import { CreatePatientDto } from './dto/create-patient.dto';
import { UpdatePatientDto } from './dto/update-patient.dto';
import { AssignDoctorDto } from './dto/assign-doctor.dto';

@Controller('api/patients')
export class PatientController {
  constructor(private readonly patientService: PatientService) {}

  @Post()
  async createPatient(@Body() dto: CreatePatientDto) {
    return this.patientService.createPatient(dto);
  }

  @Get()
  async getPatients(@Query('search') search?: string) {
    return this.patientService.getPatients(search);
  }

  @Get(':id')
  async getPatient(@Param('id', ParseIntPipe) id: number) {
    return this.patientService.getPatient(id);
  }

  @Patch(':id')
  async updatePatient(@Param('id', ParseIntPipe) id: number, @Body() dto: UpdatePatientDto) {
    return this.patientService.updatePatient(id, dto);
  }

  @Delete(':id')
  async deletePatient(@Param('id', ParseIntPipe) id: number) {
    return this.patientService.deletePatient(id);
  }

  @Get(':id/doctors')
  async getPatientDoctors(@Param('id', ParseIntPipe) id: number) {
    return this.patientService.getPatientDoctors(id);
  }

  @Post(':id/doctors')
  async assignDoctor(@Param('id', ParseIntPipe) id: number, @Body() dto: AssignDoctorDto) {
    return this.patientService.assignDoctor(id, dto);
  }

  @Delete(':id/doctors/:doctorId')
  async unassignDoctor(
    @Param('id', ParseIntPipe) id: number,
    @Param('doctorId', ParseIntPipe) doctorId: number,
  ) {
    return this.patientService.unassignDoctor(id, doctorId);
  }
}
