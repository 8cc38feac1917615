import { Body, Controller, Delete, Get, Param, ParseIntPipe, Patch, Post, Query } from '@nestjs/common';
import { AppointmentService } from './appointment.service';
import { CreateAppointmentDto } from './dto/create-appointment.dto';
import { UpdateAppointmentDto } from './dto/update-appointment.dto';
import { UpdateAppointmentStatusDto } from './dto/update-appointment-status.dto';
import { AppointmentServiceLineDto } from './dto/appointment-service-line.dto';
import { ListAppointmentsQuery } from './dto/list-appointments.query';

@Controller('api/appointments')
export class AppointmentController {
  constructor(private readonly appointmentService: AppointmentService) {}

  @Post()
  async createAppointment(@Body() dto: CreateAppointmentDto) {
    return this.appointmentService.createAppointment(dto);
  }

  @Get()
  async getAppointments(@Query() query: ListAppointmentsQuery) {
    return this.appointmentService.getAppointments(query);
  }

  @Get(':id')
  async getAppointment(@Param('id', ParseIntPipe) id: number) {
    return this.appointmentService.getAppointment(id);
  }

  @Patch(':id')
  async updateAppointment(@Param('id', ParseIntPipe) id: number, @Body() dto: UpdateAppointmentDto) {
    return this.appointmentService.updateAppointment(id, dto);
  }

  /**
   * Move the appointment to any status (check-in, completion, no-show...)
   * PATCH /api/appointments/:id/status
   */
  @Patch(':id/status')
  async setStatus(@Param('id', ParseIntPipe) id: number, @Body() dto: UpdateAppointmentStatusDto) {
    return this.appointmentService.setStatus(id, dto.status);
  }

  @Post(':id/services')
  async addService(@Param('id', ParseIntPipe) id: number, @Body() dto: AppointmentServiceLineDto) {
    return this.appointmentService.addService(id, dto);
  }

  @Delete(':id/services/:serviceId')
  async removeService(
    @Param('id', ParseIntPipe) id: number,
    @Param('serviceId', ParseIntPipe) serviceId: number,
  ) {
    return this.appointmentService.removeService(id, serviceId);
  }

  @Delete(':id')
  async deleteAppointment(@Param('id', ParseIntPipe) id: number) {
    return this.appointmentService.deleteAppointment(id);
  }
}
