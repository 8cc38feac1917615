import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { AppController } from './app.controller';
import { ENTITIES } from './entities';
import { buildDataSourceOptions } from './config/database.config';
import { UserController } from './user/user.controller';
import { UserService } from './user/user.service';
import { PatientController } from './patient/patient.controller';
import { PatientService } from './patient/patient.service';
import { SpecialtyController } from './specialty/specialty.controller';
import { SpecialtyService } from './specialty/specialty.service';
import { DoctorController } from './doctor/doctor.controller';
import { DoctorService } from './doctor/doctor.service';
import { RoomController } from './room/room.controller';
import { RoomService } from './room/room.service';
import { MedicalServiceController } from './medical-service/medical-service.controller';
import { MedicalServiceService } from './medical-service/medical-service.service';
import { AppointmentController } from './appointment/appointment.controller';
import { AppointmentService } from './appointment/appointment.service';
import { MedicationController } from './medication/medication.controller';
import { MedicationService } from './medication/medication.service';
import { InventoryController } from './medication/inventory.controller';
import { InventoryService } from './medication/inventory.service';
import { PrescriptionController } from './prescription/prescription.controller';
import { PrescriptionService } from './prescription/prescription.service';
import { InvoiceController } from './invoice/invoice.controller';
import { InvoiceService } from './invoice/invoice.service';

@Module({
  imports: [
    TypeOrmModule.forRootAsync({
      useFactory: () => buildDataSourceOptions(),
    }),
    TypeOrmModule.forFeature(ENTITIES),
  ],
  controllers: [
    AppController,
    UserController,
    PatientController,
    SpecialtyController,
    DoctorController,
    RoomController,
    MedicalServiceController,
    AppointmentController,
    MedicationController,
    InventoryController,
    PrescriptionController,
    InvoiceController,
  ],
  providers: [
    UserService,
    PatientService,
    SpecialtyService,
    DoctorService,
    RoomService,
    MedicalServiceService,
    AppointmentService,
    MedicationService,
    InventoryService,
    PrescriptionService,
    InvoiceService,
  ],
})
export class AppModule {}
