import { User } from './user/user.entity';
import { Patient } from './patient/patient.entity';
import { PatientDoctor } from './patient/patient-doctor.entity';
import { Specialty } from './specialty/specialty.entity';
import { Doctor } from './doctor/doctor.entity';
import { DoctorSpecialty } from './doctor/doctor-specialty.entity';
import { Room } from './room/room.entity';
import { MedicalService } from './medical-service/medical-service.entity';
import { Appointment } from './appointment/appointment.entity';
import { AppointmentServiceItem } from './appointment/appointment-service-item.entity';
import { Medication } from './medication/medication.entity';
import { Inventory } from './medication/inventory.entity';
import { Prescription } from './prescription/prescription.entity';
import { PrescriptionItem } from './prescription/prescription-item.entity';
import { Invoice } from './invoice/invoice.entity';
import { InvoiceItem } from './invoice/invoice-item.entity';

// Parent tables before the children that reference them.
export const ENTITIES = [
  User,
  Patient,
  Specialty,
  Doctor,
  DoctorSpecialty,
  PatientDoctor,
  Room,
  MedicalService,
  Appointment,
  AppointmentServiceItem,
  Medication,
  Prescription,
  PrescriptionItem,
  Invoice,
  InvoiceItem,
  Inventory,
];
