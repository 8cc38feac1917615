import { DataSource, DeepPartial } from 'typeorm';
import { Patient } from '../patient/patient.entity';
import { Doctor } from '../doctor/doctor.entity';
import { Specialty } from '../specialty/specialty.entity';
import { Room } from '../room/room.entity';
import { MedicalService } from '../medical-service/medical-service.entity';
import { Medication } from '../medication/medication.entity';
import { User } from '../user/user.entity';

let sequence = 0;
const next = () => ++sequence;

export function insertPatient(ds: DataSource, data: DeepPartial<Patient> = {}): Promise<Patient> {
  const repo = ds.getRepository(Patient);
  return repo.save(repo.create({ firstName: 'Ana', lastName: 'Silva', ...data }));
}

export function insertDoctor(ds: DataSource, data: DeepPartial<Doctor> = {}): Promise<Doctor> {
  const repo = ds.getRepository(Doctor);
  return repo.save(
    repo.create({ firstName: 'Rui', lastName: 'Costa', licenseNumber: `LIC-${next()}`, ...data }),
  );
}

export function insertSpecialty(ds: DataSource, name = `Specialty ${next()}`): Promise<Specialty> {
  const repo = ds.getRepository(Specialty);
  return repo.save(repo.create({ name }));
}

export function insertRoom(ds: DataSource, name = `Room ${next()}`): Promise<Room> {
  const repo = ds.getRepository(Room);
  return repo.save(repo.create({ name }));
}

export function insertService(ds: DataSource, data: DeepPartial<MedicalService> = {}): Promise<MedicalService> {
  const repo = ds.getRepository(MedicalService);
  return repo.save(repo.create({ code: `SVC-${next()}`, name: 'Consultation', price: '50.00', ...data }));
}

export function insertMedication(ds: DataSource, data: DeepPartial<Medication> = {}): Promise<Medication> {
  const repo = ds.getRepository(Medication);
  return repo.save(repo.create({ name: 'Amoxicillin', strength: `${next()}00 mg`, ...data }));
}

export function insertUser(ds: DataSource, data: DeepPartial<User> = {}): Promise<User> {
  const n = next();
  const repo = ds.getRepository(User);
  return repo.save(
    repo.create({
      username: `user${n}`,
      email: `user${n}@clinic.test`,
      passwordHash: 'not-a-real-hash',
      fullName: 'Test User',
      ...data,
    }),
  );
}
