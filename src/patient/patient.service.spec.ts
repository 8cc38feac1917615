import { Test, TestingModule } from '@nestjs/testing';
import { DataSource } from 'typeorm';
import { PatientService } from './patient.service';
import { PatientDoctor } from './patient-doctor.entity';
import { TypeOrmTestingModule } from '../testing/typeorm-testing.module';
import { insertDoctor } from '../testing/fixtures';

describe('PatientService', () => {
  let moduleRef: TestingModule;
  let service: PatientService;
  let dataSource: DataSource;

  beforeEach(async () => {
    moduleRef = await Test.createTestingModule({
      imports: TypeOrmTestingModule(),
      providers: [PatientService],
    }).compile();
    service = moduleRef.get(PatientService);
    dataSource = moduleRef.get(DataSource);
  });

  afterEach(async () => {
    await moduleRef.close();
  });

  it('registers a patient with gender other by default', async () => {
    const patient = await service.createPatient({ firstName: 'Ana', lastName: 'Silva', dateOfBirth: '1990-07-14' });
    expect(patient).toMatchObject({ firstName: 'Ana', gender: 'other', nationalId: null });
    expect((await service.getPatient(patient.id)).dateOfBirth).toBe('1990-07-14');
  });

  it('rejects an empty first name', async () => {
    await expect(service.createPatient({ firstName: '', lastName: 'Silva' })).rejects.toMatchObject({ kind: 'check' });
  });

  it('keeps national ids unique', async () => {
    await service.createPatient({ firstName: 'Ana', lastName: 'Silva', nationalId: 'ID-1' });
    await expect(
      service.createPatient({ firstName: 'Rita', lastName: 'Lopes', nationalId: 'ID-1' }),
    ).rejects.toMatchObject({ kind: 'unique' });
  });

  it('searches by the start of the last or first name, ignoring case', async () => {
    await service.createPatient({ firstName: 'Ana', lastName: 'Silva' });
    await service.createPatient({ firstName: 'Bruno', lastName: 'Santos' });
    await service.createPatient({ firstName: 'Silvia', lastName: 'Costa' });
    await service.createPatient({ firstName: 'Marta', lastName: 'Vasil' });

    const found = await service.getPatients('sil');
    expect(found.map((p) => p.firstName)).toEqual(['Silvia', 'Ana']);
    expect(await service.getPatients()).toHaveLength(4);
  });

  it('matches % and _ in a search literally', async () => {
    await service.createPatient({ firstName: 'Ana', lastName: 'Silva' });
    await service.createPatient({ firstName: 'Bea', lastName: 'Sa_mpaio' });

    expect(await service.getPatients('%')).toEqual([]);
    expect(await service.getPatients('_')).toEqual([]);
    expect((await service.getPatients('sa_')).map((p) => p.lastName)).toEqual(['Sa_mpaio']);
  });

  it('updates contact details', async () => {
    const { id } = await service.createPatient({ firstName: 'Ana', lastName: 'Silva' });
    const updated = await service.updatePatient(id, { phone: '555-0101' });
    expect(updated.phone).toBe('555-0101');
  });

  describe('doctor assignments', () => {
    it('assigns a doctor with today as the default date', async () => {
      const patient = await service.createPatient({ firstName: 'Ana', lastName: 'Silva' });
      const doctor = await insertDoctor(dataSource, { lastName: 'Costa' });

      const link = await service.assignDoctor(patient.id, { doctorId: doctor.id, isPrimary: true });
      expect(link).toMatchObject({ patientId: patient.id, doctorId: doctor.id, isPrimary: true });
      expect(link.assignedDate).toMatch(/^\d{4}-\d{2}-\d{2}$/);
      expect(link.doctor?.lastName).toBe('Costa');
    });

    it('refuses assigning the same doctor twice', async () => {
      const patient = await service.createPatient({ firstName: 'Ana', lastName: 'Silva' });
      const doctor = await insertDoctor(dataSource);
      await service.assignDoctor(patient.id, { doctorId: doctor.id });
      await expect(service.assignDoctor(patient.id, { doctorId: doctor.id })).rejects.toMatchObject({
        kind: 'unique',
      });
    });

    it('lists the primary doctor first', async () => {
      const patient = await service.createPatient({ firstName: 'Ana', lastName: 'Silva' });
      const gp = await insertDoctor(dataSource);
      const cardiologist = await insertDoctor(dataSource);
      await service.assignDoctor(patient.id, { doctorId: cardiologist.id, assignedDate: '2026-01-01' });
      await service.assignDoctor(patient.id, { doctorId: gp.id, isPrimary: true, assignedDate: '2026-02-01' });

      const links = await service.getPatientDoctors(patient.id);
      expect(links.map((l) => l.doctorId)).toEqual([gp.id, cardiologist.id]);
    });

    it('removes assignments when the patient is deleted', async () => {
      const patient = await service.createPatient({ firstName: 'Ana', lastName: 'Silva' });
      const doctor = await insertDoctor(dataSource);
      await service.assignDoctor(patient.id, { doctorId: doctor.id });

      await service.deletePatient(patient.id);
      expect(await dataSource.getRepository(PatientDoctor).count()).toBe(0);
    });

    it('unassigns a doctor', async () => {
      const patient = await service.createPatient({ firstName: 'Ana', lastName: 'Silva' });
      const doctor = await insertDoctor(dataSource);
      await service.assignDoctor(patient.id, { doctorId: doctor.id });

      await service.unassignDoctor(patient.id, doctor.id);
      expect(await service.getPatientDoctors(patient.id)).toEqual([]);
      await expect(service.unassignDoctor(patient.id, doctor.id)).rejects.toThrow(
        'Doctor is not assigned to this patient',
      );
    });
  });
});
