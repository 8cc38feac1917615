import { Test, TestingModule } from '@nestjs/testing';
import { DataSource } from 'typeorm';
import { DoctorService } from './doctor.service';
import { Doctor } from './doctor.entity';
import { DoctorSpecialty } from './doctor-specialty.entity';
import { SpecialtyService } from '../specialty/specialty.service';
import { User } from '../user/user.entity';
import { TypeOrmTestingModule } from '../testing/typeorm-testing.module';
import { insertSpecialty, insertUser } from '../testing/fixtures';

describe('DoctorService', () => {
  let moduleRef: TestingModule;
  let service: DoctorService;
  let dataSource: DataSource;

  const doctor = (licenseNumber: string, lastName = 'Costa') => ({ firstName: 'Rui', lastName, licenseNumber });

  beforeEach(async () => {
    moduleRef = await Test.createTestingModule({
      imports: TypeOrmTestingModule(),
      providers: [DoctorService, SpecialtyService],
    }).compile();
    service = moduleRef.get(DoctorService);
    dataSource = moduleRef.get(DataSource);
  });

  afterEach(async () => {
    await moduleRef.close();
  });

  it('creates a doctor with specialties', async () => {
    const cardiology = await insertSpecialty(dataSource, 'Cardiology');
    const pediatrics = await insertSpecialty(dataSource, 'Pediatrics');

    const created = await service.createDoctor({
      ...doctor('LIC-100'),
      hireDate: '2020-05-01',
      specialtyIds: [cardiology.id, pediatrics.id],
    });

    expect(created.hireDate).toBe('2020-05-01');
    const names = (created.specialtyLinks ?? []).map((link) => link.specialty?.name).sort();
    expect(names).toEqual(['Cardiology', 'Pediatrics']);
  });

  it('rolls back when a specialty does not exist', async () => {
    await expect(service.createDoctor({ ...doctor('LIC-100'), specialtyIds: [999] })).rejects.toMatchObject({
      kind: 'foreign_key',
    });
    expect(await dataSource.getRepository(Doctor).count()).toBe(0);
  });

  it('keeps license numbers unique', async () => {
    await service.createDoctor(doctor('LIC-100'));
    await expect(service.createDoctor(doctor('LIC-100', 'Lopes'))).rejects.toMatchObject({ kind: 'unique' });
  });

  it('filters by specialty', async () => {
    const cardiology = await insertSpecialty(dataSource, 'Cardiology');
    const cardiologist = await service.createDoctor({ ...doctor('LIC-1', 'Alves'), specialtyIds: [cardiology.id] });
    await service.createDoctor(doctor('LIC-2', 'Brito'));

    expect((await service.getDoctors(cardiology.id)).map((d) => d.id)).toEqual([cardiologist.id]);
    expect((await service.getDoctors()).map((d) => d.lastName)).toEqual(['Alves', 'Brito']);
    expect(await service.getDoctors(999)).toEqual([]);
  });

  it('refuses the same specialty twice', async () => {
    const cardiology = await insertSpecialty(dataSource, 'Cardiology');
    const { id } = await service.createDoctor({ ...doctor('LIC-1'), specialtyIds: [cardiology.id] });
    await expect(service.addSpecialty(id, cardiology.id)).rejects.toMatchObject({ kind: 'unique' });
  });

  it('adds and removes specialties', async () => {
    const cardiology = await insertSpecialty(dataSource, 'Cardiology');
    const { id } = await service.createDoctor(doctor('LIC-1'));

    expect((await service.addSpecialty(id, cardiology.id)).specialtyLinks).toHaveLength(1);
    expect((await service.removeSpecialty(id, cardiology.id)).specialtyLinks).toEqual([]);
  });

  it('drops specialty links when the specialty is deleted', async () => {
    const cardiology = await insertSpecialty(dataSource, 'Cardiology');
    const { id } = await service.createDoctor({ ...doctor('LIC-1'), specialtyIds: [cardiology.id] });

    await moduleRef.get(SpecialtyService).deleteSpecialty(cardiology.id);

    expect(await dataSource.getRepository(DoctorSpecialty).count()).toBe(0);
    expect((await service.getDoctor(id)).specialtyLinks).toEqual([]);
  });

  describe('login account', () => {
    it('is cleared when the user is deleted', async () => {
      const user = await insertUser(dataSource, { role: 'doctor' });
      const { id } = await service.createDoctor({ ...doctor('LIC-1'), userId: user.id });

      await dataSource.getRepository(User).delete(user.id);
      expect((await service.getDoctor(id)).userId).toBeNull();
    });

    it('can be unlinked with null', async () => {
      const user = await insertUser(dataSource, { role: 'doctor' });
      const { id } = await service.createDoctor({ ...doctor('LIC-1'), userId: user.id });
      expect((await service.updateDoctor(id, { userId: null })).userId).toBeNull();
    });

    it('belongs to at most one doctor', async () => {
      const user = await insertUser(dataSource, { role: 'doctor' });
      await service.createDoctor({ ...doctor('LIC-1'), userId: user.id });
      await expect(service.createDoctor({ ...doctor('LIC-2'), userId: user.id })).rejects.toMatchObject({
        kind: 'unique',
      });
    });
  });
});
