import { Test, TestingModule } from '@nestjs/testing';
import { BadRequestException, ConflictException, NotFoundException } from '@nestjs/common';
import { getModelToken } from '@nestjs/mongoose';
import { PatientsService } from './patients.service';
import { Patient } from '../schemas/patient.schema';
import { PatientRequestDto } from '../dto/patient.dto';
import { AuditService } from '../../../security/audit/audit.service';
import { InMemoryModel } from '../../../../test/utils/in-memory-model';

describe('PatientsService', () => {
  let service: PatientsService;
  let patientModel: InMemoryModel;
  let logDataAccess: jest.Mock;

  const lina: PatientRequestDto = {
    firstName: 'Lina',
    lastName: 'Moreau',
    dob: '1990-04-12',
    email: 'lina.moreau@example.com',
    phone: '+15550100200',
  };

  beforeEach(async () => {
    patientModel = new InMemoryModel({ unique: ['email'] });
    logDataAccess = jest.fn().mockResolvedValue(undefined);

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        PatientsService,
        { provide: getModelToken(Patient.name), useValue: patientModel },
        { provide: AuditService, useValue: { logDataAccess } },
      ],
    }).compile();

    service = module.get<PatientsService>(PatientsService);
  });

  afterEach(() => {
    jest.useRealTimers();
  });

  describe('create', () => {
    it('registers a patient and audits it', async () => {
      const patient = await service.create(lina);

      expect(patient).toEqual({
        id: expect.any(String),
        ...lina,
        createdAt: expect.any(Date),
        updatedAt: expect.any(Date),
      });
      expect(logDataAccess).toHaveBeenCalledWith('patients', 'create', patient.id, null, patient, undefined);
    });

    it('rejects an email that is already registered', async () => {
      await service.create(lina);

      await expect(service.create({ ...lina, firstName: 'Noor' })).rejects.toThrow(
        new ConflictException("A patient with email 'lina.moreau@example.com' already exists"),
      );
      expect(patientModel.size).toBe(1);
    });

    it('rejects a day that does not exist', async () => {
      await expect(service.create({ ...lina, dob: '1990-02-30' })).rejects.toThrow(
        new BadRequestException('Date of birth must be in YYYY-MM-DD format'),
      );
    });

    it('rejects a date of birth of today or later', async () => {
      jest.useFakeTimers({ now: new Date('2026-05-20T10:00:00.000Z'), doNotFake: ['nextTick', 'setImmediate'] });

      await expect(service.create({ ...lina, dob: '2026-05-20' })).rejects.toThrow(
        new BadRequestException('Date of birth must be in the past'),
      );
      await expect(service.create({ ...lina, dob: '2026-05-19' })).resolves.toMatchObject({ dob: '2026-05-19' });
    });
  });

  describe('lookups', () => {
    it('reports an unknown id', async () => {
      await expect(service.findOne('64b7f0c2a1b2c3d4e5f6ffff')).rejects.toThrow(
        new NotFoundException('Patient not found with id: 64b7f0c2a1b2c3d4e5f6ffff'),
      );
    });

    it('treats a malformed id as unknown', async () => {
      await expect(service.findOne('patient-1')).rejects.toBeInstanceOf(NotFoundException);
      await expect(service.exists('patient-1')).resolves.toBe(false);
    });

    it('finds a patient by phone number', async () => {
      const patient = await service.create(lina);

      await expect(service.findByPhone('+15550100200')).resolves.toEqual(patient);
    });

    it('reports an unknown phone number', async () => {
      await expect(service.findByPhone('+15550109999')).rejects.toThrow(
        new NotFoundException('Patient not found with phone: +15550109999'),
      );
    });

    it('lists patients sharing a last name by first name', async () => {
      await service.create({ ...lina, firstName: 'Zelie', email: 'zelie@example.com' });
      await service.create(lina);
      await service.create({ ...lina, lastName: 'Okafor', email: 'okafor@example.com' });

      const found = await service.findByLastName('Moreau');

      expect(found.map((patient) => patient.firstName)).toEqual(['Lina', 'Zelie']);
    });

    it('lists everyone by last then first name', async () => {
      await service.create({ ...lina, lastName: 'Okafor', email: 'okafor@example.com' });
      await service.create({ ...lina, firstName: 'Zelie', email: 'zelie@example.com' });
      await service.create(lina);

      const all = await service.findAll();

      expect(all.map((patient) => `${patient.firstName} ${patient.lastName}`)).toEqual([
        'Lina Moreau',
        'Zelie Moreau',
        'Lina Okafor',
      ]);
    });
  });

  describe('update', () => {
    it('replaces the fields and audits both versions', async () => {
      const patient = await service.create(lina);

      const updated = await service.update(patient.id, { ...lina, phone: '+15550100300' });

      expect(updated).toMatchObject({ id: patient.id, phone: '+15550100300' });
      expect(logDataAccess).toHaveBeenCalledWith('patients', 'update', patient.id, patient, updated, undefined);
    });

    it('rejects taking over another patient email', async () => {
      await service.create(lina);
      const other = await service.create({ ...lina, email: 'other@example.com' });

      await expect(service.update(other.id, lina)).rejects.toBeInstanceOf(ConflictException);
    });

    it('keeps its own email', async () => {
      const patient = await service.create(lina);

      await expect(service.update(patient.id, { ...lina, lastName: 'Laurent' })).resolves.toMatchObject({
        lastName: 'Laurent',
        email: lina.email,
      });
    });
  });

  describe('remove', () => {
    it('deletes the patient and audits the removed record', async () => {
      const patient = await service.create(lina);

      await service.remove(patient.id);

      expect(patientModel.size).toBe(0);
      await expect(service.exists(patient.id)).resolves.toBe(false);
      expect(logDataAccess).toHaveBeenCalledWith('patients', 'delete', patient.id, patient, null, undefined);
    });
  });
});
