import { Test, TestingModule } from '@nestjs/testing';
import { ConflictException, NotFoundException } from '@nestjs/common';
import { getModelToken } from '@nestjs/mongoose';
import { Types, mongo } from 'mongoose';
import { DoctorsService } from './doctors.service';
import { Doctor } from '../schemas/doctor.schema';
import { DoctorRequestDto } from '../dto/doctor.dto';
import { AuditService } from '../../../security/audit/audit.service';

interface FakeDoctorDocument {
  _id: Types.ObjectId;
  fullName: string;
  licenseNumber: string;
  specialization: string;
  deptId?: number;
  createdAt: Date;
  updatedAt: Date;
  set: jest.Mock;
  save: jest.Mock<Promise<FakeDoctorDocument>, []>;
}

const query = (value: unknown) => ({ exec: jest.fn().mockResolvedValue(value) });

function doctorDocument(overrides: Partial<FakeDoctorDocument> = {}): FakeDoctorDocument {
  const createdAt = new Date('2026-03-01T08:00:00.000Z');
  const doc: FakeDoctorDocument = {
    _id: new Types.ObjectId('64b7f0c2a1b2c3d4e5f60001'),
    fullName: 'Dr. Amira Haddad',
    licenseNumber: 'MED-123456',
    specialization: 'Cardiology',
    deptId: 3,
    createdAt,
    updatedAt: createdAt,
    set: jest.fn((fields: Partial<FakeDoctorDocument>) => {
      Object.assign(doc, fields);
    }),
    save: jest.fn(async () => doc),
    ...overrides,
  };
  return doc;
}

describe('DoctorsService', () => {
  let service: DoctorsService;
  let doctorModel: {
    exists: jest.Mock;
    create: jest.Mock;
    findById: jest.Mock;
    findOne: jest.Mock;
    find: jest.Mock;
    findByIdAndDelete: jest.Mock;
  };
  let logDataAccess: jest.Mock;

  const request: DoctorRequestDto = {
    fullName: 'Dr. Amira Haddad',
    licenseNumber: 'MED-123456',
    specialization: 'Cardiology',
    deptId: 3,
  };

  beforeEach(async () => {
    doctorModel = {
      exists: jest.fn(() => query(null)),
      create: jest.fn(),
      findById: jest.fn(() => query(null)),
      findOne: jest.fn(() => query(null)),
      find: jest.fn(),
      findByIdAndDelete: jest.fn(() => query(null)),
    };
    logDataAccess = jest.fn().mockResolvedValue(undefined);

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        DoctorsService,
        { provide: getModelToken(Doctor.name), useValue: doctorModel },
        { provide: AuditService, useValue: { logDataAccess } },
      ],
    }).compile();

    service = module.get<DoctorsService>(DoctorsService);
  });

  describe('exists', () => {
    it('answers false for ids that are not ObjectIds', async () => {
      await expect(service.exists('not-an-id')).resolves.toBe(false);
      expect(doctorModel.exists).not.toHaveBeenCalled();
    });

    it('answers true for a registered doctor', async () => {
      doctorModel.exists.mockReturnValueOnce(query({ _id: new Types.ObjectId() }));

      await expect(service.exists('64b7f0c2a1b2c3d4e5f60001')).resolves.toBe(true);
    });

    it('answers false for an unknown doctor', async () => {
      await expect(service.exists('64b7f0c2a1b2c3d4e5f60001')).resolves.toBe(false);
    });
  });

  describe('create', () => {
    it('registers a doctor and audits it', async () => {
      doctorModel.create.mockResolvedValueOnce(doctorDocument());

      const doctor = await service.create(request);

      expect(doctor).toEqual({
        id: '64b7f0c2a1b2c3d4e5f60001',
        fullName: 'Dr. Amira Haddad',
        licenseNumber: 'MED-123456',
        specialization: 'Cardiology',
        deptId: 3,
        createdAt: new Date('2026-03-01T08:00:00.000Z'),
        updatedAt: new Date('2026-03-01T08:00:00.000Z'),
      });
      expect(logDataAccess).toHaveBeenCalledWith('doctors', 'create', doctor.id, null, doctor, undefined);
    });

    it('rejects a license number that is already registered', async () => {
      doctorModel.exists.mockReturnValueOnce(query({ _id: new Types.ObjectId() }));

      await expect(service.create(request)).rejects.toThrow(
        new ConflictException("Doctor with license number 'MED-123456' already exists"),
      );
      expect(doctorModel.create).not.toHaveBeenCalled();
    });

    it('maps a unique index violation to a conflict', async () => {
      doctorModel.create.mockRejectedValueOnce(
        new mongo.MongoServerError({ message: 'E11000 duplicate key error', code: 11000 }),
      );

      await expect(service.create(request)).rejects.toBeInstanceOf(ConflictException);
    });

    it('lets other store errors through', async () => {
      doctorModel.create.mockRejectedValueOnce(new Error('connection reset'));

      await expect(service.create(request)).rejects.toThrow('connection reset');
    });
  });

  describe('findOne', () => {
    it('reports ids that are not ObjectIds as missing', async () => {
      await expect(service.findOne('abc')).rejects.toThrow(
        new NotFoundException('Doctor not found with id: abc'),
      );
      expect(doctorModel.findById).not.toHaveBeenCalled();
    });

    it('reports unknown doctors as missing', async () => {
      await expect(service.findOne('64b7f0c2a1b2c3d4e5f60009')).rejects.toBeInstanceOf(NotFoundException);
    });
  });

  describe('findByLicenseNumber', () => {
    it('returns the matching doctor', async () => {
      doctorModel.findOne.mockReturnValueOnce(query(doctorDocument()));

      await expect(service.findByLicenseNumber('MED-123456')).resolves.toMatchObject({
        id: '64b7f0c2a1b2c3d4e5f60001',
        licenseNumber: 'MED-123456',
      });
      expect(doctorModel.findOne).toHaveBeenCalledWith({ licenseNumber: 'MED-123456' });
    });

    it('reports an unknown license number', async () => {
      await expect(service.findByLicenseNumber('MED-000000')).rejects.toThrow(
        'Doctor not found with license number: MED-000000',
      );
    });
  });

  describe('findAll', () => {
    it('lists doctors by name', async () => {
      const sort = jest.fn(() => query([doctorDocument()]));
      doctorModel.find.mockReturnValueOnce({ sort });

      await expect(service.findAll()).resolves.toHaveLength(1);
      expect(sort).toHaveBeenCalledWith({ fullName: 1 });
    });
  });

  describe('update', () => {
    it('replaces the fields and audits both versions', async () => {
      const existing = doctorDocument();
      doctorModel.findById.mockReturnValueOnce(query(existing));

      const updated = await service.update('64b7f0c2a1b2c3d4e5f60001', {
        ...request,
        specialization: 'Neurology',
        deptId: undefined,
      });

      expect(updated.specialization).toBe('Neurology');
      expect(updated.deptId).toBeUndefined();
      // Same license: no uniqueness lookup
      expect(doctorModel.exists).not.toHaveBeenCalled();
      expect(logDataAccess).toHaveBeenCalledWith(
        'doctors',
        'update',
        '64b7f0c2a1b2c3d4e5f60001',
        expect.objectContaining({ specialization: 'Cardiology', deptId: 3 }),
        updated,
        undefined,
      );
    });

    it('rejects a license number held by another doctor', async () => {
      doctorModel.findById.mockReturnValueOnce(query(doctorDocument()));
      doctorModel.exists.mockReturnValueOnce(query({ _id: new Types.ObjectId() }));

      await expect(
        service.update('64b7f0c2a1b2c3d4e5f60001', { ...request, licenseNumber: 'MED-654321' }),
      ).rejects.toThrow("Doctor with license number 'MED-654321' already exists");
    });

    it('reports an unknown doctor', async () => {
      await expect(service.update('64b7f0c2a1b2c3d4e5f60009', request)).rejects.toBeInstanceOf(
        NotFoundException,
      );
    });
  });

  describe('remove', () => {
    it('deletes the doctor and audits it', async () => {
      const existing = doctorDocument();
      doctorModel.findById.mockReturnValueOnce(query(existing));

      await service.remove('64b7f0c2a1b2c3d4e5f60001');

      expect(doctorModel.findByIdAndDelete).toHaveBeenCalledWith(existing._id);
      expect(logDataAccess).toHaveBeenCalledWith(
        'doctors',
        'delete',
        '64b7f0c2a1b2c3d4e5f60001',
        expect.objectContaining({ licenseNumber: 'MED-123456' }),
        null,
        undefined,
      );
    });

    it('reports an unknown doctor', async () => {
      await expect(service.remove('64b7f0c2a1b2c3d4e5f60009')).rejects.toBeInstanceOf(NotFoundException);
      expect(doctorModel.findByIdAndDelete).not.toHaveBeenCalled();
    });
  });
});
