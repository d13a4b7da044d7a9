import { ConflictException, Injectable, Logger, NotFoundException } from '@nestjs/common';
import { InjectModel } from '@nestjs/mongoose';
import { Model, Types } from 'mongoose';
import { AuditMetadata, AuditService } from '../../../security/audit/audit.service';
import { IDoctorDirectory } from '../../shifts/interfaces/doctor-directory.interface';
import { Doctor, DoctorDocument } from '../schemas/doctor.schema';
import { DoctorRequestDto } from '../dto/doctor.dto';
import { DoctorRecord } from '../interfaces/doctor.interface';
import { isDuplicateKeyError } from '../../../shared/utils/mongo-errors';

@Injectable()
export class DoctorsService implements IDoctorDirectory {
  private readonly logger = new Logger(DoctorsService.name);

  constructor(
    @InjectModel(Doctor.name) private readonly doctorModel: Model<Doctor>,
    private readonly auditService: AuditService,
  ) {}

  async exists(doctorId: string): Promise<boolean> {
    if (!Types.ObjectId.isValid(doctorId)) {
      return false;
    }
    return (await this.doctorModel.exists({ _id: doctorId }).exec()) !== null;
  }

  async create(doctorDto: DoctorRequestDto, metadata?: AuditMetadata): Promise<DoctorRecord> {
    this.logger.log(`Registering doctor with license ${doctorDto.licenseNumber}`);

    if (await this.licenseTaken(doctorDto.licenseNumber)) {
      throw duplicateLicense(doctorDto.licenseNumber);
    }

    let created: DoctorDocument;
    try {
      created = await this.doctorModel.create({
        fullName: doctorDto.fullName,
        licenseNumber: doctorDto.licenseNumber,
        specialization: doctorDto.specialization,
        deptId: doctorDto.deptId,
      });
    } catch (error) {
      // Lost a race against another registration with the same license
      if (isDuplicateKeyError(error)) {
        throw duplicateLicense(doctorDto.licenseNumber);
      }
      throw error;
    }

    const doctor = toDoctorRecord(created);
    await this.auditService.logDataAccess('doctors', 'create', doctor.id, null, doctor, metadata);
    this.logger.log(`Doctor registered with id ${doctor.id}`);
    return doctor;
  }

  async findOne(id: string): Promise<DoctorRecord> {
    return toDoctorRecord(await this.getDocument(id));
  }

  async findByLicenseNumber(licenseNumber: string): Promise<DoctorRecord> {
    const doctor = await this.doctorModel.findOne({ licenseNumber }).exec();
    if (!doctor) {
      throw new NotFoundException(`Doctor not found with license number: ${licenseNumber}`);
    }
    return toDoctorRecord(doctor);
  }

  async findAll(): Promise<DoctorRecord[]> {
    const doctors = await this.doctorModel.find().sort({ fullName: 1 }).exec();
    return doctors.map(toDoctorRecord);
  }

  async update(id: string, doctorDto: DoctorRequestDto, metadata?: AuditMetadata): Promise<DoctorRecord> {
    const doctor = await this.getDocument(id);
    const previous = toDoctorRecord(doctor);

    if (
      previous.licenseNumber !== doctorDto.licenseNumber &&
      (await this.licenseTaken(doctorDto.licenseNumber))
    ) {
      throw duplicateLicense(doctorDto.licenseNumber);
    }

    doctor.set({
      fullName: doctorDto.fullName,
      licenseNumber: doctorDto.licenseNumber,
      specialization: doctorDto.specialization,
      deptId: doctorDto.deptId,
    });

    let saved: DoctorDocument;
    try {
      saved = await doctor.save();
    } catch (error) {
      if (isDuplicateKeyError(error)) {
        throw duplicateLicense(doctorDto.licenseNumber);
      }
      throw error;
    }

    const updated = toDoctorRecord(saved);
    await this.auditService.logDataAccess('doctors', 'update', id, previous, updated, metadata);
    this.logger.log(`Doctor ${id} updated`);
    return updated;
  }

  /**
   * Removes the doctor from the registry. Existing shifts are left in place;
   * new or updated shifts for this doctor are rejected from now on.
   */
  async remove(id: string, metadata?: AuditMetadata): Promise<void> {
    const doctor = await this.getDocument(id);
    await this.doctorModel.findByIdAndDelete(doctor._id).exec();

    await this.auditService.logDataAccess('doctors', 'delete', id, toDoctorRecord(doctor), null, metadata);
    this.logger.log(`Doctor ${id} removed`);
  }

  private async getDocument(id: string): Promise<DoctorDocument> {
    const doctor = Types.ObjectId.isValid(id) ? await this.doctorModel.findById(id).exec() : null;
    if (!doctor) {
      throw new NotFoundException(`Doctor not found with id: ${id}`);
    }
    return doctor;
  }

  private async licenseTaken(licenseNumber: string): Promise<boolean> {
    return (await this.doctorModel.exists({ licenseNumber }).exec()) !== null;
  }
}

export function toDoctorRecord(doctor: DoctorDocument): DoctorRecord {
  return {
    id: doctor._id.toHexString(),
    fullName: doctor.fullName,
    licenseNumber: doctor.licenseNumber,
    specialization: doctor.specialization,
    deptId: doctor.deptId,
    createdAt: doctor.createdAt,
    updatedAt: doctor.updatedAt,
  };
}

function duplicateLicense(licenseNumber: string): ConflictException {
  return new ConflictException(`Doctor with license number '${licenseNumber}' already exists`);
}
