import {
  BadRequestException,
  ConflictException,
  Injectable,
  Logger,
  NotFoundException,
} from '@nestjs/common';
import { InjectModel } from '@nestjs/mongoose';
import { Model, Types } from 'mongoose';
import { AuditMetadata, AuditService } from '../../../security/audit/audit.service';
import { Patient, PatientDocument } from '../schemas/patient.schema';
import { PatientRequestDto } from '../dto/patient.dto';
import { PatientRecord } from '../interfaces/patient.interface';
import { formatCalendarDate, parseCalendarDate } from '../../../shared/utils/calendar-date';
import { isDuplicateKeyError } from '../../../shared/utils/mongo-errors';

@Injectable()
export class PatientsService {
  private readonly logger = new Logger(PatientsService.name);

  constructor(
    @InjectModel(Patient.name) private readonly patientModel: Model<Patient>,
    private readonly auditService: AuditService,
  ) {}

  async exists(patientId: string): Promise<boolean> {
    if (!Types.ObjectId.isValid(patientId)) {
      return false;
    }
    return (await this.patientModel.exists({ _id: patientId }).exec()) !== null;
  }

  async create(patientDto: PatientRequestDto, metadata?: AuditMetadata): Promise<PatientRecord> {
    this.logger.log('Registering new patient');

    const dob = pastDateOfBirth(patientDto.dob);
    if (await this.emailTaken(patientDto.email)) {
      throw duplicateEmail(patientDto.email);
    }

    let created: PatientDocument;
    try {
      created = await this.patientModel.create({
        firstName: patientDto.firstName,
        lastName: patientDto.lastName,
        dob,
        email: patientDto.email,
        phone: patientDto.phone,
      });
    } catch (error) {
      if (isDuplicateKeyError(error)) {
        throw duplicateEmail(patientDto.email);
      }
      throw error;
    }

    const patient = toPatientRecord(created);
    await this.auditService.logDataAccess('patients', 'create', patient.id, null, patient, metadata);
    this.logger.log(`Patient registered with id ${patient.id}`);
    return patient;
  }

  async findOne(id: string): Promise<PatientRecord> {
    return toPatientRecord(await this.getDocument(id));
  }

  async findAll(): Promise<PatientRecord[]> {
    const patients = await this.patientModel.find().sort({ lastName: 1, firstName: 1 }).exec();
    return patients.map(toPatientRecord);
  }

  async findByPhone(phone: string): Promise<PatientRecord> {
    const patient = await this.patientModel.findOne({ phone }).exec();
    if (!patient) {
      throw new NotFoundException(`Patient not found with phone: ${phone}`);
    }
    return toPatientRecord(patient);
  }

  async findByLastName(lastName: string): Promise<PatientRecord[]> {
    const patients = await this.patientModel.find({ lastName }).sort({ firstName: 1 }).exec();
    return patients.map(toPatientRecord);
  }

  async update(id: string, patientDto: PatientRequestDto, metadata?: AuditMetadata): Promise<PatientRecord> {
    const patient = await this.getDocument(id);
    const previous = toPatientRecord(patient);

    const dob = pastDateOfBirth(patientDto.dob);
    if (previous.email !== patientDto.email && (await this.emailTaken(patientDto.email))) {
      throw duplicateEmail(patientDto.email);
    }

    patient.set({
      firstName: patientDto.firstName,
      lastName: patientDto.lastName,
      dob,
      email: patientDto.email,
      phone: patientDto.phone,
    });

    let saved: PatientDocument;
    try {
      saved = await patient.save();
    } catch (error) {
      if (isDuplicateKeyError(error)) {
        throw duplicateEmail(patientDto.email);
      }
      throw error;
    }

    const updated = toPatientRecord(saved);
    await this.auditService.logDataAccess('patients', 'update', id, previous, updated, metadata);
    this.logger.log(`Patient ${id} updated`);
    return updated;
  }

  async remove(id: string, metadata?: AuditMetadata): Promise<void> {
    const patient = await this.getDocument(id);
    await this.patientModel.findByIdAndDelete(patient._id).exec();

    await this.auditService.logDataAccess('patients', 'delete', id, toPatientRecord(patient), null, metadata);
    this.logger.log(`Patient ${id} removed`);
  }

  private async getDocument(id: string): Promise<PatientDocument> {
    const patient = Types.ObjectId.isValid(id) ? await this.patientModel.findById(id).exec() : null;
    if (!patient) {
      throw new NotFoundException(`Patient not found with id: ${id}`);
    }
    return patient;
  }

  private async emailTaken(email: string): Promise<boolean> {
    return (await this.patientModel.exists({ email }).exec()) !== null;
  }
}

export function toPatientRecord(patient: PatientDocument): PatientRecord {
  return {
    id: patient._id.toHexString(),
    firstName: patient.firstName,
    lastName: patient.lastName,
    dob: formatCalendarDate(patient.dob),
    email: patient.email,
    phone: patient.phone,
    createdAt: patient.createdAt,
    updatedAt: patient.updatedAt,
  };
}

/** Dates of birth are real calendar days strictly before today (UTC) */
function pastDateOfBirth(value: string): Date {
  const dob = parseCalendarDate(value);
  if (!dob) {
    throw new BadRequestException('Date of birth must be in YYYY-MM-DD format');
  }
  if (value >= formatCalendarDate(new Date())) {
    throw new BadRequestException('Date of birth must be in the past');
  }
  return dob;
}

function duplicateEmail(email: string): ConflictException {
  return new ConflictException(`A patient with email '${email}' already exists`);
}
