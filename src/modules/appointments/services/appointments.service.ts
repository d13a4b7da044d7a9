import {
  BadRequestException,
  ConflictException,
  Injectable,
  Logger,
  NotFoundException,
} from '@nestjs/common';
import { InjectModel } from '@nestjs/mongoose';
import { FilterQuery, Model, Types } from 'mongoose';
import { AuditMetadata, AuditService } from '../../../security/audit/audit.service';
import { Appointment, AppointmentDocument } from '../schemas/appointment.schema';
import { AppointmentRequestDto } from '../dto/appointment.dto';
import {
  AppointmentFilter,
  AppointmentRecord,
  AppointmentStatus,
} from '../interfaces/appointment.interface';
import { PatientsService } from '../../patients/services/patients.service';
import { DoctorsService } from '../../doctors/services/doctors.service';
import { ShiftLifecycleService } from '../../shifts/services/shift-lifecycle.service';
import { shiftErrorToHttpException } from '../../shifts/utils/shift-error.mapper';
import { formatTimeOfDay, parseTimeOfDay, utcTimeOfDay } from '../../../shared/utils/time-of-day';

type ClosingStatus = Exclude<AppointmentStatus, 'scheduled'>;

const CLOSING_VERB: Record<ClosingStatus, string> = {
  completed: 'complete',
  cancelled: 'cancel',
};

/**
 * Appointments book a patient into one of a doctor's shifts. Only scheduled
 * appointments change; completing or cancelling one is final.
 */
@Injectable()
export class AppointmentsService {
  private readonly logger = new Logger(AppointmentsService.name);

  constructor(
    @InjectModel(Appointment.name) private readonly appointmentModel: Model<Appointment>,
    private readonly patientsService: PatientsService,
    private readonly doctorsService: DoctorsService,
    private readonly shiftLifecycleService: ShiftLifecycleService,
    private readonly auditService: AuditService,
  ) {}

  async create(appointmentDto: AppointmentRequestDto, metadata?: AuditMetadata): Promise<AppointmentRecord> {
    this.logger.log(
      `Scheduling appointment for patient ${appointmentDto.patientId} with doctor ${appointmentDto.doctorId}`,
    );

    const scheduledAt = await this.checkReferences(appointmentDto);
    const created = await this.appointmentModel.create({
      patientId: new Types.ObjectId(appointmentDto.patientId),
      doctorId: new Types.ObjectId(appointmentDto.doctorId),
      shiftId: new Types.ObjectId(appointmentDto.shiftId),
      status: 'scheduled',
      scheduledAt,
    });

    const appointment = toAppointmentRecord(created);
    await this.auditService.logDataAccess('appointments', 'create', appointment.id, null, appointment, metadata);
    this.logger.log(`Appointment scheduled with id ${appointment.id}`);
    return appointment;
  }

  async findOne(id: string): Promise<AppointmentRecord> {
    return toAppointmentRecord(await this.getDocument(id));
  }

  async findAll(filter: AppointmentFilter = {}): Promise<AppointmentRecord[]> {
    const query: FilterQuery<Appointment> = {};
    if (filter.patientId) {
      query.patientId = new Types.ObjectId(filter.patientId);
    }
    if (filter.doctorId) {
      query.doctorId = new Types.ObjectId(filter.doctorId);
    }
    if (filter.status) {
      query.status = filter.status;
    }

    const appointments = await this.appointmentModel.find(query).sort({ scheduledAt: 1 }).exec();
    return appointments.map(toAppointmentRecord);
  }

  async update(
    id: string,
    appointmentDto: AppointmentRequestDto,
    metadata?: AuditMetadata,
  ): Promise<AppointmentRecord> {
    const appointment = await this.getDocument(id);
    const previous = toAppointmentRecord(appointment);

    if (previous.status !== 'scheduled') {
      throw new ConflictException(`Cannot modify appointment with status: ${previous.status}`);
    }

    const scheduledAt = await this.checkReferences(appointmentDto);
    appointment.set({
      patientId: new Types.ObjectId(appointmentDto.patientId),
      doctorId: new Types.ObjectId(appointmentDto.doctorId),
      shiftId: new Types.ObjectId(appointmentDto.shiftId),
      scheduledAt,
    });

    const updated = toAppointmentRecord(await appointment.save());
    await this.auditService.logDataAccess('appointments', 'update', id, previous, updated, metadata);
    this.logger.log(`Appointment ${id} updated`);
    return updated;
  }

  async complete(id: string, metadata?: AuditMetadata): Promise<AppointmentRecord> {
    return this.close(id, 'completed', metadata);
  }

  async cancel(id: string, metadata?: AuditMetadata): Promise<AppointmentRecord> {
    return this.close(id, 'cancelled', metadata);
  }

  async remove(id: string, metadata?: AuditMetadata): Promise<void> {
    const appointment = await this.getDocument(id);
    await this.appointmentModel.findByIdAndDelete(appointment._id).exec();

    await this.auditService.logDataAccess(
      'appointments',
      'delete',
      id,
      toAppointmentRecord(appointment),
      null,
      metadata,
    );
    this.logger.log(`Appointment ${id} removed`);
  }

  private async close(id: string, status: ClosingStatus, metadata?: AuditMetadata): Promise<AppointmentRecord> {
    const appointment = await this.getDocument(id);
    const previous = toAppointmentRecord(appointment);

    if (previous.status !== 'scheduled') {
      throw new ConflictException(
        `Cannot ${CLOSING_VERB[status]} appointment with status: ${previous.status}`,
      );
    }

    const now = new Date();
    appointment.set(status === 'completed' ? { status, completedAt: now } : { status, cancelledAt: now });

    const updated = toAppointmentRecord(await appointment.save());
    await this.auditService.logDataAccess('appointments', 'update', id, previous, updated, metadata);
    this.logger.log(`Appointment ${id} moved from ${previous.status} to ${status}`);
    return updated;
  }

  /**
   * Patient, then doctor, then shift. The shift must belong to the doctor
   * and its daily window must contain the UTC time of `scheduledAt`.
   */
  private async checkReferences(appointmentDto: AppointmentRequestDto): Promise<Date> {
    const { patientId, doctorId, shiftId } = appointmentDto;

    if (!(await this.patientsService.exists(patientId))) {
      throw new NotFoundException(`Patient not found with id: ${patientId}`);
    }
    if (!(await this.doctorsService.exists(doctorId))) {
      throw new NotFoundException(`Doctor not found with id: ${doctorId}`);
    }

    const shift = await this.shiftLifecycleService.findOne(shiftId);
    if (!shift.success) {
      throw shiftErrorToHttpException(shift.error);
    }
    if (shift.data.doctorId !== doctorId) {
      throw new BadRequestException(`Shift ${shiftId} does not belong to doctor ${doctorId}`);
    }

    const scheduledAt = new Date(appointmentDto.scheduledAt);
    const at = utcTimeOfDay(scheduledAt);
    const start = parseTimeOfDay(shift.data.start);
    const end = parseTimeOfDay(shift.data.end);
    if (start === null || end === null || at < start || at >= end) {
      throw new BadRequestException(
        `Appointment time ${formatTimeOfDay(at)} UTC is outside shift ${shift.data.start} - ${shift.data.end}`,
      );
    }
    return scheduledAt;
  }

  private async getDocument(id: string): Promise<AppointmentDocument> {
    const appointment = Types.ObjectId.isValid(id) ? await this.appointmentModel.findById(id).exec() : null;
    if (!appointment) {
      throw new NotFoundException(`Appointment not found with id: ${id}`);
    }
    return appointment;
  }
}

export function toAppointmentRecord(appointment: AppointmentDocument): AppointmentRecord {
  return {
    id: appointment._id.toHexString(),
    patientId: appointment.patientId.toHexString(),
    doctorId: appointment.doctorId.toHexString(),
    shiftId: appointment.shiftId.toHexString(),
    status: appointment.status,
    scheduledAt: appointment.scheduledAt,
    completedAt: appointment.completedAt,
    cancelledAt: appointment.cancelledAt,
    createdAt: appointment.createdAt,
    updatedAt: appointment.updatedAt,
  };
}
