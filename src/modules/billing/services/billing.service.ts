import { ConflictException, Injectable, Logger, NotFoundException } from '@nestjs/common';
import { InjectModel } from '@nestjs/mongoose';
import { ConfigService } from '@nestjs/config';
import { FilterQuery, Model, Types } from 'mongoose';
import { AuditMetadata, AuditService } from '../../../security/audit/audit.service';
import { Invoice, InvoiceDocument } from '../schemas/invoice.schema';
import { InvoiceRecord, PaymentStatus } from '../interfaces/invoice.interface';
import { centsToAmount, priceConsultation } from '../utils/consultation-pricing';
import { AppointmentsService } from '../../appointments/services/appointments.service';
import { PatientsService } from '../../patients/services/patients.service';
import { DoctorsService } from '../../doctors/services/doctors.service';
import { isDuplicateKeyError } from '../../../shared/utils/mongo-errors';

const DEFAULT_BASE_AMOUNT_CENTS = 10000;

@Injectable()
export class BillingService {
  private readonly logger = new Logger(BillingService.name);

  constructor(
    @InjectModel(Invoice.name) private readonly invoiceModel: Model<Invoice>,
    private readonly appointmentsService: AppointmentsService,
    private readonly patientsService: PatientsService,
    private readonly doctorsService: DoctorsService,
    private readonly configService: ConfigService,
    private readonly auditService: AuditService,
  ) {}

  /**
   * Issues the invoice of a completed appointment, priced by the doctor's
   * specialization. Each appointment is invoiced at most once.
   */
  async generateInvoice(appointmentId: string, metadata?: AuditMetadata): Promise<InvoiceRecord> {
    this.logger.log(`Generating invoice for appointment ${appointmentId}`);

    const appointment = await this.appointmentsService.findOne(appointmentId);
    if (appointment.status !== 'completed') {
      throw new ConflictException(
        `Cannot generate invoice for appointment that is not completed. Current status: ${appointment.status}`,
      );
    }

    const invoiced = await this.invoiceModel.exists({ appointmentId: new Types.ObjectId(appointment.id) }).exec();
    if (invoiced !== null) {
      throw alreadyInvoiced(appointmentId);
    }

    const doctor = await this.doctorsService.findOne(appointment.doctorId);
    const patient = await this.patientsService.findOne(appointment.patientId);
    const price = priceConsultation(doctor.specialization, this.baseAmountCents());

    let created: InvoiceDocument;
    try {
      created = await this.invoiceModel.create({
        appointmentId: new Types.ObjectId(appointment.id),
        patientId: new Types.ObjectId(patient.id),
        doctorId: new Types.ObjectId(doctor.id),
        patientName: `${patient.firstName} ${patient.lastName}`,
        doctorName: doctor.fullName,
        specialization: doctor.specialization,
        ...price,
        paymentStatus: 'pending',
      });
    } catch (error) {
      if (isDuplicateKeyError(error)) {
        throw alreadyInvoiced(appointmentId);
      }
      throw error;
    }

    const invoice = toInvoiceRecord(created);
    await this.auditService.logDataAccess('invoices', 'create', invoice.id, null, invoice, metadata);
    this.logger.log(
      `Invoice ${invoice.id} issued for appointment ${appointmentId}: total ${invoice.totalAmount.toFixed(2)}`,
    );
    return invoice;
  }

  async findByAppointment(appointmentId: string): Promise<InvoiceRecord> {
    const invoice = Types.ObjectId.isValid(appointmentId)
      ? await this.invoiceModel.findOne({ appointmentId: new Types.ObjectId(appointmentId) }).exec()
      : null;
    if (!invoice) {
      throw new NotFoundException(`Invoice not found for appointment: ${appointmentId}`);
    }
    return toInvoiceRecord(invoice);
  }

  async findByPatient(patientId: string): Promise<InvoiceRecord[]> {
    if (!Types.ObjectId.isValid(patientId)) {
      return [];
    }

    const invoices = await this.invoiceModel
      .find({ patientId: new Types.ObjectId(patientId) })
      .sort({ createdAt: -1 })
      .exec();
    return invoices.map(toInvoiceRecord);
  }

  async findAll(paymentStatus?: PaymentStatus): Promise<InvoiceRecord[]> {
    const query: FilterQuery<Invoice> = {};
    if (paymentStatus) {
      query.paymentStatus = paymentStatus;
    }

    const invoices = await this.invoiceModel.find(query).sort({ createdAt: -1 }).exec();
    return invoices.map(toInvoiceRecord);
  }

  private baseAmountCents(): number {
    return this.configService.get<number>('billing.baseAmountCents') ?? DEFAULT_BASE_AMOUNT_CENTS;
  }
}

export function toInvoiceRecord(invoice: InvoiceDocument): InvoiceRecord {
  return {
    id: invoice._id.toHexString(),
    appointmentId: invoice.appointmentId.toHexString(),
    patientId: invoice.patientId.toHexString(),
    doctorId: invoice.doctorId.toHexString(),
    patientName: invoice.patientName,
    doctorName: invoice.doctorName,
    specialization: invoice.specialization,
    baseAmount: centsToAmount(invoice.baseAmountCents),
    specializationPremium: centsToAmount(invoice.premiumCents),
    totalAmount: centsToAmount(invoice.totalAmountCents),
    paymentStatus: invoice.paymentStatus,
    createdAt: invoice.createdAt,
    updatedAt: invoice.updatedAt,
  };
}

function alreadyInvoiced(appointmentId: string): ConflictException {
  return new ConflictException(`Invoice already exists for appointment: ${appointmentId}`);
}
