import { Prop, Schema, SchemaFactory } from '@nestjs/mongoose';
import { HydratedDocument, Types } from 'mongoose';
import { PAYMENT_STATUSES, PaymentStatus } from '../interfaces/invoice.interface';

export type InvoiceDocument = HydratedDocument<Invoice>;

/**
 * One invoice per completed appointment. Names and specialization are copied
 * at generation time so later registry edits do not rewrite issued invoices.
 */
@Schema({ collection: 'invoices', timestamps: true })
export class Invoice {
  @Prop({ required: true, unique: true, type: Types.ObjectId, ref: 'Appointment' })
  appointmentId!: Types.ObjectId;

  @Prop({ required: true, type: Types.ObjectId, ref: 'Patient' })
  patientId!: Types.ObjectId;

  @Prop({ required: true, type: Types.ObjectId, ref: 'Doctor' })
  doctorId!: Types.ObjectId;

  @Prop({ required: true })
  patientName!: string;

  @Prop({ required: true })
  doctorName!: string;

  @Prop({ required: true })
  specialization!: string;

  // Money is stored in integer cents
  @Prop({ required: true, min: 0 })
  baseAmountCents!: number;

  @Prop({ required: true, min: 0 })
  premiumCents!: number;

  @Prop({ required: true, min: 0 })
  totalAmountCents!: number;

  @Prop({ type: String, required: true, enum: [...PAYMENT_STATUSES], default: 'pending' })
  paymentStatus!: PaymentStatus;

  // Managed by mongoose timestamps
  createdAt!: Date;
  updatedAt!: Date;
}

export const InvoiceSchema = SchemaFactory.createForClass(Invoice);

InvoiceSchema.index({ patientId: 1, createdAt: -1 });
InvoiceSchema.index({ paymentStatus: 1 });
