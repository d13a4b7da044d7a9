import { Prop, Schema, SchemaFactory } from '@nestjs/mongoose';
import { HydratedDocument, Types } from 'mongoose';
import { APPOINTMENT_STATUSES, AppointmentStatus } from '../interfaces/appointment.interface';

export type AppointmentDocument = HydratedDocument<Appointment>;

@Schema({ collection: 'appointments', timestamps: true })
export class Appointment {
  @Prop({ required: true, type: Types.ObjectId, ref: 'Patient' })
  patientId!: Types.ObjectId;

  @Prop({ required: true, type: Types.ObjectId, ref: 'Doctor' })
  doctorId!: Types.ObjectId;

  @Prop({ required: true, type: Types.ObjectId, ref: 'Shift' })
  shiftId!: Types.ObjectId;

  @Prop({ type: String, required: true, enum: [...APPOINTMENT_STATUSES], default: 'scheduled' })
  status!: AppointmentStatus;

  @Prop({ type: Date, required: true })
  scheduledAt!: Date;

  @Prop({ type: Date })
  completedAt?: Date;

  @Prop({ type: Date })
  cancelledAt?: Date;

  // Managed by mongoose timestamps
  createdAt!: Date;
  updatedAt!: Date;
}

export const AppointmentSchema = SchemaFactory.createForClass(Appointment);

AppointmentSchema.index({ patientId: 1, scheduledAt: 1 });
AppointmentSchema.index({ doctorId: 1, scheduledAt: 1 });
AppointmentSchema.index({ status: 1 });
