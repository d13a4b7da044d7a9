import { Prop, Schema, SchemaFactory } from '@nestjs/mongoose';
import { HydratedDocument } from 'mongoose';

export type PatientDocument = HydratedDocument<Patient>;

@Schema({ collection: 'patients', timestamps: true })
export class Patient {
  @Prop({ required: true, trim: true, minlength: 2, maxlength: 100 })
  firstName!: string;

  @Prop({ required: true, trim: true, minlength: 2, maxlength: 100 })
  lastName!: string;

  // Midnight UTC of the date of birth
  @Prop({ type: Date, required: true })
  dob!: Date;

  @Prop({ required: true, unique: true, trim: true, lowercase: true })
  email!: string;

  @Prop({ required: true, trim: true })
  phone!: string;

  // Managed by mongoose timestamps
  createdAt!: Date;
  updatedAt!: Date;
}

export const PatientSchema = SchemaFactory.createForClass(Patient);

PatientSchema.index({ lastName: 1, firstName: 1 });
PatientSchema.index({ phone: 1 });
