import { Prop, Schema, SchemaFactory } from '@nestjs/mongoose';
import { HydratedDocument } from 'mongoose';

export type DoctorDocument = HydratedDocument<Doctor>;

@Schema({ collection: 'doctors', timestamps: true })
export class Doctor {
  @Prop({ required: true, trim: true, minlength: 2, maxlength: 100 })
  fullName!: string;

  @Prop({ required: true, unique: true, trim: true, minlength: 5, maxlength: 50 })
  licenseNumber!: string;

  @Prop({ required: true, trim: true, minlength: 2, maxlength: 100 })
  specialization!: string;

  @Prop({ type: Number, min: 1 })
  deptId?: number;

  // Managed by mongoose timestamps
  createdAt!: Date;
  updatedAt!: Date;
}

export const DoctorSchema = SchemaFactory.createForClass(Doctor);
