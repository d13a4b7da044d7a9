import { Prop, Schema, SchemaFactory } from '@nestjs/mongoose';
import { HydratedDocument, Types } from 'mongoose';
import { TIME_OF_DAY_PATTERN, parseTimeOfDay } from '../../../shared/utils/time-of-day';

export type ShiftDocument = HydratedDocument<Shift>;

@Schema({ collection: 'shifts' })
export class Shift {
  @Prop({
    required: true,
    type: Types.ObjectId,
    ref: 'Doctor',
  })
  doctorId!: Types.ObjectId;

  @Prop({ required: true, match: TIME_OF_DAY_PATTERN })
  start!: string;

  @Prop({ required: true, match: TIME_OF_DAY_PATTERN })
  end!: string;

  @Prop({ required: true, trim: true, minlength: 1, maxlength: 50 })
  room!: string;

  // Audit timestamps are owned by the shift lifecycle, not by mongoose
  @Prop({ type: Date, required: true })
  createdAt!: Date;

  @Prop({ type: Date, required: true })
  updatedAt!: Date;
}

export const ShiftSchema = SchemaFactory.createForClass(Shift);

// Conflict checks always read one doctor's shifts
ShiftSchema.index({ doctorId: 1, start: 1 });

// Last line of defence for the slot invariant
ShiftSchema.pre('save', function (next) {
  const start = parseTimeOfDay(this.start);
  const end = parseTimeOfDay(this.end);

  if (start === null || end === null || start >= end) {
    next(new Error('Shift end time must be strictly after start time'));
    return;
  }
  next();
});
