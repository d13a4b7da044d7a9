import { Injectable } from '@nestjs/common';
import { InjectModel } from '@nestjs/mongoose';
import { Model, Types } from 'mongoose';
import { Shift, ShiftDocument } from '../schemas/shift.schema';
import { NewShift, ShiftDraft, ShiftRecord } from '../interfaces/shift.interface';
import { IShiftStore } from '../interfaces/shift-store.interface';

/**
 * MongoDB-backed shift store. Ids that are not valid ObjectIds can never
 * match a document, so lookups on them report "not found".
 */
@Injectable()
export class MongooseShiftStore implements IShiftStore {
  constructor(
    @InjectModel(Shift.name) private readonly shiftModel: Model<Shift>,
  ) {}

  save(shift: NewShift): Promise<ShiftRecord>;
  save(shift: ShiftRecord): Promise<ShiftRecord | null>;
  async save(shift: ShiftDraft): Promise<ShiftRecord | null> {
    const fields = {
      doctorId: new Types.ObjectId(shift.doctorId),
      start: shift.start,
      end: shift.end,
      room: shift.room,
      createdAt: shift.createdAt,
      updatedAt: shift.updatedAt,
    };

    if (!shift.id) {
      const created = await this.shiftModel.create(fields);
      return toShiftRecord(created);
    }

    const existing = await this.shiftModel.findById(shift.id).exec();
    if (!existing) {
      return null;
    }

    existing.set(fields);
    return toShiftRecord(await existing.save());
  }

  async findById(id: string): Promise<ShiftRecord | null> {
    if (!Types.ObjectId.isValid(id)) {
      return null;
    }

    const shift = await this.shiftModel.findById(id).exec();
    return shift ? toShiftRecord(shift) : null;
  }

  async findAll(): Promise<ShiftRecord[]> {
    const shifts = await this.shiftModel.find().sort({ doctorId: 1, start: 1 }).exec();
    return shifts.map(toShiftRecord);
  }

  async findByDoctor(doctorId: string): Promise<ShiftRecord[]> {
    if (!Types.ObjectId.isValid(doctorId)) {
      return [];
    }

    const shifts = await this.shiftModel
      .find({ doctorId: new Types.ObjectId(doctorId) })
      .sort({ start: 1 })
      .exec();
    return shifts.map(toShiftRecord);
  }

  async findOverlapCandidates(doctorId: string, excludeId?: string): Promise<ShiftRecord[]> {
    const shifts = await this.findByDoctor(doctorId);
    return excludeId ? shifts.filter((shift) => shift.id !== excludeId) : shifts;
  }

  async deleteById(id: string): Promise<void> {
    if (Types.ObjectId.isValid(id)) {
      await this.shiftModel.findByIdAndDelete(id).exec();
    }
  }

  async existsById(id: string): Promise<boolean> {
    if (!Types.ObjectId.isValid(id)) {
      return false;
    }

    const found = await this.shiftModel.findById(id, { _id: 1 }).lean().exec();
    return found !== null;
  }
}

export function toShiftRecord(shift: ShiftDocument): ShiftRecord {
  return {
    id: shift._id.toString(),
    doctorId: shift.doctorId.toString(),
    start: shift.start,
    end: shift.end,
    room: shift.room,
    createdAt: shift.createdAt,
    updatedAt: shift.updatedAt,
  };
}
