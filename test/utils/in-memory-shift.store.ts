import { Types } from 'mongoose';
import { parseTimeOfDay } from '../../src/shared/utils/time-of-day';
import { NewShift, ShiftDraft, ShiftRecord } from '../../src/modules/shifts/interfaces/shift.interface';
import { IShiftStore } from '../../src/modules/shifts/interfaces/shift-store.interface';

/**
 * Process-local stand-in for the MongoDB shift store. Records are copied on
 * the way in and out so callers cannot mutate stored state.
 */
export class InMemoryShiftStore implements IShiftStore {
  private readonly shifts = new Map<string, ShiftRecord>();

  save(shift: NewShift): Promise<ShiftRecord>;
  save(shift: ShiftRecord): Promise<ShiftRecord | null>;
  async save(shift: ShiftDraft): Promise<ShiftRecord | null> {
    if (shift.id && !this.shifts.has(shift.id)) {
      return null;
    }

    const record: ShiftRecord = { ...shift, id: shift.id ?? new Types.ObjectId().toHexString() };
    this.shifts.set(record.id, record);
    return { ...record };
  }

  async findById(id: string): Promise<ShiftRecord | null> {
    const shift = this.shifts.get(id);
    return shift ? { ...shift } : null;
  }

  async findAll(): Promise<ShiftRecord[]> {
    return [...this.shifts.values()].map((shift) => ({ ...shift }));
  }

  async findByDoctor(doctorId: string): Promise<ShiftRecord[]> {
    return [...this.shifts.values()]
      .filter((shift) => shift.doctorId === doctorId)
      .sort((a, b) => (parseTimeOfDay(a.start) ?? 0) - (parseTimeOfDay(b.start) ?? 0))
      .map((shift) => ({ ...shift }));
  }

  async findOverlapCandidates(doctorId: string, excludeId?: string): Promise<ShiftRecord[]> {
    const shifts = await this.findByDoctor(doctorId);
    return shifts.filter((shift) => shift.id !== excludeId);
  }

  async deleteById(id: string): Promise<void> {
    this.shifts.delete(id);
  }

  async existsById(id: string): Promise<boolean> {
    return this.shifts.has(id);
  }

  get size(): number {
    return this.shifts.size;
  }
}
