import { NewShift, ShiftRecord } from './shift.interface';

export const SHIFT_STORE = Symbol('SHIFT_STORE');

/**
 * Durable shift storage. The store owns identity: `save` inserts when the
 * draft has no id and returns the record with its assigned id. Saving a record
 * whose id the store no longer holds resolves to null.
 */
export interface IShiftStore {
  save(shift: NewShift): Promise<ShiftRecord>;
  save(shift: ShiftRecord): Promise<ShiftRecord | null>;
  findById(id: string): Promise<ShiftRecord | null>;
  findAll(): Promise<ShiftRecord[]>;
  findByDoctor(doctorId: string): Promise<ShiftRecord[]>;
  /** Every shift of the doctor, minus `excludeId` when given */
  findOverlapCandidates(doctorId: string, excludeId?: string): Promise<ShiftRecord[]>;
  deleteById(id: string): Promise<void>;
  existsById(id: string): Promise<boolean>;
}
