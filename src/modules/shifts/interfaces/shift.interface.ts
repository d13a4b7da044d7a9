export interface ShiftRecord {
  id: string;                       // Store-assigned, immutable
  doctorId: string;                 // Doctor reference, not owned by the shift
  start: string;                    // Normalized time of day (HH:mm or HH:mm:ss)
  end: string;                      // Normalized time of day, strictly after start
  room: string;                     // Display label, not unique
  createdAt: Date;
  updatedAt: Date;
}

/** A shift about to be inserted; the store assigns the id */
export type NewShift = Omit<ShiftRecord, 'id'> & { id?: undefined };

/** A shift about to be written; inserts have no id yet */
export type ShiftDraft = NewShift | ShiftRecord;

export interface ShiftInput {
  doctorId: string;
  start: string;
  end: string;
  room: string;
}

export interface TimeSlot {
  start: string;                    // Normalized
  end: string;                      // Normalized
  startSeconds: number;             // Seconds since midnight
  endSeconds: number;
}
