/**
 * Expected, caller-recoverable failures of the shift lifecycle.
 * Anything else (store outages, lock timeouts) is thrown instead.
 */
export type ShiftError =
  | { kind: 'InvalidTimeSlot'; start: string; end: string }
  | { kind: 'DoctorNotFound'; doctorId: string }
  | { kind: 'ShiftNotFound'; shiftId: string }
  | { kind: 'ShiftConflict'; doctorId: string; conflictStart: string; conflictEnd: string };

export type ShiftErrorKind = ShiftError['kind'];

export type ShiftResult<T> =
  | { success: true; data: T }
  | { success: false; error: ShiftError };

export function succeed<T>(data: T): ShiftResult<T> {
  return { success: true, data };
}

export function fail<T = never>(error: ShiftError): ShiftResult<T> {
  return { success: false, error };
}
