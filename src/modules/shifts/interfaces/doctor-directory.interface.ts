export const DOCTOR_DIRECTORY = Symbol('DOCTOR_DIRECTORY');

export interface IDoctorDirectory {
  exists(doctorId: string): Promise<boolean>;
}
