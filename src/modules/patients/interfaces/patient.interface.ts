export interface PatientRecord {
  id: string;
  firstName: string;
  lastName: string;
  dob: string;                      // YYYY-MM-DD
  email: string;
  phone: string;
  createdAt: Date;
  updatedAt: Date;
}
