export interface DoctorRecord {
  id: string;
  fullName: string;
  licenseNumber: string;
  specialization: string;
  deptId?: number;
  createdAt: Date;
  updatedAt: Date;
}
