import { Module } from '@nestjs/common';
import { MongooseModule } from '@nestjs/mongoose';
import { Patient, PatientSchema } from './schemas/patient.schema';
import { PatientsService } from './services/patients.service';
import { PatientController } from './controllers/patient.controller';
import { AuditModule } from '../../security/audit/audit.module';

@Module({
  imports: [
    MongooseModule.forFeature([{ name: Patient.name, schema: PatientSchema }]),
    AuditModule,
  ],
  controllers: [PatientController],
  providers: [PatientsService],
  exports: [PatientsService],
})
export class PatientsModule {}
