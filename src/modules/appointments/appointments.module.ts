import { Module } from '@nestjs/common';
import { MongooseModule } from '@nestjs/mongoose';
import { Appointment, AppointmentSchema } from './schemas/appointment.schema';
import { AppointmentsService } from './services/appointments.service';
import { AppointmentController } from './controllers/appointment.controller';
import { PatientsModule } from '../patients/patients.module';
import { DoctorsModule } from '../doctors/doctors.module';
import { ShiftsModule } from '../shifts/shifts.module';
import { AuditModule } from '../../security/audit/audit.module';

@Module({
  imports: [
    MongooseModule.forFeature([{ name: Appointment.name, schema: AppointmentSchema }]),
    PatientsModule,
    DoctorsModule,
    ShiftsModule,
    AuditModule,
  ],
  controllers: [AppointmentController],
  providers: [AppointmentsService],
  exports: [AppointmentsService],
})
export class AppointmentsModule {}
