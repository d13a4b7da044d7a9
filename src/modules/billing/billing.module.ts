import { Module } from '@nestjs/common';
import { MongooseModule } from '@nestjs/mongoose';
import { Invoice, InvoiceSchema } from './schemas/invoice.schema';
import { BillingService } from './services/billing.service';
import { BillingController } from './controllers/billing.controller';
import { AppointmentsModule } from '../appointments/appointments.module';
import { PatientsModule } from '../patients/patients.module';
import { DoctorsModule } from '../doctors/doctors.module';
import { AuditModule } from '../../security/audit/audit.module';

@Module({
  imports: [
    MongooseModule.forFeature([{ name: Invoice.name, schema: InvoiceSchema }]),
    AppointmentsModule,
    PatientsModule,
    DoctorsModule,
    AuditModule,
  ],
  controllers: [BillingController],
  providers: [BillingService],
})
export class BillingModule {}
