import { Module } from '@nestjs/common';
import { MongooseModule } from '@nestjs/mongoose';
import { Doctor, DoctorSchema } from './schemas/doctor.schema';
import { DoctorsService } from './services/doctors.service';
import { DoctorController } from './controllers/doctor.controller';
import { AuditModule } from '../../security/audit/audit.module';

@Module({
  imports: [
    MongooseModule.forFeature([{ name: Doctor.name, schema: DoctorSchema }]),
    AuditModule,
  ],
  controllers: [DoctorController],
  providers: [DoctorsService],
  exports: [DoctorsService],
})
export class DoctorsModule {}
