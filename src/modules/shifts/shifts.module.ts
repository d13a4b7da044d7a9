import { Module } from '@nestjs/common';
import { MongooseModule } from '@nestjs/mongoose';
import { Shift, ShiftSchema } from './schemas/shift.schema';
import { ShiftController } from './controllers/shift.controller';
import { ShiftLifecycleService } from './services/shift-lifecycle.service';
import { TimeSlotValidatorService } from './services/time-slot-validator.service';
import { ConflictDetectionService } from './services/conflict-detection.service';
import { ShiftWriteLockService } from './services/shift-write-lock.service';
import { MongooseShiftStore } from './repositories/mongoose-shift.store';
import { SHIFT_STORE } from './interfaces/shift-store.interface';
import { DOCTOR_DIRECTORY } from './interfaces/doctor-directory.interface';
import { DoctorsModule } from '../doctors/doctors.module';
import { DoctorsService } from '../doctors/services/doctors.service';
import { RedisModule } from '../../core/redis/redis.module';
import { AuditModule } from '../../security/audit/audit.module';

/**
 * Shift scheduling: per-doctor slot validation and overlap detection,
 * backed by MongoDB and the doctor registry.
 */
@Module({
  imports: [
    MongooseModule.forFeature([{ name: Shift.name, schema: ShiftSchema }]),
    DoctorsModule,
    RedisModule,
    AuditModule,
  ],
  controllers: [ShiftController],
  providers: [
    ShiftLifecycleService,
    TimeSlotValidatorService,
    ConflictDetectionService,
    ShiftWriteLockService,
    { provide: SHIFT_STORE, useClass: MongooseShiftStore },
    { provide: DOCTOR_DIRECTORY, useExisting: DoctorsService },
  ],
  exports: [ShiftLifecycleService],
})
export class ShiftsModule {}
