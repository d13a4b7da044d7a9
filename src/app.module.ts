import { Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { ThrottlerGuard, ThrottlerModule } from '@nestjs/throttler';
import { APP_GUARD } from '@nestjs/core';

import { AppController } from './app.controller';

// Core modules
import configuration from './core/config/configuration';
import { DatabaseModule } from './core/database/database.module';
import { RedisModule } from './core/redis/redis.module';

// Security modules
import { AuditModule } from './security/audit/audit.module';

// Feature modules
import { DoctorsModule } from './modules/doctors/doctors.module';
import { ShiftsModule } from './modules/shifts/shifts.module';
import { PatientsModule } from './modules/patients/patients.module';
import { AppointmentsModule } from './modules/appointments/appointments.module';
import { BillingModule } from './modules/billing/billing.module';

@Module({
  imports: [
    // Configuration
    ConfigModule.forRoot({
      isGlobal: true,
      load: [configuration],
      envFilePath: ['.env.local', '.env'],
    }),

    // Rate limiting
    ThrottlerModule.forRootAsync({
      inject: [ConfigService],
      useFactory: (configService: ConfigService) => [
        {
          ttl: configService.get<number>('security.rateLimit.ttl') ?? 60000,
          limit: configService.get<number>('security.rateLimit.limit') ?? 100,
        },
      ],
    }),

    // Core modules
    DatabaseModule,
    RedisModule,

    // Security modules
    AuditModule,

    // Feature modules
    DoctorsModule,
    ShiftsModule,
    PatientsModule,
    AppointmentsModule,
    BillingModule,
  ],
  controllers: [AppController],
  providers: [
    // Global guards
    {
      provide: APP_GUARD,
      useClass: ThrottlerGuard,
    },
  ],
})
export class AppModule {}
