import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { IsIn, IsISO8601, IsMongoId, IsOptional } from 'class-validator';
import { APPOINTMENT_STATUSES, AppointmentStatus } from '../interfaces/appointment.interface';

export class AppointmentRequestDto {
  @ApiProperty({ example: '665f1c2e8b3e4a1d2c3b4a60' })
  @IsMongoId()
  readonly patientId!: string;

  @ApiProperty({ example: '665f1c2e8b3e4a1d2c3b4a59' })
  @IsMongoId()
  readonly doctorId!: string;

  @ApiProperty({ description: 'Shift of the doctor the appointment falls in', example: '665f1c2e8b3e4a1d2c3b4a61' })
  @IsMongoId()
  readonly shiftId!: string;

  @ApiProperty({
    description: 'Appointment start; its UTC time of day must fall within the shift',
    example: '2026-06-01T09:30:00.000Z',
  })
  @IsISO8601({ strict: true }, { message: 'scheduledAt must be an ISO 8601 date-time' })
  readonly scheduledAt!: string;
}

export class AppointmentQueryDto {
  @ApiPropertyOptional()
  @IsOptional()
  @IsMongoId()
  readonly patientId?: string;

  @ApiPropertyOptional()
  @IsOptional()
  @IsMongoId()
  readonly doctorId?: string;

  @ApiPropertyOptional({ enum: [...APPOINTMENT_STATUSES] })
  @IsOptional()
  @IsIn([...APPOINTMENT_STATUSES])
  readonly status?: AppointmentStatus;
}

export class AppointmentResponseDto {
  @ApiProperty()
  id!: string;

  @ApiProperty()
  patientId!: string;

  @ApiProperty()
  doctorId!: string;

  @ApiProperty()
  shiftId!: string;

  @ApiProperty({ enum: [...APPOINTMENT_STATUSES] })
  status!: AppointmentStatus;

  @ApiProperty()
  scheduledAt!: Date;

  @ApiPropertyOptional()
  completedAt?: Date;

  @ApiPropertyOptional()
  cancelledAt?: Date;

  @ApiProperty()
  createdAt!: Date;

  @ApiProperty()
  updatedAt!: Date;
}
