import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { IsIn, IsOptional } from 'class-validator';
import { PAYMENT_STATUSES, PaymentStatus } from '../interfaces/invoice.interface';

export class InvoiceQueryDto {
  @ApiPropertyOptional({ enum: [...PAYMENT_STATUSES] })
  @IsOptional()
  @IsIn([...PAYMENT_STATUSES])
  readonly paymentStatus?: PaymentStatus;
}

export class InvoiceResponseDto {
  @ApiProperty()
  id!: string;

  @ApiProperty()
  appointmentId!: string;

  @ApiProperty()
  patientId!: string;

  @ApiProperty()
  doctorId!: string;

  @ApiProperty({ example: 'Lina Moreau' })
  patientName!: string;

  @ApiProperty({ example: 'Dr. Amira Haddad' })
  doctorName!: string;

  @ApiProperty({ example: 'Cardiology' })
  specialization!: string;

  @ApiProperty({ example: 100 })
  baseAmount!: number;

  @ApiProperty({ example: 50 })
  specializationPremium!: number;

  @ApiProperty({ example: 150 })
  totalAmount!: number;

  @ApiProperty({ enum: [...PAYMENT_STATUSES] })
  paymentStatus!: PaymentStatus;

  @ApiProperty()
  createdAt!: Date;

  @ApiProperty()
  updatedAt!: Date;
}
