import { ApiProperty } from '@nestjs/swagger';
import { Transform } from 'class-transformer';
import { IsEmail, IsNotEmpty, IsString, Length, Matches } from 'class-validator';
import { CALENDAR_DATE_PATTERN } from '../../../shared/utils/calendar-date';

export const PHONE_PATTERN = /^\+?[1-9]\d{1,14}$/;

const trim = ({ value }: { value: unknown }) => (typeof value === 'string' ? value.trim() : value);
const normalizeEmail = ({ value }: { value: unknown }) =>
  typeof value === 'string' ? value.trim().toLowerCase() : value;

export class PatientRequestDto {
  @ApiProperty({ example: 'Lina', minLength: 2, maxLength: 100 })
  @Transform(trim)
  @IsString()
  @IsNotEmpty({ message: 'First name is required' })
  @Length(2, 100, { message: 'First name must be between 2 and 100 characters' })
  readonly firstName!: string;

  @ApiProperty({ example: 'Moreau', minLength: 2, maxLength: 100 })
  @Transform(trim)
  @IsString()
  @IsNotEmpty({ message: 'Last name is required' })
  @Length(2, 100, { message: 'Last name must be between 2 and 100 characters' })
  readonly lastName!: string;

  @ApiProperty({ example: '1990-04-12', description: 'Date of birth, in the past' })
  @IsString()
  @Matches(CALENDAR_DATE_PATTERN, { message: 'Date of birth must be in YYYY-MM-DD format' })
  readonly dob!: string;

  @ApiProperty({ example: 'lina.moreau@example.com' })
  @Transform(normalizeEmail)
  @IsEmail({}, { message: 'Email must be valid' })
  readonly email!: string;

  @ApiProperty({ example: '+15550100200', description: 'Digits with an optional leading +' })
  @Transform(trim)
  @IsString()
  @Matches(PHONE_PATTERN, { message: 'Phone number must be valid' })
  readonly phone!: string;
}

export class PatientPhoneQueryDto {
  @ApiProperty({ example: '+15550100200' })
  @Transform(trim)
  @IsString()
  @IsNotEmpty({ message: 'phone is required' })
  readonly phone!: string;
}

export class PatientLastNameQueryDto {
  @ApiProperty({ example: 'Moreau' })
  @Transform(trim)
  @IsString()
  @IsNotEmpty({ message: 'lastName is required' })
  readonly lastName!: string;
}

export class PatientResponseDto {
  @ApiProperty()
  id!: string;

  @ApiProperty()
  firstName!: string;

  @ApiProperty()
  lastName!: string;

  @ApiProperty({ example: '1990-04-12' })
  dob!: string;

  @ApiProperty()
  email!: string;

  @ApiProperty()
  phone!: string;

  @ApiProperty()
  createdAt!: Date;

  @ApiProperty()
  updatedAt!: Date;
}
