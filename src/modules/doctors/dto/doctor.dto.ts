import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { Transform } from 'class-transformer';
import { IsInt, IsNotEmpty, IsOptional, IsString, Length, Min } from 'class-validator';

const trim = ({ value }: { value: unknown }) => (typeof value === 'string' ? value.trim() : value);

export class DoctorRequestDto {
  @ApiProperty({ example: 'Dr. Amira Haddad', minLength: 2, maxLength: 100 })
  @Transform(trim)
  @IsString()
  @IsNotEmpty({ message: 'Full name is required' })
  @Length(2, 100, { message: 'Full name must be between 2 and 100 characters' })
  readonly fullName!: string;

  @ApiProperty({ example: 'MED-123456', minLength: 5, maxLength: 50 })
  @Transform(trim)
  @IsString()
  @IsNotEmpty({ message: 'License number is required' })
  @Length(5, 50, { message: 'License number must be between 5 and 50 characters' })
  readonly licenseNumber!: string;

  @ApiProperty({ example: 'Cardiology', minLength: 2, maxLength: 100 })
  @Transform(trim)
  @IsString()
  @IsNotEmpty({ message: 'Specialization is required' })
  @Length(2, 100, { message: 'Specialization must be between 2 and 100 characters' })
  readonly specialization!: string;

  @ApiPropertyOptional({ example: 3, description: 'Department the doctor belongs to' })
  @IsOptional()
  @IsInt()
  @Min(1)
  readonly deptId?: number;
}

export class DoctorResponseDto {
  @ApiProperty()
  id!: string;

  @ApiProperty()
  fullName!: string;

  @ApiProperty()
  licenseNumber!: string;

  @ApiProperty()
  specialization!: string;

  @ApiPropertyOptional()
  deptId?: number;

  @ApiProperty()
  createdAt!: Date;

  @ApiProperty()
  updatedAt!: Date;
}
