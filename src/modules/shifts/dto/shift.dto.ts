import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { IsMongoId, IsNotEmpty, IsOptional, IsString, Matches, MaxLength } from 'class-validator';
import { TIME_OF_DAY_PATTERN } from '../../../shared/utils/time-of-day';

const TIME_FORMAT_MESSAGE = 'must be a time of day in HH:mm or HH:mm:ss format';

export class ShiftRequestDto {
  @ApiProperty({ description: 'Doctor ID to assign to this shift', example: '665f1c2e8b3e4a1d2c3b4a59' })
  @IsMongoId()
  readonly doctorId!: string;

  @ApiProperty({ description: 'Shift start time (24-hour clock)', example: '09:00' })
  @IsString()
  @Matches(TIME_OF_DAY_PATTERN, { message: `start ${TIME_FORMAT_MESSAGE}` })
  readonly start!: string;

  @ApiProperty({ description: 'Shift end time, strictly after start', example: '17:00' })
  @IsString()
  @Matches(TIME_OF_DAY_PATTERN, { message: `end ${TIME_FORMAT_MESSAGE}` })
  readonly end!: string;

  @ApiProperty({ description: 'Room assigned for the shift', example: 'Room-101', maxLength: 50 })
  @IsString()
  @IsNotEmpty()
  @MaxLength(50)
  readonly room!: string;
}

export class ShiftQueryDto {
  @ApiPropertyOptional({ description: 'Only return shifts of this doctor' })
  @IsOptional()
  @IsMongoId()
  readonly doctorId?: string;
}

export class ShiftResponseDto {
  @ApiProperty()
  id!: string;

  @ApiProperty()
  doctorId!: string;

  @ApiProperty({ example: '09:00' })
  start!: string;

  @ApiProperty({ example: '17:00' })
  end!: string;

  @ApiProperty()
  room!: string;

  @ApiProperty()
  createdAt!: Date;

  @ApiProperty()
  updatedAt!: Date;
}
