import {
  BadRequestException,
  ConflictException,
  HttpException,
  NotFoundException,
} from '@nestjs/common';
import { ShiftError } from '../interfaces/shift-result.interface';

export function describeShiftError(error: ShiftError): string {
  switch (error.kind) {
    case 'InvalidTimeSlot':
      return `End time (${error.end}) must be strictly after start time (${error.start})`;
    case 'DoctorNotFound':
      return `Doctor not found with id: ${error.doctorId}`;
    case 'ShiftNotFound':
      return `Shift not found with id: ${error.shiftId}`;
    case 'ShiftConflict':
      return `Shift conflict: Doctor ${error.doctorId} already has a shift from ${error.conflictStart} to ${error.conflictEnd}`;
  }
}

/**
 * Maps every lifecycle failure to its HTTP status. Adding a variant to
 * `ShiftError` without handling it here fails to compile.
 */
export function shiftErrorToHttpException(error: ShiftError): HttpException {
  const message = describeShiftError(error);

  switch (error.kind) {
    case 'InvalidTimeSlot':
      return new BadRequestException(message);
    case 'DoctorNotFound':
    case 'ShiftNotFound':
      return new NotFoundException(message);
    case 'ShiftConflict':
      return new ConflictException(message);
    default:
      return unreachable(error);
  }
}

function unreachable(error: never): never {
  throw new Error(`Unhandled shift error: ${JSON.stringify(error)}`);
}
