import { Injectable } from '@nestjs/common';
import { parseTimeOfDay, formatTimeOfDay } from '../../../shared/utils/time-of-day';
import { TimeSlot } from '../interfaces/shift.interface';
import { ShiftResult, fail, succeed } from '../interfaces/shift-result.interface';

@Injectable()
export class TimeSlotValidatorService {
  /**
   * A slot is valid only when both bounds parse and start is strictly before end.
   * Equal, inverted and overnight bounds are all rejected.
   */
  validate(start: string, end: string): ShiftResult<TimeSlot> {
    const startSeconds = parseTimeOfDay(start);
    const endSeconds = parseTimeOfDay(end);

    if (startSeconds === null || endSeconds === null || startSeconds >= endSeconds) {
      return fail({ kind: 'InvalidTimeSlot', start, end });
    }

    return succeed({
      start: formatTimeOfDay(startSeconds),
      end: formatTimeOfDay(endSeconds),
      startSeconds,
      endSeconds,
    });
  }
}
