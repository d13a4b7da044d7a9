import { Inject, Injectable, Logger } from '@nestjs/common';
import { parseTimeOfDay } from '../../../shared/utils/time-of-day';
import { ShiftRecord } from '../interfaces/shift.interface';
import { IShiftStore, SHIFT_STORE } from '../interfaces/shift-store.interface';

export interface TimeInterval {
  start: number;                    // Seconds since midnight, inclusive
  end: number;                      // Seconds since midnight, exclusive
}

/**
 * Half-open overlap: `[a.start, a.end)` and `[b.start, b.end)` share time.
 * Back-to-back intervals (`a.end === b.start`) do not overlap.
 */
export function overlaps(a: TimeInterval, b: TimeInterval): boolean {
  return Math.max(a.start, b.start) < Math.min(a.end, b.end);
}

@Injectable()
export class ConflictDetectionService {
  private readonly logger = new Logger(ConflictDetectionService.name);

  constructor(@Inject(SHIFT_STORE) private readonly shiftStore: IShiftStore) {}

  /**
   * Returns every stored shift of `doctorId` that overlaps the candidate slot,
   * in store order. `excludeId` keeps a shift from conflicting with its own
   * previous version during an update.
   */
  async findConflicts(
    doctorId: string,
    candidateStart: string,
    candidateEnd: string,
    excludeId?: string,
  ): Promise<ShiftRecord[]> {
    const candidate = toInterval(candidateStart, candidateEnd);
    if (!candidate) {
      throw new Error(`Cannot check conflicts for malformed slot ${candidateStart}-${candidateEnd}`);
    }

    this.logger.debug(
      `Checking for conflicting shifts for doctor ${doctorId} between ${candidateStart} and ${candidateEnd}`,
    );

    const existing = await this.shiftStore.findOverlapCandidates(doctorId, excludeId);
    const conflicts = existing.filter((shift) => {
      const interval = toInterval(shift.start, shift.end);
      return interval !== null && overlaps(interval, candidate);
    });

    this.logger.debug(
      `Found ${conflicts.length} conflicting shift(s) among ${existing.length} for doctor ${doctorId}`,
    );
    return conflicts;
  }
}

function toInterval(start: string, end: string): TimeInterval | null {
  const startSeconds = parseTimeOfDay(start);
  const endSeconds = parseTimeOfDay(end);
  return startSeconds === null || endSeconds === null
    ? null
    : { start: startSeconds, end: endSeconds };
}
