import { Inject, Injectable, Logger } from '@nestjs/common';
import { AuditService } from '../../../security/audit/audit.service';
import { ConflictDetectionService } from './conflict-detection.service';
import { ShiftWriteLockService } from './shift-write-lock.service';
import { TimeSlotValidatorService } from './time-slot-validator.service';
import { ShiftInput, ShiftRecord } from '../interfaces/shift.interface';
import { RequestMetadata } from '../../../shared/utils/request-metadata';
import { ShiftResult, fail, succeed } from '../interfaces/shift-result.interface';
import { IShiftStore, SHIFT_STORE } from '../interfaces/shift-store.interface';
import { DOCTOR_DIRECTORY, IDoctorDirectory } from '../interfaces/doctor-directory.interface';

interface ShiftUpdate {
  previous: ShiftRecord;
  saved: ShiftRecord;
}

/**
 * Create/read/update/delete for shifts.
 *
 * Checks always run in the same order so a malformed request gets a
 * deterministic answer: existence (shift, then doctor), then slot shape, then
 * conflicts. Writes run inside the per-doctor write lock; nothing is cached
 * between calls.
 */
@Injectable()
export class ShiftLifecycleService {
  private readonly logger = new Logger(ShiftLifecycleService.name);

  constructor(
    @Inject(SHIFT_STORE) private readonly shiftStore: IShiftStore,
    @Inject(DOCTOR_DIRECTORY) private readonly doctorDirectory: IDoctorDirectory,
    private readonly timeSlotValidator: TimeSlotValidatorService,
    private readonly conflictDetection: ConflictDetectionService,
    private readonly writeLock: ShiftWriteLockService,
    private readonly auditService: AuditService,
  ) {}

  async create(input: ShiftInput, requestMetadata?: RequestMetadata): Promise<ShiftResult<ShiftRecord>> {
    this.logger.log(`Creating new shift for doctor ${input.doctorId} in room ${input.room}`);

    const result = await this.writeLock.runExclusive(input.doctorId, async () => {
      if (!(await this.doctorDirectory.exists(input.doctorId))) {
        return fail<ShiftRecord>({ kind: 'DoctorNotFound', doctorId: input.doctorId });
      }

      const slot = this.timeSlotValidator.validate(input.start, input.end);
      if (!slot.success) {
        return slot;
      }

      const conflicts = await this.conflictDetection.findConflicts(
        input.doctorId,
        slot.data.start,
        slot.data.end,
      );
      if (conflicts.length > 0) {
        return this.conflict<ShiftRecord>(input.doctorId, conflicts[0]);
      }

      const now = new Date();
      const saved = await this.shiftStore.save({
        doctorId: input.doctorId,
        start: slot.data.start,
        end: slot.data.end,
        room: input.room,
        createdAt: now,
        updatedAt: now,
      });
      return succeed(saved);
    });

    if (!result.success) {
      this.logger.warn(`Shift creation rejected for doctor ${input.doctorId}: ${result.error.kind}`);
      return result;
    }

    await this.auditService.logDataAccess('shifts', 'create', result.data.id, null, result.data, requestMetadata);
    this.logger.log(`Shift created successfully with id ${result.data.id}`);
    return result;
  }

  async findOne(id: string): Promise<ShiftResult<ShiftRecord>> {
    this.logger.log(`Fetching shift ${id}`);

    const shift = await this.shiftStore.findById(id);
    return shift ? succeed(shift) : fail({ kind: 'ShiftNotFound', shiftId: id });
  }

  async findAll(doctorId?: string): Promise<ShiftRecord[]> {
    if (doctorId) {
      this.logger.log(`Fetching shifts for doctor ${doctorId}`);
      return this.shiftStore.findByDoctor(doctorId);
    }

    this.logger.log('Fetching all shifts');
    return this.shiftStore.findAll();
  }

  /**
   * Replaces every field of shift `id`. The shift's previous version never
   * counts as a conflict, so re-saving unchanged bounds always succeeds.
   */
  async update(
    id: string,
    input: ShiftInput,
    requestMetadata?: RequestMetadata,
  ): Promise<ShiftResult<ShiftRecord>> {
    this.logger.log(`Updating shift ${id}`);

    const result = await this.writeLock.runExclusive(input.doctorId, async () => {
      const previous = await this.shiftStore.findById(id);
      if (!previous) {
        return fail<ShiftUpdate>({ kind: 'ShiftNotFound', shiftId: id });
      }

      if (!(await this.doctorDirectory.exists(input.doctorId))) {
        return fail<ShiftUpdate>({ kind: 'DoctorNotFound', doctorId: input.doctorId });
      }

      // Applied in memory only until every check has passed
      const candidate: ShiftRecord = { ...previous, ...input };

      const slot = this.timeSlotValidator.validate(candidate.start, candidate.end);
      if (!slot.success) {
        return slot;
      }

      const conflicts = await this.conflictDetection.findConflicts(
        candidate.doctorId,
        slot.data.start,
        slot.data.end,
        id,
      );
      if (conflicts.length > 0) {
        return this.conflict<ShiftUpdate>(candidate.doctorId, conflicts[0]);
      }

      const saved = await this.shiftStore.save({
        ...candidate,
        start: slot.data.start,
        end: slot.data.end,
        updatedAt: new Date(),
      });
      if (!saved) {
        // Deleted by a writer holding the previous doctor's lock
        return fail<ShiftUpdate>({ kind: 'ShiftNotFound', shiftId: id });
      }
      return succeed<ShiftUpdate>({ previous, saved });
    });

    if (!result.success) {
      this.logger.warn(`Shift update rejected for ${id}: ${result.error.kind}`);
      return result;
    }

    const { previous, saved } = result.data;
    await this.auditService.logDataAccess('shifts', 'update', id, previous, saved, requestMetadata);
    this.logger.log(`Shift updated successfully with id ${id}`);
    return succeed(saved);
  }

  /**
   * Deletes shift `id` under its doctor's write lock, so a delete never lands
   * between an update's checks and its save for the same doctor.
   */
  async remove(id: string, requestMetadata?: RequestMetadata): Promise<ShiftResult<void>> {
    this.logger.log(`Deleting shift ${id}`);

    const shift = await this.shiftStore.findById(id);
    if (!shift) {
      return fail({ kind: 'ShiftNotFound', shiftId: id });
    }

    const result = await this.writeLock.runExclusive(shift.doctorId, async () => {
      if (!(await this.shiftStore.existsById(id))) {
        return fail<void>({ kind: 'ShiftNotFound', shiftId: id });
      }

      await this.shiftStore.deleteById(id);
      return succeed(undefined);
    });

    if (!result.success) {
      this.logger.warn(`Shift deletion rejected for ${id}: ${result.error.kind}`);
      return result;
    }

    await this.auditService.logDataAccess('shifts', 'delete', id, shift, null, requestMetadata);
    this.logger.log(`Shift deleted successfully with id ${id}`);
    return succeed(undefined);
  }

  private conflict<T>(doctorId: string, firstConflict: ShiftRecord): ShiftResult<T> {
    this.logger.warn(
      `Shift conflict detected for doctor ${doctorId}: existing shift ${firstConflict.start} - ${firstConflict.end}`,
    );
    return fail({
      kind: 'ShiftConflict',
      doctorId,
      conflictStart: firstConflict.start,
      conflictEnd: firstConflict.end,
    });
  }
}
