import { Test, TestingModule } from '@nestjs/testing';
import { ConflictDetectionService, TimeInterval, overlaps } from './conflict-detection.service';
import { SHIFT_STORE } from '../interfaces/shift-store.interface';
import { ShiftRecord } from '../interfaces/shift.interface';
import { InMemoryShiftStore } from '../../../../test/utils/in-memory-shift.store';

const hours = (start: number, end: number): TimeInterval => ({ start: start * 3600, end: end * 3600 });

describe('overlaps', () => {
  it('is symmetric', () => {
    const pairs: Array<[TimeInterval, TimeInterval]> = [
      [hours(13, 15), hours(14, 16)],
      [hours(9, 12), hours(12, 15)],
      [hours(10, 14), hours(12, 13)],
      [hours(1, 2), hours(5, 6)],
    ];

    for (const [a, b] of pairs) {
      expect(overlaps(a, b)).toBe(overlaps(b, a));
    }
  });

  it('does not treat back-to-back intervals as overlapping', () => {
    expect(overlaps(hours(9, 12), hours(12, 15))).toBe(false);
  });

  it('detects partial overlap', () => {
    expect(overlaps(hours(13, 15), hours(14, 16))).toBe(true);
  });

  it('detects containment', () => {
    expect(overlaps(hours(10, 14), hours(12, 13))).toBe(true);
  });

  it('detects identical intervals', () => {
    expect(overlaps(hours(8, 9), hours(8, 9))).toBe(true);
  });

  it('ignores disjoint intervals', () => {
    expect(overlaps(hours(1, 2), hours(5, 6))).toBe(false);
  });
});

describe('ConflictDetectionService', () => {
  let service: ConflictDetectionService;
  let store: InMemoryShiftStore;

  const doctorA = '64b7f0c2a1b2c3d4e5f60001';
  const doctorB = '64b7f0c2a1b2c3d4e5f60002';

  const seed = (doctorId: string, start: string, end: string): Promise<ShiftRecord> => {
    const now = new Date('2026-01-01T00:00:00.000Z');
    return store.save({ doctorId, start, end, room: 'R-1', createdAt: now, updatedAt: now });
  };

  beforeEach(async () => {
    store = new InMemoryShiftStore();

    const module: TestingModule = await Test.createTestingModule({
      providers: [ConflictDetectionService, { provide: SHIFT_STORE, useValue: store }],
    }).compile();

    service = module.get<ConflictDetectionService>(ConflictDetectionService);
  });

  it('returns the overlapping shifts of the doctor', async () => {
    const existing = await seed(doctorA, '13:00', '15:00');

    await expect(service.findConflicts(doctorA, '14:00', '16:00')).resolves.toEqual([existing]);
  });

  it('returns nothing for an adjacent slot', async () => {
    await seed(doctorA, '09:00', '12:00');

    await expect(service.findConflicts(doctorA, '12:00', '15:00')).resolves.toEqual([]);
  });

  it('never reports another doctor as a conflict', async () => {
    await seed(doctorA, '13:00', '15:00');

    await expect(service.findConflicts(doctorB, '13:00', '15:00')).resolves.toEqual([]);
  });

  it('returns conflicts in start order', async () => {
    const late = await seed(doctorA, '12:00', '13:00');
    const early = await seed(doctorA, '10:00', '11:00');

    const conflicts = await service.findConflicts(doctorA, '09:00', '14:00');

    expect(conflicts.map((shift) => shift.id)).toEqual([early.id, late.id]);
  });

  it('skips the excluded shift', async () => {
    const existing = await seed(doctorA, '09:00', '12:00');

    await expect(service.findConflicts(doctorA, '09:00', '12:00', existing.id)).resolves.toEqual([]);
  });

  it('compares candidates given with seconds', async () => {
    await seed(doctorA, '09:00', '12:00');

    await expect(service.findConflicts(doctorA, '12:00:00', '13:00')).resolves.toEqual([]);
    await expect(service.findConflicts(doctorA, '11:59:59', '13:00')).resolves.toHaveLength(1);
  });

  it('refuses a malformed candidate', async () => {
    await expect(service.findConflicts(doctorA, 'later', '13:00')).rejects.toThrow(
      'Cannot check conflicts for malformed slot later-13:00',
    );
  });
});
