import { describe, expect, it } from 'vitest';
import { checkAllConstraints, findAllConflicts, isConsistent } from '@/lib/algorithm/constraints';
import { createLecture, indexLectures, type Assignment, type SlotAssignment } from '@/lib/algorithm/models';

const a = createLecture('S1', 'AID312', 1);
const b = createLecture('S1', 'PHY113', 1);
const c = createLecture('S2', 'PHY113', 1);
const lectures = indexLectures([a, b, c]);

function slot(timeslotId: string, roomId: string, instructorId: string): SlotAssignment {
  return { timeslotId, roomId, instructorId };
}

describe('isConsistent', () => {
  it('accepts anything on an empty assignment', () => {
    expect(isConsistent(a, slot('TS0', 'L1', 'PROF01'), new Map(), lectures)).toBe(true);
  });

  it('rejects an instructor double-booking', () => {
    const assignment: Assignment = new Map([['S1_AID312_L1', slot('TS0', 'L1', 'PROF01')]]);

    expect(isConsistent(c, slot('TS0', 'R101', 'PROF01'), assignment, lectures)).toBe(false);
  });

  it('rejects a room double-booking', () => {
    const assignment: Assignment = new Map([['S1_AID312_L1', slot('TS0', 'L1', 'PROF01')]]);

    expect(isConsistent(c, slot('TS0', 'L1', 'PROF02'), assignment, lectures)).toBe(false);
  });

  it('rejects a section double-booking', () => {
    const assignment: Assignment = new Map([['S1_AID312_L1', slot('TS0', 'L1', 'PROF01')]]);

    expect(isConsistent(b, slot('TS0', 'R101', 'PROF02'), assignment, lectures)).toBe(false);
  });

  it('accepts the same resources in another timeslot', () => {
    const assignment: Assignment = new Map([['S1_AID312_L1', slot('TS0', 'L1', 'PROF01')]]);

    expect(isConsistent(b, slot('TS1', 'L1', 'PROF01'), assignment, lectures)).toBe(true);
  });

  it('checks the whole resulting assignment', () => {
    // R101 is already double-booked at TS0, whatever the new value is
    const assignment: Assignment = new Map([
      ['S1_AID312_L1', slot('TS0', 'R101', 'PROF01')],
      ['S2_PHY113_L1', slot('TS0', 'R101', 'PROF02')],
    ]);

    expect(isConsistent(b, slot('TS3', 'R102', 'PROF03'), assignment, lectures)).toBe(false);
  });

  it("replaces the lecture's own entry instead of clashing with it", () => {
    const assignment: Assignment = new Map([['S1_AID312_L1', slot('TS0', 'L1', 'PROF01')]]);

    expect(isConsistent(a, slot('TS0', 'L1', 'PROF01'), assignment, lectures)).toBe(true);
  });

  it('does not modify the assignment', () => {
    const assignment: Assignment = new Map([['S1_AID312_L1', slot('TS0', 'L1', 'PROF01')]]);

    isConsistent(c, slot('TS1', 'R101', 'PROF02'), assignment, lectures);

    expect([...assignment.keys()]).toEqual(['S1_AID312_L1']);
  });
});

describe('findAllConflicts', () => {
  it('returns nothing for a clean assignment', () => {
    const assignment: Assignment = new Map([
      ['S1_AID312_L1', slot('TS0', 'L1', 'PROF01')],
      ['S1_PHY113_L1', slot('TS1', 'R101', 'PROF01')],
      ['S2_PHY113_L1', slot('TS0', 'R101', 'PROF02')],
    ]);

    expect(findAllConflicts(assignment, lectures)).toEqual([]);
    expect(checkAllConstraints(assignment, lectures)).toBe(true);
  });

  it('reports one record per violated rule', () => {
    const assignment: Assignment = new Map([
      ['S1_AID312_L1', slot('TS0', 'R101', 'PROF01')],
      ['S1_PHY113_L1', slot('TS0', 'R101', 'PROF01')],
    ]);

    const conflicts = findAllConflicts(assignment, lectures);

    expect(conflicts).toEqual([
      {
        kind: 'instructor',
        resourceId: 'PROF01',
        timeslotId: 'TS0',
        lectureKeys: ['S1_AID312_L1', 'S1_PHY113_L1'],
        message: 'Instructor PROF01 has conflict at TS0: S1_AID312_L1, S1_PHY113_L1',
      },
      {
        kind: 'room',
        resourceId: 'R101',
        timeslotId: 'TS0',
        lectureKeys: ['S1_AID312_L1', 'S1_PHY113_L1'],
        message: 'Room R101 has conflict at TS0: S1_AID312_L1, S1_PHY113_L1',
      },
      {
        kind: 'section',
        resourceId: 'S1',
        timeslotId: 'TS0',
        lectureKeys: ['S1_AID312_L1', 'S1_PHY113_L1'],
        message: 'Section S1 has conflict at TS0: S1_AID312_L1, S1_PHY113_L1',
      },
    ]);
    expect(checkAllConstraints(assignment, lectures)).toBe(false);
  });

  it('groups every lecture sharing a resource and timeslot', () => {
    const assignment: Assignment = new Map([
      ['S1_AID312_L1', slot('TS2', 'L1', 'PROF01')],
      ['S1_PHY113_L1', slot('TS3', 'R101', 'PROF02')],
      ['S2_PHY113_L1', slot('TS2', 'R102', 'PROF01')],
    ]);

    expect(findAllConflicts(assignment, lectures).map((conflict) => conflict.message)).toEqual([
      'Instructor PROF01 has conflict at TS2: S1_AID312_L1, S2_PHY113_L1',
    ]);
  });
});
