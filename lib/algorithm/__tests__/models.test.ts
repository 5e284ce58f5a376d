import { describe, expect, it } from 'vitest';
import {
  canTeach,
  courseNeedsLab,
  createLecture,
  describeTimeSlot,
  indexLectures,
  isAvailableOnDay,
  lectureKey,
  requiredRoomType,
  type Course,
  type Instructor,
} from '@/lib/algorithm/models';
import { lecturesPerWeek } from '@/lib/algorithm/problemBuilder';
import { ReferenceTables } from '@/lib/algorithm/referenceTables';
import { InvalidSolverInputError } from '@/lib/algorithm/errors';
import { sampleReferenceData } from './fixtures';

const labCourse: Course = { courseId: 'AID312', courseName: 'Intelligent Systems', credits: 3, type: 'Lecture and Lab' };
const lectureCourse: Course = { courseId: 'PHY113', courseName: 'Physics', credits: 2, type: 'Lecture' };

const instructor: Instructor = {
  instructorId: 'PROF01',
  name: 'Dr. Example',
  role: 'Professor',
  unavailableDay: 'Monday',
  qualifiedCourses: ['AID312'],
};

describe('lectures', () => {
  it('builds the identity key from section, course and lecture number', () => {
    expect(lectureKey(createLecture('S2', 'AID312', 2))).toBe('S2_AID312_L2');
  });

  it('escapes underscores and backslashes inside IDs', () => {
    expect(lectureKey(createLecture('S1_L1', 'AID312', 2))).toBe('S1\\_L1_AID312_L2');
    expect(lectureKey(createLecture('S1\\', 'X', 1))).toBe('S1\\\\_X_L1');
  });

  it('gives different lectures different keys when IDs contain underscores', () => {
    const keys = [
      createLecture('S1_L1', 'X', 1),
      createLecture('S1', 'L1_X', 1),
      createLecture('S1\\', '_X', 1),
    ].map(lectureKey);

    expect(new Set(keys).size).toBe(3);
  });

  it('creates frozen lectures', () => {
    expect(Object.isFrozen(createLecture('S1', 'AID312', 1))).toBe(true);
  });

  it('indexes lectures by key', () => {
    const first = createLecture('S1', 'AID312', 1);
    const second = createLecture('S1', 'AID312', 2);
    const index = indexLectures([first, second]);

    expect([...index.keys()]).toEqual(['S1_AID312_L1', 'S1_AID312_L2']);
    expect(index.get('S1_AID312_L2')).toBe(second);
  });

  it.each([
    [1, 1],
    [2, 1],
    [3, 2],
    [4, 2],
    [5, 3],
    [0, 2],
    [6, 2],
  ])('schedules %i credits as %i weekly lectures', (credits, expected) => {
    expect(lecturesPerWeek(credits)).toBe(expected);
  });
});

describe('unary rules', () => {
  it('sends lab courses to lab rooms only', () => {
    expect(courseNeedsLab(labCourse)).toBe(true);
    expect(requiredRoomType(labCourse)).toBe('Lab');
    expect(courseNeedsLab(lectureCourse)).toBe(false);
    expect(requiredRoomType(lectureCourse)).toBe('Lecture');
  });

  it('checks qualification against the course list', () => {
    expect(canTeach(instructor, 'AID312')).toBe(true);
    expect(canTeach(instructor, 'PHY113')).toBe(false);
  });

  it('blocks only the unavailable weekday', () => {
    expect(isAvailableOnDay(instructor, 'Monday')).toBe(false);
    expect(isAvailableOnDay(instructor, 'Sunday')).toBe(true);
    expect(isAvailableOnDay({ ...instructor, unavailableDay: null }, 'Monday')).toBe(true);
  });

  it('describes a timeslot for display', () => {
    expect(
      describeTimeSlot({ timeslotId: 'TS1', day: 'Sunday', position: 1, startTime: '10:45', endTime: '12:15' })
    ).toBe('Sunday 10:45-12:15');
  });
});

describe('ReferenceTables', () => {
  it('looks records up by ID', () => {
    const tables = new ReferenceTables(sampleReferenceData());

    expect(tables.getCourse('AID312')?.credits).toBe(3);
    expect(tables.getRoom('L1')?.type).toBe('Lab');
    expect(tables.getCourse('NOPE')).toBeUndefined();
    expect(tables.getInstructorUnavailableDay('PROF01')).toBe('Monday');
    expect(tables.getInstructorUnavailableDay('PROF02')).toBeNull();
    expect(tables.getSectionCourses('S2')).toEqual(['PHY113', 'LRA101']);
    expect(tables.getSectionCourses('S9')).toEqual([]);
    expect(tables.getSectionIds()).toEqual(['S1', 'S2', 'S3']);
  });

  it('keeps table order for qualified instructors and rooms', () => {
    const tables = new ReferenceTables(sampleReferenceData());

    expect(tables.getQualifiedInstructors('PHY113').map((i) => i.instructorId)).toEqual(['PROF01', 'PROF02']);
    expect(tables.getQualifiedInstructors('MTH201').map((i) => i.instructorId)).toEqual(['PROF02', 'PROF03']);
    expect(tables.getRoomsByType('Lecture').map((r) => r.roomId)).toEqual(['R101', 'R102']);
    expect(tables.getRoomsByType('Lab').map((r) => r.roomId)).toEqual(['L1']);
  });

  it('orders a day by position, not table order', () => {
    const data = sampleReferenceData();
    data.timeslots = [
      { timeslotId: 'LATE', day: 'Tuesday', position: 2, startTime: '12:30', endTime: '14:00' },
      { timeslotId: 'EARLY', day: 'Tuesday', position: 0, startTime: '09:00', endTime: '10:30' },
      { timeslotId: 'MID', day: 'Tuesday', position: 1, startTime: '10:45', endTime: '12:15' },
    ];
    const tables = new ReferenceTables(data);

    expect(tables.getTimeslotsForDay('Tuesday').map((t) => t.timeslotId)).toEqual(['EARLY', 'MID', 'LATE']);
    expect(tables.getTimeslotsForDay('Friday')).toEqual([]);
    expect(tables.getTimeslots().map((t) => t.timeslotId)).toEqual(['LATE', 'EARLY', 'MID']);
  });

  it('rejects duplicate IDs', () => {
    const data = sampleReferenceData();
    data.rooms.push({ roomId: 'R101', type: 'Lab', capacity: 10 });

    expect(() => new ReferenceTables(data)).toThrow(InvalidSolverInputError);
    expect(() => new ReferenceTables(data)).toThrow('Duplicate room ID: R101');
  });
});
